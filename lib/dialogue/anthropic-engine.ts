/**
 * LLM dialogue engine
 *
 * Keeps a short per-session history in memory (dropped when the session ends)
 * and asks Claude for the robot's next line.
 */

import Anthropic from '@anthropic-ai/sdk'
import { DIALOGUE_MAX_TOKENS, GREETING_CUE, buildSystemPrompt, parseAssistantReply } from './dialogue-prompts'
import type { DialogueEngine, DialogueRequest, DialogueResponse } from '@/types/dialogue'

interface ConversationTurn {
  role: 'user' | 'assistant'
  content: string
}

export interface AnthropicDialogueOptions {
  apiKey: string
  model: string
  maxTokens?: number
  maxHistoryTurns?: number  // default: 12 (6 exchanges)
}

export class AnthropicDialogueEngine implements DialogueEngine {
  readonly name = 'anthropic'
  readonly supportsGreeting = true

  private client: Anthropic
  private model: string
  private maxTokens: number
  private maxHistoryTurns: number
  private histories = new Map<string, ConversationTurn[]>()

  constructor(options: AnthropicDialogueOptions) {
    this.client = new Anthropic({ apiKey: options.apiKey })
    this.model = options.model
    this.maxTokens = options.maxTokens ?? DIALOGUE_MAX_TOKENS
    this.maxHistoryTurns = options.maxHistoryTurns ?? 12
  }

  async respond(request: DialogueRequest, signal: AbortSignal): Promise<DialogueResponse> {
    if (request.control === 'end') {
      this.histories.delete(request.sessionId)
      return { act: null, endOfSession: true }
    }

    const userText = request.control === 'start' ? GREETING_CUE : request.utterance?.trim()
    if (!userText) return { act: null, endOfSession: false }

    const history = this.histories.get(request.sessionId) ?? []
    const messages: ConversationTurn[] = [...history, { role: 'user', content: userText }]

    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: this.maxTokens,
      system: buildSystemPrompt(request.context),
      messages,
    }, { signal })

    const raw = response.content
      .flatMap(block => block.type === 'text' ? [block.text] : [])
      .join(' ')
      .trim()
    const reply = parseAssistantReply(raw)

    if (reply.endOfSession) {
      this.histories.delete(request.sessionId)
    } else {
      const updated: ConversationTurn[] = [...messages, { role: 'assistant', content: raw }]
      this.histories.set(request.sessionId, updated.slice(-this.maxHistoryTurns))
    }

    if (!reply.text && !reply.gesture) {
      return { act: null, endOfSession: reply.endOfSession }
    }
    return {
      act: {
        intent: null,
        text: reply.text,
        ...(reply.gesture ? { gesture: reply.gesture } : {}),
      },
      endOfSession: reply.endOfSession,
    }
  }

  getSessionCount(): number {
    return this.histories.size
  }
}
