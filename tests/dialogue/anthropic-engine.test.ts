import { describe, it, expect, vi, beforeEach } from 'vitest'

const { mockCreate, mockConstructor } = vi.hoisted(() => {
  const mockCreate = vi.fn()
  const mockConstructor = vi.fn(function () {
    return { messages: { create: mockCreate } }
  })
  return { mockCreate, mockConstructor }
})

vi.mock('@anthropic-ai/sdk', () => ({ default: mockConstructor }))

import { AnthropicDialogueEngine } from '@/lib/dialogue/anthropic-engine'
import { DIALOGUE_SYSTEM_PROMPT, GREETING_CUE, buildSystemPrompt, parseAssistantReply } from '@/lib/dialogue/dialogue-prompts'
import { createDialogueEngine, RasaDialogueEngine } from '@/lib/dialogue'
import { ConfigError } from '@/lib/orchestrator/errors'
import { DEFAULT_ORCHESTRATOR_CONFIG } from '@/types/config'
import { makeConfig } from '../test-utils/fixtures'

function textReply(text: string) {
  return { content: [{ type: 'text', text }] }
}

const context = { personId: 1, turn: 0, emotion: 'happy' }

// ============================================================================
// parseAssistantReply
// ============================================================================

describe('parseAssistantReply', () => {
  it('strips a gesture tag and keeps its name', () => {
    expect(parseAssistantReply('Hello there! [gesture:greet] How can I help?')).toEqual({
      text: 'Hello there! How can I help?',
      gesture: 'greet',
      endOfSession: false,
    })
  })

  it('detects the end marker', () => {
    expect(parseAssistantReply('Goodbye! [END]')).toEqual({ text: 'Goodbye!', endOfSession: true })
  })

  it('uses the first gesture tag only', () => {
    expect(parseAssistantReply('[Gesture:Happy] Great! [gesture:thinking]')).toEqual({
      text: 'Great!',
      gesture: 'happy',
      endOfSession: false,
    })
  })
})

describe('buildSystemPrompt', () => {
  it('adds the visitor emotion when one is known', () => {
    expect(buildSystemPrompt({ personId: 1, turn: 0, emotion: 'sad' }))
      .toBe(`${DIALOGUE_SYSTEM_PROMPT}\n\nThe visitor currently looks sad. Adapt your tone to that.`)
    expect(buildSystemPrompt({ personId: 1, turn: 0, emotion: null })).toBe(DIALOGUE_SYSTEM_PROMPT)
  })
})

// ============================================================================
// AnthropicDialogueEngine
// ============================================================================

describe('AnthropicDialogueEngine', () => {
  beforeEach(() => {
    mockCreate.mockReset()
    mockConstructor.mockClear()
  })

  it('greets with the greeting cue and returns the parsed act', async () => {
    mockCreate.mockResolvedValue(textReply('Hi! [gesture:greet] Welcome.'))
    const engine = new AnthropicDialogueEngine({ apiKey: 'test-key', model: 'test-model' })
    const { signal } = new AbortController()

    const response = await engine.respond({ sessionId: 's1', control: 'start', context }, signal)

    expect(mockConstructor).toHaveBeenCalledWith({ apiKey: 'test-key' })
    expect(response).toEqual({ act: { intent: null, text: 'Hi! Welcome.', gesture: 'greet' }, endOfSession: false })
    expect(mockCreate).toHaveBeenCalledWith({
      model: 'test-model',
      max_tokens: 150,
      system: buildSystemPrompt(context),
      messages: [{ role: 'user', content: GREETING_CUE }],
    }, { signal })
  })

  it('sends the session history with each utterance', async () => {
    mockCreate
      .mockResolvedValueOnce(textReply('Hi!'))
      .mockResolvedValueOnce(textReply('The cafe is on the left.'))
    const engine = new AnthropicDialogueEngine({ apiKey: 'test-key', model: 'test-model' })
    const { signal } = new AbortController()

    await engine.respond({ sessionId: 's1', control: 'start', context }, signal)
    await engine.respond({ sessionId: 's1', utterance: 'Where is the cafe?', context }, signal)

    expect(mockCreate.mock.calls[1][0].messages).toEqual([
      { role: 'user', content: GREETING_CUE },
      { role: 'assistant', content: 'Hi!' },
      { role: 'user', content: 'Where is the cafe?' },
    ])
    expect(engine.getSessionCount()).toBe(1)
  })

  it('forgets the session when the model ends it', async () => {
    mockCreate.mockResolvedValue(textReply('Goodbye! [END]'))
    const engine = new AnthropicDialogueEngine({ apiKey: 'test-key', model: 'test-model' })

    const response = await engine.respond(
      { sessionId: 's1', utterance: 'bye', context },
      new AbortController().signal,
    )

    expect(response).toEqual({ act: { intent: null, text: 'Goodbye!' }, endOfSession: true })
    expect(engine.getSessionCount()).toBe(0)
  })

  it('returns no act when the reply is only a marker', async () => {
    mockCreate.mockResolvedValue(textReply('[END]'))
    const engine = new AnthropicDialogueEngine({ apiKey: 'test-key', model: 'test-model' })

    const response = await engine.respond({ sessionId: 's1', utterance: 'stop', context }, new AbortController().signal)

    expect(response).toEqual({ act: null, endOfSession: true })
  })

  it('closes a session without calling the API', async () => {
    mockCreate.mockResolvedValue(textReply('Hi!'))
    const engine = new AnthropicDialogueEngine({ apiKey: 'test-key', model: 'test-model' })
    await engine.respond({ sessionId: 's1', control: 'start', context }, new AbortController().signal)

    const response = await engine.respond({ sessionId: 's1', control: 'end', context }, new AbortController().signal)

    expect(response).toEqual({ act: null, endOfSession: true })
    expect(mockCreate).toHaveBeenCalledTimes(1)
    expect(engine.getSessionCount()).toBe(0)
  })

  it('propagates API errors', async () => {
    mockCreate.mockRejectedValue(new Error('overloaded'))
    const engine = new AnthropicDialogueEngine({ apiKey: 'test-key', model: 'test-model' })

    await expect(engine.respond({ sessionId: 's1', utterance: 'hi', context }, new AbortController().signal))
      .rejects.toThrow('overloaded')
    expect(engine.getSessionCount()).toBe(0)
  })
})

// ============================================================================
// createDialogueEngine
// ============================================================================

describe('createDialogueEngine', () => {
  it('builds the Rasa engine by default', () => {
    expect(createDialogueEngine(makeConfig())).toBeInstanceOf(RasaDialogueEngine)
  })

  it('builds the LLM engine when a key is configured', () => {
    const engine = createDialogueEngine(makeConfig({
      dialogue: { ...DEFAULT_ORCHESTRATOR_CONFIG.dialogue, provider: 'anthropic', anthropicApiKey: 'test-key' },
    }))
    expect(engine.name).toBe('anthropic')
  })

  it('refuses the LLM engine without a key', () => {
    expect(() => createDialogueEngine(makeConfig({
      dialogue: { ...DEFAULT_ORCHESTRATOR_CONFIG.dialogue, provider: 'anthropic' },
    }))).toThrow(ConfigError)
  })
})
