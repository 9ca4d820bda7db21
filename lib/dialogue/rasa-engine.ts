/**
 * Rasa dialogue engine - REST channel client
 *
 * POST {url}/webhooks/rest/webhook with { sender, message, metadata } and
 * receive an array of bot messages. Control signals are sent as intent
 * triggers. Bot messages may carry a custom payload:
 *   { "custom": { "gesture": "happy", "end_session": true, "intent": "goodbye" } }
 */

import http from 'http'
import https from 'https'
import { z } from 'zod'
import { DialogueEngineError } from '@/lib/orchestrator/errors'
import type { DialogueControl, DialogueEngine, DialogueRequest, DialogueResponse } from '@/types/dialogue'

const CONTROL_MESSAGES: Record<DialogueControl, string> = {
  start: '/greet',
  end: '/restart',
}

const rasaMessageSchema = z.object({
  recipient_id: z.string().optional(),
  text: z.string().optional(),
  custom: z.record(z.unknown()).optional(),
})

const rasaReplySchema = z.array(rasaMessageSchema)

export interface RasaDialogueOptions {
  url: string  // e.g. http://localhost:5005
}

/** HTTP POST using native Node.js http module; rejects on non-2xx status */
function httpPostJson(url: string, body: unknown, signal: AbortSignal): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const urlObj = new URL(url)
    const client = urlObj.protocol === 'https:' ? https : http
    const payload = JSON.stringify(body)

    const req = client.request(urlObj, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Content-Length': Buffer.byteLength(payload),
      },
      signal,
    }, (res) => {
      let data = ''
      res.setEncoding('utf8')
      res.on('data', (chunk: string) => data += chunk)
      res.on('end', () => {
        const status = res.statusCode ?? 0
        if (status < 200 || status >= 300) {
          reject(new DialogueEngineError(`Rasa responded with HTTP ${status}`, status))
          return
        }
        try {
          resolve(JSON.parse(data))
        } catch {
          reject(new DialogueEngineError(`Invalid JSON from ${url}`))
        }
      })
    })

    req.on('error', (error: Error) => reject(error))
    req.end(payload)
  })
}

/** Folds the bot messages of one REST reply into a single dialogue response. */
export function parseRasaReply(raw: unknown): DialogueResponse {
  const parsed = rasaReplySchema.safeParse(raw)
  if (!parsed.success) {
    throw new DialogueEngineError('Unexpected reply shape from Rasa')
  }

  const texts: string[] = []
  let gesture: string | undefined
  let intent: string | null = null
  let endOfSession = false

  for (const message of parsed.data) {
    if (message.text?.trim()) texts.push(message.text.trim())
    const custom = message.custom
    if (!custom) continue
    if (gesture === undefined && typeof custom.gesture === 'string') gesture = custom.gesture
    if (intent === null && typeof custom.intent === 'string') intent = custom.intent
    if (custom.end_session === true) endOfSession = true
  }

  if (texts.length === 0 && gesture === undefined) {
    return { act: null, endOfSession }
  }
  return {
    act: {
      intent,
      text: texts.join(' '),
      ...(gesture !== undefined ? { gesture } : {}),
    },
    endOfSession,
  }
}

export class RasaDialogueEngine implements DialogueEngine {
  readonly name = 'rasa'
  readonly supportsGreeting = true

  private webhookUrl: string

  constructor(options: RasaDialogueOptions) {
    this.webhookUrl = `${options.url.replace(/\/+$/, '')}/webhooks/rest/webhook`
  }

  async respond(request: DialogueRequest, signal: AbortSignal): Promise<DialogueResponse> {
    const message = request.control ? CONTROL_MESSAGES[request.control] : request.utterance
    if (!message) return { act: null, endOfSession: false }

    const reply = await httpPostJson(this.webhookUrl, {
      sender: request.sessionId,
      message,
      metadata: {
        person_id: request.context.personId,
        turn: request.context.turn,
        emotion: request.context.emotion,
      },
    }, signal)

    const response = parseRasaReply(reply)
    return request.control === 'end' ? { ...response, endOfSession: true } : response
  }
}
