/**
 * Robot bridge actuator
 *
 * Talks JSON over a WebSocket to the bridge process running next to the
 * robot SDK. One request per command, one reply per request:
 *
 *   -> { id, op: 'say', text, configuration: { bodyLanguageMode: 'contextual' } }
 *   -> { id, op: 'animate', animation }
 *   -> { id, op: 'look_at', personId, azimuthDeg }
 *   <- { id, ok, error? }
 */

import WebSocket from 'ws'
import { z } from 'zod'
import { ActuationUnavailableError } from '@/lib/orchestrator/errors'
import { rawDataToString } from '@/lib/ws-utils'
import type { ActionCommand, Actuator } from '@/types/action'

const RECONNECT_DELAY = 3000
const MAX_RECONNECT_ATTEMPTS = 5

// Close code 4000 = bridge refused us for good, don't retry
const PERMANENT_FAILURE_CODE = 4000

export type BridgeRequest =
  | { id: string; op: 'say'; text: string; configuration: { bodyLanguageMode: 'contextual' } }
  | { id: string; op: 'animate'; animation: string }
  | { id: string; op: 'look_at'; personId: number; azimuthDeg: number }

const bridgeReplySchema = z.object({
  id: z.string(),
  ok: z.boolean(),
  error: z.string().optional(),
})

export function encodeCommand(command: ActionCommand): BridgeRequest {
  const { action } = command
  switch (action.type) {
    case 'speak':
      return { id: command.id, op: 'say', text: action.text, configuration: { bodyLanguageMode: 'contextual' } }
    case 'gesture':
      return { id: command.id, op: 'animate', animation: action.name }
    case 'gaze':
      return { id: command.id, op: 'look_at', personId: action.target.personId, azimuthDeg: action.target.azimuthDeg }
  }
}

interface PendingReply {
  resolve: () => void
  reject: (error: Error) => void
}

export interface WebSocketActuatorOptions {
  url: string
  reconnectDelayMs?: number
  maxReconnectAttempts?: number
}

export class WebSocketActuator implements Actuator {
  readonly name = 'robot-bridge'

  private url: string
  private reconnectDelayMs: number
  private maxReconnectAttempts: number
  private ws: WebSocket | null = null
  private pending = new Map<string, PendingReply>()
  private reconnectAttempts = 0
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null
  private closed = false

  constructor(options: WebSocketActuatorOptions) {
    this.url = options.url
    this.reconnectDelayMs = options.reconnectDelayMs ?? RECONNECT_DELAY
    this.maxReconnectAttempts = options.maxReconnectAttempts ?? MAX_RECONNECT_ATTEMPTS
  }

  connect(): void {
    if (this.closed) return
    if (this.ws && (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING)) {
      return
    }

    console.log(`[Robot] Connecting to bridge at ${this.url}`)
    const ws = new WebSocket(this.url)

    ws.on('open', () => {
      this.reconnectAttempts = 0
      console.log('[Robot] Bridge connected')
    })
    ws.on('message', data => this.handleMessage(rawDataToString(data)))
    ws.on('error', (error: Error) => {
      console.error('[Robot] Bridge error:', error.message)
    })
    ws.on('close', (code: number, reason: Buffer) => this.handleClose(ws, code, reason.toString()))

    this.ws = ws
  }

  isConnected(): boolean {
    return this.ws?.readyState === WebSocket.OPEN
  }

  execute(command: ActionCommand, signal: AbortSignal): Promise<void> {
    const ws = this.ws
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      // Retries were exhausted; a new command is a good reason to try again
      if (!ws && !this.reconnectTimer && !this.closed) {
        this.reconnectAttempts = 0
        this.connect()
      }
      return Promise.reject(new ActuationUnavailableError(`Robot bridge not connected (${this.url})`))
    }
    if (signal.aborted) {
      return Promise.reject(signal.reason)
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        this.pending.delete(command.id)
        reject(signal.reason)
      }
      signal.addEventListener('abort', onAbort, { once: true })

      this.pending.set(command.id, {
        resolve: () => {
          signal.removeEventListener('abort', onAbort)
          resolve()
        },
        reject: (error) => {
          signal.removeEventListener('abort', onAbort)
          reject(error)
        },
      })

      ws.send(JSON.stringify(encodeCommand(command)), (error?: Error) => {
        if (error) this.settle(command.id, error)
      })
    })
  }

  async close(): Promise<void> {
    this.closed = true
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer)
      this.reconnectTimer = null
    }
    this.rejectAll(new ActuationUnavailableError('Robot bridge closed'))
    const ws = this.ws
    this.ws = null
    ws?.close(1000)
  }

  private handleMessage(text: string): void {
    let payload: unknown
    try {
      payload = JSON.parse(text)
    } catch {
      console.warn('[Robot] Ignoring non-JSON bridge message')
      return
    }

    const reply = bridgeReplySchema.safeParse(payload)
    if (!reply.success) {
      console.warn('[Robot] Ignoring unexpected bridge message:', reply.error.issues[0]?.message)
      return
    }

    const { id, ok, error } = reply.data
    this.settle(id, ok ? null : new Error(error || `Robot rejected command ${id}`))
  }

  private settle(id: string, error: Error | null): void {
    const pending = this.pending.get(id)
    if (!pending) return
    this.pending.delete(id)
    if (error) pending.reject(error)
    else pending.resolve()
  }

  private rejectAll(error: Error): void {
    const pending = Array.from(this.pending.values())
    this.pending.clear()
    for (const reply of pending) reply.reject(error)
  }

  private handleClose(ws: WebSocket, code: number, reason: string): void {
    if (this.ws !== ws) return
    this.ws = null
    this.rejectAll(new ActuationUnavailableError('Robot bridge connection closed'))
    if (this.closed) return

    if (code === PERMANENT_FAILURE_CODE) {
      console.error(`[Robot] Bridge closed permanently: ${reason || 'no reason given'}`)
      return
    }

    if (this.reconnectAttempts < this.maxReconnectAttempts) {
      this.reconnectAttempts++
      console.warn(`[Robot] Bridge disconnected (code ${code}), reconnecting in ${this.reconnectDelayMs}ms (attempt ${this.reconnectAttempts}/${this.maxReconnectAttempts})`)
      this.reconnectTimer = setTimeout(() => {
        this.reconnectTimer = null
        this.connect()
      }, this.reconnectDelayMs)
    } else {
      console.error('[Robot] Failed to reach bridge after maximum reconnection attempts')
    }
  }
}
