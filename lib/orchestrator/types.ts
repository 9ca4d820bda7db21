/**
 * Orchestrator pipeline types
 *
 * Everything the consumer loop handles is a PipelineEvent: perception events
 * plus ticks and the completions of collaborator calls.
 */

import type { PerceptionEvent } from '@/types/perception'
import type { DialogueResponse } from '@/types/dialogue'

export interface TickEvent {
  kind: 'tick'
  now: number
}

export type DialogueOutcome =
  | { ok: true; response: DialogueResponse }
  | { ok: false; error: string }

export interface DialogueActReady {
  kind: 'dialogue-act-ready'
  now: number
  interactionId: string
  requestId: number
  outcome: DialogueOutcome
}

export interface ActuationDone {
  kind: 'actuation-done'
  now: number
  commandId: string
  interactionId: string
  ok: boolean
  error?: string
}

export type PipelineEvent = PerceptionEvent | TickEvent | DialogueActReady | ActuationDone

export function eventTime(event: PipelineEvent): number {
  switch (event.kind) {
    case 'tick':
    case 'dialogue-act-ready':
    case 'actuation-done':
      return event.now
    default:
      return event.receivedAt
  }
}

export type OrchestratorEventType =
  | 'person:created'
  | 'person:lost'
  | 'focus:change'
  | 'interaction:transition'
  | 'action:sent'
  | 'action:done'

export interface OrchestratorEvent {
  type: OrchestratorEventType
  at: number
  payload: Record<string, unknown>
}

export type OrchestratorEventListener = (event: OrchestratorEvent) => void
