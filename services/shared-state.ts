/**
 * Shared State Module
 *
 * Uses globalThis._sharedState so server.ts and the service functions see the
 * same orchestrator instance and the same /status subscribers.
 */

import type { InteractionOrchestrator } from '@/lib/orchestrator'
import type { OrchestratorEvent } from '@/lib/orchestrator/types'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The part of a ws WebSocket the broadcaster needs */
export interface StatusSubscriber {
  readonly readyState: number
  send(data: string): void
}

export interface StatusUpdate {
  type: 'status_update'
  event: OrchestratorEvent['type']
  at: number
  payload: Record<string, unknown>
  timestamp: string
}

// ---------------------------------------------------------------------------
// Shared globalThis initialization
// ---------------------------------------------------------------------------

declare global {
  // eslint-disable-next-line no-var
  var _sharedState: {
    orchestrator: InteractionOrchestrator | null
    statusSubscribers: Set<StatusSubscriber>
  } | undefined
}

if (!globalThis._sharedState) {
  globalThis._sharedState = {
    orchestrator: null,
    statusSubscribers: new Set<StatusSubscriber>(),
  }
}

const state = globalThis._sharedState

// ---------------------------------------------------------------------------
// Exports - all backed by globalThis._sharedState
// ---------------------------------------------------------------------------

/** Connected /status WebSocket clients. */
export const statusSubscribers: Set<StatusSubscriber> = state.statusSubscribers

export function getOrchestrator(): InteractionOrchestrator | null {
  return state.orchestrator
}

export function setOrchestrator(orchestrator: InteractionOrchestrator | null): void {
  state.orchestrator = orchestrator
}

// ---------------------------------------------------------------------------
// Broadcast an orchestrator event to all /status WebSocket subscribers
// ---------------------------------------------------------------------------

export function broadcastStatusUpdate(event: OrchestratorEvent): void {
  const message = JSON.stringify({
    type: 'status_update',
    event: event.type,
    at: event.at,
    payload: event.payload,
    timestamp: new Date().toISOString(),
  } satisfies StatusUpdate)

  statusSubscribers.forEach(ws => {
    if (ws.readyState === 1) { // WebSocket.OPEN
      ws.send(message)
    }
  })
}
