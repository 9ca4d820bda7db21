/**
 * Perception Service
 *
 * Entry points for the producer and observer endpoints of server.ts.
 * No transport concepts leak into this module: callers hand in the raw
 * message text and get a ServiceResult back.
 *
 * Covers:
 *   WS  /detections -> submitDetections
 *   WS  /speech     -> submitSpeech
 *   GET /status     -> getOrchestratorStatus
 *   WS  /status     -> getOrchestratorStatus (sent on connect)
 */

import { getOrchestrator } from '@/services/shared-state'
import type { OrchestratorStatus } from '@/lib/orchestrator'
import type { DropReason, PushResult } from '@/lib/orchestrator/perception-adapter'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ServiceResult<T> {
  data?: T
  error?: string
  status: number  // HTTP-like status code for the transport to use
}

export interface SubmitSummary {
  accepted: number
  dropped: number
  reasons: DropReason[]
}

type PushFn = (record: unknown) => PushResult

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function submit(raw: string, kind: 'detection' | 'speech'): ServiceResult<SubmitSummary> {
  const orchestrator = getOrchestrator()
  if (!orchestrator) {
    return { error: 'Orchestrator is not running', status: 503 }
  }

  let payload: unknown
  try {
    payload = JSON.parse(raw)
  } catch {
    console.warn(`[Perception] Ignoring non-JSON ${kind} message`)
    return { error: 'Message is not valid JSON', status: 400 }
  }

  const push: PushFn = kind === 'detection'
    ? record => orchestrator.perception.pushDetection(record)
    : record => orchestrator.perception.pushSpeech(record)

  // A producer may batch several records of one frame into an array
  const records = Array.isArray(payload) ? payload : [payload]
  const summary: SubmitSummary = { accepted: 0, dropped: 0, reasons: [] }
  for (const record of records) {
    const result = push(record)
    if (result.accepted) {
      summary.accepted++
    } else {
      summary.dropped++
      summary.reasons.push(result.reason)
    }
  }

  return { data: summary, status: 202 }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** One detection record, or an array of them. */
export function submitDetections(raw: string): ServiceResult<SubmitSummary> {
  return submit(raw, 'detection')
}

/** One speech record, or an array of them. */
export function submitSpeech(raw: string): ServiceResult<SubmitSummary> {
  return submit(raw, 'speech')
}

export function getOrchestratorStatus(): ServiceResult<OrchestratorStatus> {
  const orchestrator = getOrchestrator()
  if (!orchestrator) {
    return { error: 'Orchestrator is not running', status: 503 }
  }
  return { data: orchestrator.getStatus(), status: 200 }
}
