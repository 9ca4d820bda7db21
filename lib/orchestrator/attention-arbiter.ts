/**
 * Attention Arbiter - decides who the robot is paying attention to
 *
 * Owns the single FocusDecision. Everyone else reads it through getDecision().
 */

import { NO_FOCUS, type FocusDecision, type TrackedPerson } from '@/types/person'

export interface ArbiterOptions {
  /** A stale focus must stay stale this long before focus may move on (T1). */
  staleHoldMs: number
}

function mostRecentActive(tracked: readonly TrackedPerson[]): TrackedPerson | null {
  let best: TrackedPerson | null = null
  for (const person of tracked) {
    if (person.liveness !== 'active') continue
    if (!best || person.lastSeen > best.lastSeen || (person.lastSeen === best.lastSeen && person.id < best.id)) {
      best = person
    }
  }
  return best
}

/**
 * Pure focus rule. Returns the id to focus on, or null.
 *
 * - an active current focus is kept
 * - a stale current focus is kept until it has been stale for staleHoldMs
 *   and a strictly more recently seen active person exists
 * - otherwise the most recently seen active person wins, lowest id on ties
 */
export function selectFocus(
  tracked: readonly TrackedPerson[],
  currentId: number | null,
  now: number,
  options: ArbiterOptions,
): number | null {
  const current = currentId === null ? undefined : tracked.find(p => p.id === currentId)
  const candidate = mostRecentActive(tracked)

  if (current && current.liveness === 'active') return current.id

  if (current && current.liveness === 'stale') {
    const staleFor = current.staleSince === null ? 0 : now - current.staleSince
    const strictlyNewer = candidate !== null && candidate.lastSeen > current.lastSeen
    return staleFor >= options.staleHoldMs && strictlyNewer && candidate ? candidate.id : current.id
  }

  return candidate ? candidate.id : null
}

export class AttentionArbiter {
  private options: ArbiterOptions
  private decision: FocusDecision = NO_FOCUS

  constructor(options: ArbiterOptions) {
    this.options = options
  }

  decide(tracked: readonly TrackedPerson[], now: number): FocusDecision {
    const personId = selectFocus(tracked, this.decision.personId, now, this.options)
    if (personId !== this.decision.personId) {
      this.decision = { personId, seq: this.decision.seq + 1, decidedAt: now }
    }
    return this.decision
  }

  getDecision(): FocusDecision {
    return this.decision
  }
}
