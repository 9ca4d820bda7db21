/**
 * Identity Tracker - owns every TrackedPerson and its liveness
 *
 * Detections are associated with existing persons by locator distance within
 * a time window; unmatched detections create new persons. Ids come from a
 * counter and are never reused. Callers only ever receive copies.
 */

import { locatorDistance, type FrameGeometry } from './geometry'
import type { TrackingConfig } from '@/types/config'
import type { Locator, PerceptionEvent, PersonLost } from '@/types/perception'
import type { EmotionEstimate, TrackedPerson } from '@/types/person'

const DISTANCE_EPSILON = 1e-6
const MAX_REMEMBERED_LOST_EVENTS = 256

export interface IdentityTrackerOptions extends TrackingConfig, FrameGeometry {
  /** Runs before a person is removed, while it is already marked lost. */
  onLost?: (person: TrackedPerson) => void
}

export interface IngestResult {
  personId: number | null
  created: boolean
  removed: number[]
  duplicate: boolean
}

export interface SweepResult {
  staled: number[]
  removed: number[]
}

export function smoothEmotion(
  previous: EmotionEstimate | null,
  label: string,
  confidence: number,
  alpha: number,
): EmotionEstimate {
  const scores: Record<string, number> = {}
  if (previous) {
    for (const [name, weight] of Object.entries(previous.scores)) {
      scores[name] = weight * (1 - alpha)
    }
    scores[label] = (scores[label] ?? 0) + alpha * confidence
  } else {
    scores[label] = confidence
  }

  let dominant = label
  for (const [name, weight] of Object.entries(scores)) {
    if (weight > scores[dominant]) dominant = name
  }

  return {
    label: dominant,
    score: scores[dominant],
    scores,
    samples: (previous?.samples ?? 0) + 1,
  }
}

/**
 * Identifies a lost-track record by its content. Receipt ids differ between
 * two deliveries of the same record, so they cannot be used.
 */
export function lostEventKey(event: PersonLost): string {
  const { locator } = event
  const place = locator.kind === 'bbox'
    ? `${locator.x},${locator.y},${locator.width},${locator.height}`
    : `@${locator.azimuthDeg}`
  return `${event.sensorTimestamp}|${place}`
}

function snapshot(person: TrackedPerson): TrackedPerson {
  return { ...person }
}

export class IdentityTracker {
  private options: IdentityTrackerOptions
  private persons = new Map<number, TrackedPerson>()
  private nextId = 1
  private handledLostEvents = new Set<string>()

  constructor(options: IdentityTrackerOptions) {
    this.options = options
  }

  ingest(event: PerceptionEvent, focusId: number | null = null): IngestResult {
    const now = event.receivedAt
    const result: IngestResult = { personId: null, created: false, removed: [], duplicate: false }

    switch (event.kind) {
      case 'person-detected':
      case 'face-detected': {
        const match = this.match(event.locator, now)
        if (match) {
          match.location = event.locator
          match.lastSeen = now
          match.liveness = 'active'
          match.staleSince = null
          if (event.kind === 'face-detected') match.faceSeen = true
          result.personId = match.id
        } else {
          const person = this.create(event.locator, now, event.kind === 'face-detected')
          result.personId = person.id
          result.created = true
        }
        return result
      }

      case 'emotion-classified': {
        const match = this.match(event.locator, now)
        if (!match) return result
        match.emotion = smoothEmotion(match.emotion, event.emotion, event.confidence, this.options.emotionSmoothing)
        result.personId = match.id
        return result
      }

      case 'speech-recognized': {
        const match = event.locator
          ? this.match(event.locator, now)
          : this.focusWithinWindow(focusId, now)
        if (!match) return result
        match.lastTranscript = event.transcript
        result.personId = match.id
        return result
      }

      case 'person-lost': {
        const key = lostEventKey(event)
        if (this.handledLostEvents.has(key)) {
          result.duplicate = true
          return result
        }
        this.rememberLostEvent(key)
        // A lost track may refer to someone unseen for longer than the window
        const match = this.match(event.locator, now, Infinity)
        if (!match) return result
        result.personId = match.id
        this.remove(match)
        result.removed.push(match.id)
        return result
      }
    }
  }

  tick(now: number): SweepResult {
    const sweep: SweepResult = { staled: [], removed: [] }
    const { staleAfterMs, lostAfterMs } = this.options

    for (const person of Array.from(this.persons.values())) {
      const unseen = now - person.lastSeen
      if (unseen >= lostAfterMs) {
        this.remove(person)
        sweep.removed.push(person.id)
      } else if (person.liveness === 'active' && unseen >= staleAfterMs) {
        person.liveness = 'stale'
        person.staleSince = person.lastSeen + staleAfterMs
        sweep.staled.push(person.id)
      }
    }

    if (sweep.removed.length > 0) {
      console.log(`[Orchestrator:Tracker] Lost ${sweep.removed.map(id => `#${id}`).join(', ')} after ${lostAfterMs}ms unseen`)
    }
    return sweep
  }

  get(id: number): TrackedPerson | undefined {
    const person = this.persons.get(id)
    return person ? snapshot(person) : undefined
  }

  has(id: number): boolean {
    return this.persons.has(id)
  }

  list(): TrackedPerson[] {
    return Array.from(this.persons.values(), snapshot)
  }

  get size(): number {
    return this.persons.size
  }

  private create(locator: Locator, now: number, faceSeen: boolean): TrackedPerson {
    const person: TrackedPerson = {
      id: this.nextId++,
      location: locator,
      firstSeen: now,
      lastSeen: now,
      staleSince: null,
      liveness: 'active',
      emotion: null,
      faceSeen,
      lastTranscript: null,
    }
    this.persons.set(person.id, person)
    console.log(`[Orchestrator:Tracker] New person #${person.id}`)
    return person
  }

  private remove(person: TrackedPerson): void {
    person.liveness = 'lost'
    this.options.onLost?.(snapshot(person))
    this.persons.delete(person.id)
  }

  /**
   * Closest live person within the window and distance threshold.
   * Ties go to the most recently seen person, then to the lowest id.
   */
  private match(locator: Locator, now: number, windowMs = this.options.matchWindowMs): TrackedPerson | null {
    let best: TrackedPerson | null = null
    let bestDistance = Infinity

    for (const person of this.persons.values()) {
      if (person.liveness === 'lost') continue
      if (now - person.lastSeen > windowMs) continue

      const distance = locatorDistance(locator, person.location, this.options)
      if (distance > this.options.matchDistancePx) continue

      if (!best || distance < bestDistance - DISTANCE_EPSILON) {
        best = person
        bestDistance = distance
      } else if (Math.abs(distance - bestDistance) <= DISTANCE_EPSILON) {
        const moreRecent = person.lastSeen > best.lastSeen
          || (person.lastSeen === best.lastSeen && person.id < best.id)
        if (moreRecent) {
          best = person
          bestDistance = distance
        }
      }
    }
    return best
  }

  private focusWithinWindow(focusId: number | null, now: number): TrackedPerson | null {
    if (focusId === null) return null
    const person = this.persons.get(focusId)
    if (!person || person.liveness === 'lost') return null
    return now - person.lastSeen <= this.options.matchWindowMs ? person : null
  }

  private rememberLostEvent(key: string): void {
    this.handledLostEvents.add(key)
    if (this.handledLostEvents.size > MAX_REMEMBERED_LOST_EVENTS) {
      const oldest = this.handledLostEvents.values().next()
      if (!oldest.done) this.handledLostEvents.delete(oldest.value)
    }
  }
}
