/**
 * Perception Adapter - normalizes collaborator records into PerceptionEvents
 *
 * Pure normalization: validation, modality gating, confidence floors and a
 * monotonic receipt timestamp. Nothing here throws on bad input; every drop is
 * counted by reason.
 */

import { z } from 'zod'
import type { Clock } from './clock'
import type { ConfidenceFloors } from '@/types/config'
import type {
  Locator,
  PerceptionEvent,
  PerceptionKind,
  PerceptionStats,
} from '@/types/perception'

const finite = () => z.number().finite()

const boxSchema = z.union([
  z.tuple([finite(), finite(), finite().positive(), finite().positive()]),
  z.object({
    x: finite(),
    y: finite(),
    width: finite().positive(),
    height: finite().positive(),
  }),
])

export const rawDetectionSchema = z
  .object({
    kind: z.enum(['person', 'face', 'emotion', 'person_lost']),
    bbox: boxSchema.optional(),
    direction: finite().min(-180).max(180).optional(),
    confidence: finite().min(0).max(1),
    label: z.string().trim().min(1).optional(),
    timestamp: finite(),
  })
  .refine(r => r.bbox !== undefined || r.direction !== undefined, {
    message: 'bbox or direction is required',
    path: ['bbox'],
  })
  .refine(r => r.kind !== 'emotion' || r.label !== undefined, {
    message: 'emotion records need a label',
    path: ['label'],
  })

export const rawSpeechSchema = z.object({
  transcript: z.string().trim().min(1),
  confidence: finite().min(0).max(1),
  timestamp: finite(),
  direction: finite().min(-180).max(180).optional(),
})

export type RawDetection = z.input<typeof rawDetectionSchema>
export type RawSpeech = z.input<typeof rawSpeechSchema>

type ParsedDetection = z.output<typeof rawDetectionSchema>

export type DropReason = 'malformed' | 'lowConfidence' | 'disabled' | 'overflow'

export type PushResult =
  | { accepted: true; event: PerceptionEvent }
  | { accepted: false; reason: DropReason; detail?: string }

export interface PerceptionAdapterOptions {
  cameraEnabled: boolean
  microphoneEnabled: boolean
  floors: ConfidenceFloors
  clock: Clock
  /** Enqueue onto the consumer channel; false when the channel is full. */
  sink: (event: PerceptionEvent) => boolean
}

const DETECTION_KINDS: Record<ParsedDetection['kind'], PerceptionKind> = {
  person: 'person-detected',
  face: 'face-detected',
  emotion: 'emotion-classified',
  person_lost: 'person-lost',
}

function toLocator(record: { bbox?: ParsedDetection['bbox']; direction?: number }): Locator | null {
  const { bbox, direction } = record
  if (bbox !== undefined) {
    return Array.isArray(bbox)
      ? { kind: 'bbox', x: bbox[0], y: bbox[1], width: bbox[2], height: bbox[3] }
      : { kind: 'bbox', x: bbox.x, y: bbox.y, width: bbox.width, height: bbox.height }
  }
  if (direction !== undefined) {
    return { kind: 'direction', azimuthDeg: direction }
  }
  return null
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(record)'}: ${issue.message}`)
    .join(', ')
}

export class PerceptionAdapter {
  private options: PerceptionAdapterOptions
  private nextId = 1
  private stats: PerceptionStats = {
    accepted: 0,
    malformed: 0,
    lowConfidence: 0,
    disabled: 0,
    overflow: 0,
  }

  constructor(options: PerceptionAdapterOptions) {
    this.options = options
  }

  pushDetection(raw: unknown): PushResult {
    if (!this.options.cameraEnabled) return this.drop('disabled')

    const parsed = rawDetectionSchema.safeParse(raw)
    if (!parsed.success) {
      const detail = describeIssues(parsed.error)
      console.warn(`[Orchestrator:Perception] Dropped malformed detection: ${detail}`)
      return this.drop('malformed', detail)
    }

    const record = parsed.data
    const kind = DETECTION_KINDS[record.kind]
    if (record.confidence < this.floorFor(kind)) return this.drop('lowConfidence')

    const locator = toLocator(record)
    if (!locator) return this.drop('malformed', 'no locator')

    const base = {
      id: this.nextId++,
      source: 'camera' as const,
      receivedAt: this.options.clock.now(),
      sensorTimestamp: record.timestamp,
      confidence: record.confidence,
      locator,
    }

    let event: PerceptionEvent
    switch (kind) {
      case 'emotion-classified':
        event = { ...base, kind, emotion: (record.label ?? '').toLowerCase() }
        break
      case 'person-detected':
      case 'face-detected':
      case 'person-lost':
        event = { ...base, kind }
        break
      case 'speech-recognized':
        return this.drop('malformed', 'speech arrived on the detection stream')
    }

    return this.emit(event)
  }

  pushSpeech(raw: unknown): PushResult {
    if (!this.options.microphoneEnabled) return this.drop('disabled')

    const parsed = rawSpeechSchema.safeParse(raw)
    if (!parsed.success) {
      const detail = describeIssues(parsed.error)
      console.warn(`[Orchestrator:Perception] Dropped malformed speech: ${detail}`)
      return this.drop('malformed', detail)
    }

    const record = parsed.data
    if (record.confidence < this.options.floors.speech) return this.drop('lowConfidence')

    return this.emit({
      kind: 'speech-recognized',
      id: this.nextId++,
      source: 'microphone',
      receivedAt: this.options.clock.now(),
      sensorTimestamp: record.timestamp,
      confidence: record.confidence,
      locator: toLocator({ direction: record.direction }),
      transcript: record.transcript,
    })
  }

  getStats(): PerceptionStats {
    return { ...this.stats }
  }

  private floorFor(kind: PerceptionKind): number {
    const { floors } = this.options
    switch (kind) {
      case 'person-detected': return floors.person
      case 'face-detected': return floors.face
      case 'emotion-classified': return floors.emotion
      case 'speech-recognized': return floors.speech
      // A lost track is a control signal, not a detection
      case 'person-lost': return 0
    }
  }

  private emit(event: PerceptionEvent): PushResult {
    const frozen = Object.freeze(event)
    if (!this.options.sink(frozen)) {
      console.warn(`[Orchestrator:Perception] Channel full, dropped ${event.kind} #${event.id}`)
      return this.drop('overflow')
    }
    this.stats.accepted++
    return { accepted: true, event: frozen }
  }

  private drop(reason: DropReason, detail?: string): PushResult {
    this.stats[reason]++
    return detail === undefined ? { accepted: false, reason } : { accepted: false, reason, detail }
  }
}
