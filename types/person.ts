import type { Locator } from './perception'

export type Liveness = 'active' | 'stale' | 'lost'

export interface EmotionEstimate {
  label: string
  score: number                   // smoothed weight of the dominant label, 0..1
  scores: Record<string, number>  // smoothed weight per label seen so far
  samples: number
}

export interface TrackedPerson {
  id: number
  location: Locator
  firstSeen: number
  lastSeen: number
  staleSince: number | null
  liveness: Liveness
  emotion: EmotionEstimate | null
  faceSeen: boolean
  lastTranscript: string | null
}

export interface FocusDecision {
  readonly personId: number | null
  readonly seq: number      // bumps on every change of personId
  readonly decidedAt: number
}

export const NO_FOCUS: FocusDecision = { personId: null, seq: 0, decidedAt: 0 }
