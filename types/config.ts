// Orchestrator configuration: built once at startup and handed to the core

export type DialogueProvider = 'rasa' | 'anthropic'

export interface TrackingConfig {
  staleAfterMs: number     // T1: active -> stale
  lostAfterMs: number      // T2: stale -> lost (removed)
  matchWindowMs: number    // N: only persons seen this recently can be matched
  matchDistancePx: number  // max locator distance for a match
  emotionSmoothing: number // EMA weight of a new emotion sample, 0..1
}

export interface ConfidenceFloors {
  person: number
  face: number
  emotion: number
  speech: number
}

export interface OrchestratorConfig {
  robot: {
    enabled: boolean
    url: string
  }
  camera: {
    enabled: boolean
    frameWidth: number
    horizontalFovDeg: number
  }
  microphone: string | null  // null disables audio entirely
  tracking: TrackingConfig
  confidence: ConfidenceFloors
  dialogue: {
    provider: DialogueProvider
    rasaUrl: string
    anthropicApiKey: string | null
    model: string
    timeoutMs: number
    maxQueuedUtterances: number
  }
  actuation: {
    timeoutMs: number
  }
  farewellText: string | null
  tickIntervalMs: number
  channelCapacity: number
  server: {
    port: number
  }
}

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  robot: {
    enabled: true,
    url: 'ws://10.0.1.207:9559',
  },
  camera: {
    enabled: true,
    frameWidth: 640,
    horizontalFovDeg: 57.2,
  },
  microphone: 'default',
  tracking: {
    staleAfterMs: 2000,
    lostAfterMs: 5000,
    matchWindowMs: 3000,
    matchDistancePx: 80,
    emotionSmoothing: 0.3,
  },
  confidence: {
    person: 0.5,
    face: 0.5,
    emotion: 0.4,
    speech: 0.4,
  },
  dialogue: {
    provider: 'rasa',
    rasaUrl: 'http://localhost:5005',
    anthropicApiKey: null,
    model: 'claude-3-5-haiku-20241022',
    timeoutMs: 8000,
    maxQueuedUtterances: 3,
  },
  actuation: {
    timeoutMs: 15000,
  },
  farewellText: 'Goodbye! It was nice talking to you.',
  tickIntervalMs: 250,
  channelCapacity: 512,
  server: {
    port: 8765,
  },
}
