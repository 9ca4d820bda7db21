/**
 * Factory functions for test data used across orchestrator tests.
 *
 * Each factory provides sensible defaults that can be overridden.
 * Counters keep event ids unique within a test run (reset in beforeEach if needed).
 */

import { DEFAULT_ORCHESTRATOR_CONFIG, type OrchestratorConfig } from '@/types/config'
import type { Clock } from '@/lib/orchestrator/clock'
import type {
  BoundingBox,
  EmotionClassified,
  FaceDetected,
  Locator,
  PersonDetected,
  PersonLost,
  SpeechRecognized,
} from '@/types/perception'
import type { TrackedPerson } from '@/types/person'
import { ActionPriority, type ActionCommand, type RobotAction } from '@/types/action'

let counter = 0

/** Reset the internal counter (call in beforeEach) */
export function resetFixtureCounter() {
  counter = 0
}

function nextId(): number {
  return ++counter
}

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

/** Defaults with the robot off and a short farewell line. T1=2s, T2=5s, N=3s. */
export function makeConfig(overrides: Partial<OrchestratorConfig> = {}): OrchestratorConfig {
  return {
    ...DEFAULT_ORCHESTRATOR_CONFIG,
    robot: { enabled: false, url: 'ws://127.0.0.1:9559' },
    farewellText: 'Goodbye!',
    ...overrides,
  }
}

// ---------------------------------------------------------------------------
// Clock
// ---------------------------------------------------------------------------

export interface ManualClock extends Clock {
  set(ms: number): void
  advance(ms: number): void
}

export function createManualClock(start = 0): ManualClock {
  let current = start
  return {
    now: () => current,
    set: (ms) => { current = ms },
    advance: (ms) => { current += ms },
  }
}

// ---------------------------------------------------------------------------
// Locators
// ---------------------------------------------------------------------------

/** [x, y, w, h] of a box centred on (cx, cy) */
export function bboxAround(cx: number, cy: number, width = 40, height = 80): [number, number, number, number] {
  return [cx - width / 2, cy - height / 2, width, height]
}

export function boxAt(cx: number, cy: number, width = 40, height = 80): BoundingBox {
  const [x, y] = bboxAround(cx, cy, width, height)
  return { kind: 'bbox', x, y, width, height }
}

// ---------------------------------------------------------------------------
// Perception events
// ---------------------------------------------------------------------------

export function makePersonDetected(locator: Locator, receivedAt: number, confidence = 0.9): PersonDetected {
  return { kind: 'person-detected', id: nextId(), source: 'camera', receivedAt, sensorTimestamp: receivedAt, confidence, locator }
}

export function makeFaceDetected(locator: Locator, receivedAt: number): FaceDetected {
  return { kind: 'face-detected', id: nextId(), source: 'camera', receivedAt, sensorTimestamp: receivedAt, confidence: 0.9, locator }
}

export function makeEmotion(locator: Locator, emotion: string, receivedAt: number, confidence = 0.8): EmotionClassified {
  return { kind: 'emotion-classified', id: nextId(), source: 'camera', receivedAt, sensorTimestamp: receivedAt, confidence, locator, emotion }
}

export function makeSpeech(transcript: string, receivedAt: number, locator: Locator | null = null): SpeechRecognized {
  return { kind: 'speech-recognized', id: nextId(), source: 'microphone', receivedAt, sensorTimestamp: receivedAt, confidence: 0.9, locator, transcript }
}

export function makePersonLost(locator: Locator, receivedAt: number): PersonLost {
  return { kind: 'person-lost', id: nextId(), source: 'camera', receivedAt, sensorTimestamp: receivedAt, confidence: 1, locator }
}

// ---------------------------------------------------------------------------
// Tracked person
// ---------------------------------------------------------------------------

export function makePerson(overrides: Partial<TrackedPerson> = {}): TrackedPerson {
  return {
    id: nextId(),
    location: boxAt(320, 240),
    firstSeen: 0,
    lastSeen: 0,
    staleSince: null,
    liveness: 'active',
    emotion: null,
    faceSeen: false,
    lastTranscript: null,
    ...overrides,
  }
}

// ---------------------------------------------------------------------------
// Action commands
// ---------------------------------------------------------------------------

export function makeCommand(action: RobotAction, overrides: Partial<ActionCommand> = {}): ActionCommand {
  const seq = nextId()
  return {
    id: `cmd-${seq}`,
    interactionId: 'interaction-1',
    personId: 1,
    priority: ActionPriority.normal,
    seq,
    emittedAt: 0,
    action,
    ...overrides,
  }
}
