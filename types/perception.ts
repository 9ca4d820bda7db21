// Perception types shared by the adapter, the tracker and the collaborator server

export type PerceptionSource = 'camera' | 'microphone'

export interface BoundingBox {
  kind: 'bbox'
  x: number
  y: number
  width: number
  height: number
}

export interface Direction {
  kind: 'direction'
  azimuthDeg: number  // 0 = straight ahead, positive = robot's right
}

export type Locator = BoundingBox | Direction

interface PerceptionEventBase {
  readonly id: number           // receipt sequence, unique per adapter
  readonly source: PerceptionSource
  readonly receivedAt: number   // monotonic ms, assigned on receipt
  readonly sensorTimestamp: number
  readonly confidence: number
}

export interface PersonDetected extends PerceptionEventBase {
  readonly kind: 'person-detected'
  readonly locator: Locator
}

export interface FaceDetected extends PerceptionEventBase {
  readonly kind: 'face-detected'
  readonly locator: Locator
}

export interface EmotionClassified extends PerceptionEventBase {
  readonly kind: 'emotion-classified'
  readonly locator: Locator
  readonly emotion: string
}

export interface SpeechRecognized extends PerceptionEventBase {
  readonly kind: 'speech-recognized'
  readonly locator: Locator | null
  readonly transcript: string
}

export interface PersonLost extends PerceptionEventBase {
  readonly kind: 'person-lost'
  readonly locator: Locator
}

export type PerceptionEvent =
  | PersonDetected
  | FaceDetected
  | EmotionClassified
  | SpeechRecognized
  | PersonLost

export type PerceptionKind = PerceptionEvent['kind']

export interface PerceptionStats {
  accepted: number
  malformed: number
  lowConfidence: number
  disabled: number
  overflow: number
}
