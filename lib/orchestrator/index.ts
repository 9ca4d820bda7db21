export { InteractionOrchestrator } from './orchestrator'
export { PerceptionAdapter, rawDetectionSchema, rawSpeechSchema } from './perception-adapter'
export { IdentityTracker, smoothEmotion } from './identity-tracker'
export { AttentionArbiter, selectFocus } from './attention-arbiter'
export { InteractionMachine, greetingGestureFor } from './interaction-machine'
export { ActionDispatcher, compareCommands } from './action-dispatcher'
export { EventChannel } from './event-channel'
export { withDeadline } from './deadline'
export { monotonicClock } from './clock'
export {
  DeadlineExceededError,
  InvariantViolationError,
  ConfigError,
  ActuationUnavailableError,
  DialogueEngineError,
} from './errors'
export type { OrchestratorDeps, OrchestratorStatus } from './orchestrator'
export type { Clock } from './clock'
export type { PushResult, DropReason, RawDetection, RawSpeech } from './perception-adapter'
export type {
  PipelineEvent,
  TickEvent,
  DialogueActReady,
  ActuationDone,
  DialogueOutcome,
  OrchestratorEvent,
  OrchestratorEventListener,
  OrchestratorEventType,
} from './types'
