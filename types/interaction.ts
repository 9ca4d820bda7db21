import type { DialogueAct } from './dialogue'

export type InteractionState = 'idle' | 'greeting' | 'conversing' | 'farewell' | 'ended'

export type FarewellReason = 'disengaged' | 'end-of-session' | 'dialogue-failure' | 'person-lost'

export interface InteractionSnapshot {
  id: string
  personId: number
  sessionId: string
  state: InteractionState
  turns: number
  lastAct: DialogueAct | null
  awaitingDialogue: boolean
  queuedUtterances: number
  farewellReason: FarewellReason | null
}
