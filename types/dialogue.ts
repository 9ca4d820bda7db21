// Dialogue engine (chatbot) collaborator contract

export type DialogueControl = 'start' | 'end'

export interface DialogueContext {
  personId: number
  turn: number
  emotion: string | null
}

export interface DialogueRequest {
  sessionId: string
  utterance?: string
  control?: DialogueControl
  context: DialogueContext
}

export interface DialogueAct {
  intent: string | null
  text: string
  gesture?: string
}

export interface DialogueResponse {
  act: DialogueAct | null
  endOfSession: boolean
}

export interface DialogueEngine {
  readonly name: string
  /** False when the engine has no opening exchange; the interaction then skips straight to conversing. */
  readonly supportsGreeting: boolean
  respond(request: DialogueRequest, signal: AbortSignal): Promise<DialogueResponse>
}
