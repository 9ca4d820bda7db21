/**
 * Interaction State Machine - one per engaged person
 *
 *   idle -> greeting -> conversing -> farewell -> ended
 *              \______________________/
 *
 * The machine never awaits anything. Chatbot calls and actuation go through
 * the InteractionContext, and their outcomes come back as method calls from
 * the consumer loop.
 */

import { v4 as uuidv4 } from 'uuid'
import { azimuthOf, type FrameGeometry } from './geometry'
import type { DialogueOutcome } from './types'
import type { ActionCommand, ActionPriorityLevel, RobotAction, RobotAnimation } from '@/types/action'
import { ActionPriority } from '@/types/action'
import type { DialogueAct, DialogueRequest } from '@/types/dialogue'
import type { FarewellReason, InteractionSnapshot, InteractionState } from '@/types/interaction'
import type { EmotionEstimate, TrackedPerson } from '@/types/person'

export interface InteractionContext {
  readonly greetingSupported: boolean
  readonly farewellText: string | null
  readonly maxQueuedUtterances: number
  readonly frame: FrameGeometry
  /** Starts a chatbot call and returns its request id. */
  requestDialogue(interaction: InteractionMachine, request: DialogueRequest): number
  cancelDialogue(interaction: InteractionMachine): void
  emitAction(interaction: InteractionMachine, action: RobotAction, priority: ActionPriorityLevel): ActionCommand
  supersedeSpeech(interaction: InteractionMachine): void
  transitioned(interaction: InteractionMachine, from: InteractionState, to: InteractionState): void
}

export function greetingGestureFor(emotion: EmotionEstimate | null): RobotAnimation {
  switch (emotion?.label) {
    case 'happy':
    case 'surprise':
      return 'happy'
    case 'sad':
    case 'angry':
    case 'fear':
    case 'disgust':
      return 'calm'
    default:
      return 'greet'
  }
}

export class InteractionMachine {
  readonly id: string
  readonly personId: number
  readonly sessionId: string

  private context: InteractionContext
  private current: InteractionState = 'idle'
  private turns = 0
  private lastAct: DialogueAct | null = null
  private emotion: string | null = null
  private pendingRequestId: number | null = null
  private queued: string[] = []
  private farewellCommandId: string | null = null
  private farewellReason: FarewellReason | null = null
  private sessionOpened = false

  constructor(personId: number, context: InteractionContext) {
    this.id = uuidv4()
    this.personId = personId
    this.sessionId = `person-${personId}-${this.id.substring(0, 8)}`
    this.context = context
  }

  get state(): InteractionState {
    return this.current
  }

  /** True once any request has gone to the chatbot under this session id. */
  get hasDialogueSession(): boolean {
    return this.sessionOpened
  }

  /** Becoming the focus person: look at them, gesture, open the dialogue. */
  engage(person: TrackedPerson): boolean {
    if (this.current !== 'idle') return false

    this.emotion = person.emotion?.label ?? null
    this.transition('greeting')
    this.context.emitAction(this, {
      type: 'gaze',
      target: { personId: person.id, azimuthDeg: azimuthOf(person.location, this.context.frame) },
    }, ActionPriority.normal)
    this.context.emitAction(this, { type: 'gesture', name: greetingGestureFor(person.emotion) }, ActionPriority.low)

    if (this.context.greetingSupported) {
      this.sessionOpened = true
      this.pendingRequestId = this.context.requestDialogue(this, {
        sessionId: this.sessionId,
        control: 'start',
        context: { personId: this.personId, turn: 0, emotion: this.emotion },
      })
    } else {
      this.transition('conversing')
    }
    return true
  }

  /**
   * A transcript from this person. Forwarded at once when conversing with no
   * call in flight, queued while greeting or waiting, ignored otherwise.
   */
  hear(transcript: string, person?: TrackedPerson): boolean {
    if (person?.emotion) this.emotion = person.emotion.label

    if (this.current === 'conversing' && this.pendingRequestId === null) {
      this.send(transcript)
      return true
    }
    if (this.current === 'greeting' || this.current === 'conversing') {
      this.queued.push(transcript)
      if (this.queued.length > this.context.maxQueuedUtterances) {
        this.queued.shift()
      }
      return true
    }
    return false
  }

  /** Returns false when the outcome belongs to a request this machine no longer waits for. */
  onDialogueOutcome(requestId: number, outcome: DialogueOutcome): boolean {
    if (requestId !== this.pendingRequestId) return false
    if (this.current !== 'greeting' && this.current !== 'conversing') return false
    this.pendingRequestId = null

    if (!outcome.ok) {
      console.warn(`[Orchestrator:Interaction] Dialogue failed for person #${this.personId}: ${outcome.error}`)
      this.beginFarewell('dialogue-failure')
      return true
    }

    const { act, endOfSession } = outcome.response
    let spoken: ActionCommand | null = null
    if (act) {
      this.lastAct = act
      if (act.text.trim()) {
        spoken = this.context.emitAction(this, { type: 'speak', text: act.text }, ActionPriority.normal)
      }
      if (act.gesture) {
        this.context.emitAction(this, { type: 'gesture', name: act.gesture }, ActionPriority.normal)
      }
    }

    if (endOfSession) {
      this.beginFarewell('end-of-session', spoken)
      return true
    }

    if (this.current === 'greeting') {
      this.transition('conversing')
    }

    const next = this.queued.shift()
    if (next !== undefined) this.send(next)
    return true
  }

  /** No longer the focus person. */
  disengage(): void {
    if (this.current === 'greeting' || this.current === 'conversing') {
      this.beginFarewell('disengaged')
    } else if (this.current === 'idle') {
      this.transition('ended')
    }
  }

  onActionDone(commandId: string): void {
    if (this.current === 'farewell' && commandId === this.farewellCommandId) {
      this.transition('ended')
    }
  }

  /** The person is gone: end without speaking. Returns false if already ended. */
  forceEnd(): boolean {
    if (this.current === 'ended') return false

    this.dropDialogue()
    if (this.current === 'greeting' || this.current === 'conversing') {
      this.farewellReason = 'person-lost'
      this.transition('farewell')
    }
    this.transition('ended')
    return true
  }

  snapshot(): InteractionSnapshot {
    return {
      id: this.id,
      personId: this.personId,
      sessionId: this.sessionId,
      state: this.current,
      turns: this.turns,
      lastAct: this.lastAct,
      awaitingDialogue: this.pendingRequestId !== null,
      queuedUtterances: this.queued.length,
      farewellReason: this.farewellReason,
    }
  }

  private send(utterance: string): void {
    this.turns++
    this.sessionOpened = true
    this.pendingRequestId = this.context.requestDialogue(this, {
      sessionId: this.sessionId,
      utterance,
      context: { personId: this.personId, turn: this.turns, emotion: this.emotion },
    })
  }

  private beginFarewell(reason: FarewellReason, spoken: ActionCommand | null = null): void {
    if (this.current === 'farewell' || this.current === 'ended') return

    this.dropDialogue()
    this.farewellReason = reason
    this.transition('farewell')

    // A closing reply from the chatbot doubles as the farewell line
    if (spoken) {
      this.farewellCommandId = spoken.id
      return
    }

    this.context.supersedeSpeech(this)
    if (this.context.farewellText) {
      const command = this.context.emitAction(this, { type: 'speak', text: this.context.farewellText }, ActionPriority.high)
      this.farewellCommandId = command.id
    } else {
      this.transition('ended')
    }
  }

  private dropDialogue(): void {
    if (this.pendingRequestId !== null) {
      this.context.cancelDialogue(this)
      this.pendingRequestId = null
    }
    this.queued = []
  }

  private transition(to: InteractionState): void {
    const from = this.current
    this.current = to
    this.context.transitioned(this, from, to)
  }
}
