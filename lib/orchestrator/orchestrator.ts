/**
 * Interaction Orchestrator - single-consumer loop over every perception stream
 *
 * Producers (detections, speech, ticker, collaborator completions) push into
 * one EventChannel. Each event is one synchronous consumer turn:
 *
 *   ingest -> tick cleanup -> arbitration -> state machines -> dispatch
 *
 * Chatbot and actuator calls run outside the turn under a deadline and come
 * back as 'dialogue-act-ready' / 'actuation-done' events.
 */

import { ActionDispatcher, type DispatcherStats } from './action-dispatcher'
import { AttentionArbiter } from './attention-arbiter'
import { monotonicClock, type Clock } from './clock'
import { withDeadline } from './deadline'
import { InvariantViolationError, errorMessage } from './errors'
import { EventChannel } from './event-channel'
import { IdentityTracker } from './identity-tracker'
import { InteractionMachine, type InteractionContext } from './interaction-machine'
import { PerceptionAdapter } from './perception-adapter'
import {
  eventTime,
  type ActuationDone,
  type DialogueActReady,
  type DialogueOutcome,
  type OrchestratorEvent,
  type OrchestratorEventListener,
  type OrchestratorEventType,
  type PipelineEvent,
} from './types'
import type { ActionCommand, Actuator } from '@/types/action'
import type { OrchestratorConfig } from '@/types/config'
import type { DialogueEngine, DialogueRequest } from '@/types/dialogue'
import type { InteractionSnapshot, InteractionState } from '@/types/interaction'
import type { PerceptionStats } from '@/types/perception'
import type { FocusDecision, TrackedPerson } from '@/types/person'

export interface OrchestratorDeps {
  config: OrchestratorConfig
  dialogue: DialogueEngine
  actuator: Actuator
  clock?: Clock
}

export interface OrchestratorStatus {
  running: boolean
  focus: FocusDecision
  persons: TrackedPerson[]
  interactions: InteractionSnapshot[]
  perception: PerceptionStats
  dispatcher: DispatcherStats
  collaborators: {
    dialogue: string
    actuator: string
    dialogueFailures: number
    actuationFailures: number
    discardedCompletions: number
  }
  queuedEvents: number
  fatal: string | null
}

interface DialogueCall {
  requestId: number
  controller: AbortController
}

export class InteractionOrchestrator {
  readonly perception: PerceptionAdapter

  private config: OrchestratorConfig
  private dialogue: DialogueEngine
  private actuator: Actuator
  private clock: Clock
  private channel: EventChannel<PipelineEvent>
  private tracker: IdentityTracker
  private arbiter: AttentionArbiter
  private dispatcher: ActionDispatcher
  private interactionContext: InteractionContext

  private interactions = new Map<string, InteractionMachine>()
  private currentByPerson = new Map<number, string>()
  // Interactions saying goodbye, until they end
  private closingByPerson = new Map<number, string>()
  private dialogueCalls = new Map<string, DialogueCall>()
  private nextRequestId = 1
  private listeners = new Map<OrchestratorEventType, Set<OrchestratorEventListener>>()

  private running = false
  private ticker: ReturnType<typeof setInterval> | null = null
  private loop: Promise<void> | null = null
  private fatal: Error | null = null
  private counters = { dialogueFailures: 0, actuationFailures: 0, discardedCompletions: 0 }

  constructor(deps: OrchestratorDeps) {
    this.config = deps.config
    this.dialogue = deps.dialogue
    this.actuator = deps.actuator
    this.clock = deps.clock ?? monotonicClock
    this.channel = new EventChannel<PipelineEvent>(deps.config.channelCapacity)

    const frame = {
      frameWidth: deps.config.camera.frameWidth,
      horizontalFovDeg: deps.config.camera.horizontalFovDeg,
    }

    this.perception = new PerceptionAdapter({
      cameraEnabled: deps.config.camera.enabled,
      microphoneEnabled: deps.config.microphone !== null,
      floors: deps.config.confidence,
      clock: this.clock,
      sink: event => this.channel.push(event),
    })

    this.tracker = new IdentityTracker({
      ...deps.config.tracking,
      ...frame,
      onLost: person => this.endInteractionsOf(person),
    })

    this.arbiter = new AttentionArbiter({ staleHoldMs: deps.config.tracking.staleAfterMs })
    this.dispatcher = new ActionDispatcher(command => this.sendToActuator(command))

    this.interactionContext = {
      greetingSupported: deps.dialogue.supportsGreeting,
      farewellText: deps.config.farewellText,
      maxQueuedUtterances: deps.config.dialogue.maxQueuedUtterances,
      frame,
      requestDialogue: (interaction, request) => this.requestDialogue(interaction, request),
      cancelDialogue: interaction => this.cancelDialogue(interaction.id),
      emitAction: (interaction, action, priority) => this.dispatcher.enqueue({
        interactionId: interaction.id,
        personId: interaction.personId,
        action,
        priority,
        emittedAt: this.clock.now(),
      }),
      supersedeSpeech: interaction => {
        this.dispatcher.supersede(interaction.id)
      },
      transitioned: (interaction, from, to) => this.onTransition(interaction, from, to),
    }

    if (!deps.config.camera.enabled) {
      console.log('[Orchestrator] Camera disabled: no person, face or emotion events')
    }
    if (deps.config.microphone === null) {
      console.log('[Orchestrator] Microphone disabled: no speech events')
    }
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /** Starts the ticker and the consumer loop. Resolves on stop(), rejects on a fatal error. */
  start(): Promise<void> {
    if (this.loop) return this.loop
    this.running = true
    this.ticker = setInterval(() => this.tick(), this.config.tickIntervalMs)
    this.loop = this.consume()
    console.log(`[Orchestrator] Running (dialogue: ${this.dialogue.name}, actuator: ${this.actuator.name})`)
    return this.loop
  }

  async stop(): Promise<void> {
    this.halt()
    this.channel.close()
    for (const call of this.dialogueCalls.values()) {
      call.controller.abort(new Error('orchestrator stopped'))
    }
    this.dialogueCalls.clear()

    if (this.loop) {
      await this.loop.catch(err => console.error('[Orchestrator] Consumer loop ended with error:', err))
    }
    await this.actuator.close?.()
    console.log('[Orchestrator] Stopped')
  }

  /** Enqueues a tick. The ticker calls this; tests call it with explicit times. */
  tick(now: number = this.clock.now()): void {
    this.channel.pushUrgent({ kind: 'tick', now })
  }

  /** Processes everything queued, synchronously. Only for an orchestrator that is not running. */
  drain(): number {
    if (this.running) {
      throw new Error('drain() cannot be used while the consumer loop is running')
    }
    let processed = 0
    for (let event = this.channel.tryReceive(); event !== undefined; event = this.channel.tryReceive()) {
      this.handleEvent(event)
      processed++
    }
    return processed
  }

  // ---------------------------------------------------------------------------
  // Consumer turn
  // ---------------------------------------------------------------------------

  handleEvent(event: PipelineEvent): void {
    if (this.fatal) throw this.fatal

    const now = eventTime(event)
    let rearbitrate = false
    let heard: { personId: number; transcript: string } | null = null

    switch (event.kind) {
      case 'person-detected':
      case 'face-detected': {
        const result = this.tracker.ingest(event)
        if (result.created && result.personId !== null) this.onPersonCreated(result.personId, now)
        rearbitrate = true
        break
      }
      case 'emotion-classified':
        this.tracker.ingest(event)
        break
      case 'speech-recognized': {
        const result = this.tracker.ingest(event, this.arbiter.getDecision().personId)
        if (result.personId !== null) heard = { personId: result.personId, transcript: event.transcript }
        break
      }
      case 'person-lost':
        this.tracker.ingest(event)
        rearbitrate = true
        break
      case 'tick':
        this.tracker.tick(event.now)
        rearbitrate = true
        break
      case 'dialogue-act-ready':
        this.onDialogueActReady(event)
        break
      case 'actuation-done':
        this.onActuationDone(event)
        break
    }

    if (rearbitrate) this.arbitrate(now)
    if (heard) this.deliverSpeech(heard.personId, heard.transcript)

    this.assertInvariants()
    this.dispatcher.flush(this.engagedInteractionId())
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  getFocus(): FocusDecision {
    return this.arbiter.getDecision()
  }

  listPersons(): TrackedPerson[] {
    return this.tracker.list()
  }

  listInteractions(): InteractionSnapshot[] {
    return Array.from(this.interactions.values(), i => i.snapshot())
  }

  /** The person's current (not retiring) interaction. */
  getInteractionFor(personId: number): InteractionSnapshot | undefined {
    return this.currentInteraction(personId)?.snapshot()
  }

  pendingActions(): ActionCommand[] {
    return this.dispatcher.pending(this.engagedInteractionId())
  }

  getStatus(): OrchestratorStatus {
    return {
      running: this.running,
      focus: this.arbiter.getDecision(),
      persons: this.tracker.list(),
      interactions: this.listInteractions(),
      perception: this.perception.getStats(),
      dispatcher: this.dispatcher.getStats(),
      collaborators: {
        dialogue: this.dialogue.name,
        actuator: this.actuator.name,
        ...this.counters,
      },
      queuedEvents: this.channel.size,
      fatal: this.fatal ? this.fatal.message : null,
    }
  }

  on(type: OrchestratorEventType, listener: OrchestratorEventListener): void {
    let set = this.listeners.get(type)
    if (!set) {
      set = new Set()
      this.listeners.set(type, set)
    }
    set.add(listener)
  }

  off(type: OrchestratorEventType, listener: OrchestratorEventListener): void {
    this.listeners.get(type)?.delete(listener)
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async consume(): Promise<void> {
    try {
      for (let event = await this.channel.receive(); event !== null; event = await this.channel.receive()) {
        this.handleEvent(event)
      }
    } finally {
      this.halt()
    }
  }

  private halt(): void {
    this.running = false
    if (this.ticker) {
      clearInterval(this.ticker)
      this.ticker = null
    }
  }

  private onPersonCreated(personId: number, now: number): void {
    this.createInteraction(personId)
    this.emit('person:created', now, { personId })
  }

  private createInteraction(personId: number): InteractionMachine {
    const interaction = new InteractionMachine(personId, this.interactionContext)
    this.interactions.set(interaction.id, interaction)
    this.currentByPerson.set(personId, interaction.id)
    return interaction
  }

  private currentInteraction(personId: number): InteractionMachine | undefined {
    const id = this.currentByPerson.get(personId)
    return id === undefined ? undefined : this.interactions.get(id)
  }

  private engagedInteractionId(): string | null {
    const { personId } = this.arbiter.getDecision()
    if (personId === null) return null
    return this.currentByPerson.get(personId) ?? this.closingByPerson.get(personId) ?? null
  }

  private arbitrate(now: number): void {
    const previous = this.arbiter.getDecision()
    const decision = this.arbiter.decide(this.tracker.list(), now)
    if (decision.seq === previous.seq) return

    console.log(`[Orchestrator] Focus ${previous.personId === null ? 'none' : `#${previous.personId}`} -> ${decision.personId === null ? 'none' : `#${decision.personId}`}`)
    this.emit('focus:change', now, { from: previous.personId, to: decision.personId, seq: decision.seq })

    if (previous.personId !== null) {
      this.currentInteraction(previous.personId)?.disengage()
    }

    if (decision.personId !== null) {
      const person = this.tracker.get(decision.personId)
      if (!person) {
        throw this.fail(new InvariantViolationError(`focus selected unknown person #${decision.personId}`))
      }
      const interaction = this.currentInteraction(person.id) ?? this.createInteraction(person.id)
      interaction.engage(person)
    }
  }

  private deliverSpeech(personId: number, transcript: string): void {
    if (personId !== this.arbiter.getDecision().personId) return
    this.currentInteraction(personId)?.hear(transcript, this.tracker.get(personId))
  }

  /** onLost hook: runs before the tracker forgets the person. */
  private endInteractionsOf(person: TrackedPerson): void {
    const owned = Array.from(this.interactions.values()).filter(i => i.personId === person.id)
    for (const interaction of owned) {
      interaction.forceEnd()
    }
    this.emit('person:lost', this.clock.now(), { personId: person.id })
  }

  private onTransition(interaction: InteractionMachine, from: InteractionState, to: InteractionState): void {
    console.log(`[Orchestrator:Interaction] #${interaction.personId} ${from} -> ${to}`)
    this.emit('interaction:transition', this.clock.now(), {
      interactionId: interaction.id,
      personId: interaction.personId,
      from,
      to,
      farewellReason: interaction.snapshot().farewellReason,
    })

    if (to === 'farewell' || to === 'ended') {
      // Re-selection of this person starts a fresh interaction
      if (this.currentByPerson.get(interaction.personId) === interaction.id) {
        this.currentByPerson.delete(interaction.personId)
      }
    }
    if (to === 'farewell') {
      this.closingByPerson.set(interaction.personId, interaction.id)
    }
    if (to === 'ended') {
      if (this.closingByPerson.get(interaction.personId) === interaction.id) {
        this.closingByPerson.delete(interaction.personId)
      }
      this.cancelDialogue(interaction.id)
      this.dispatcher.cancel(interaction.id)
      this.interactions.delete(interaction.id)
      if (interaction.hasDialogueSession) this.closeDialogueSession(interaction)
    }
  }

  /** Lets the engine forget the session. Nothing waits for the answer. */
  private closeDialogueSession(interaction: InteractionMachine): void {
    const request: DialogueRequest = {
      sessionId: interaction.sessionId,
      control: 'end',
      context: { personId: interaction.personId, turn: interaction.snapshot().turns, emotion: null },
    }
    void withDeadline(
      `dialogue end ${request.sessionId}`,
      this.config.dialogue.timeoutMs,
      signal => this.dialogue.respond(request, signal),
    ).catch(err => {
      console.warn(`[Orchestrator] Could not close dialogue session ${request.sessionId}: ${errorMessage(err)}`)
    })
  }

  private requestDialogue(interaction: InteractionMachine, request: DialogueRequest): number {
    this.cancelDialogue(interaction.id)
    const requestId = this.nextRequestId++
    const controller = new AbortController()
    this.dialogueCalls.set(interaction.id, { requestId, controller })
    void this.runDialogueCall(interaction.id, requestId, request, controller.signal)
    return requestId
  }

  private cancelDialogue(interactionId: string): void {
    const call = this.dialogueCalls.get(interactionId)
    if (!call) return
    this.dialogueCalls.delete(interactionId)
    call.controller.abort(new Error('interaction left the conversation'))
  }

  private async runDialogueCall(
    interactionId: string,
    requestId: number,
    request: DialogueRequest,
    signal: AbortSignal,
  ): Promise<void> {
    let outcome: DialogueOutcome
    try {
      const response = await withDeadline(
        `dialogue ${request.sessionId}`,
        this.config.dialogue.timeoutMs,
        s => this.dialogue.respond(request, s),
        signal,
      )
      outcome = { ok: true, response }
    } catch (err) {
      outcome = { ok: false, error: errorMessage(err) }
    }
    this.channel.pushUrgent({ kind: 'dialogue-act-ready', now: this.clock.now(), interactionId, requestId, outcome })
  }

  private onDialogueActReady(event: DialogueActReady): void {
    const call = this.dialogueCalls.get(event.interactionId)
    if (call?.requestId === event.requestId) this.dialogueCalls.delete(event.interactionId)

    const interaction = this.interactions.get(event.interactionId)
    if (!interaction || !interaction.onDialogueOutcome(event.requestId, event.outcome)) {
      this.counters.discardedCompletions++
      return
    }
    if (!event.outcome.ok) this.counters.dialogueFailures++
  }

  private sendToActuator(command: ActionCommand): void {
    this.emit('action:sent', this.clock.now(), {
      commandId: command.id,
      interactionId: command.interactionId,
      type: command.action.type,
    })
    void this.runActuation(command)
  }

  private async runActuation(command: ActionCommand): Promise<void> {
    let error: string | null = null
    try {
      await withDeadline(
        `${command.action.type} ${command.id}`,
        this.config.actuation.timeoutMs,
        signal => this.actuator.execute(command, signal),
      )
    } catch (err) {
      error = errorMessage(err)
    }
    const done: ActuationDone = {
      kind: 'actuation-done',
      now: this.clock.now(),
      commandId: command.id,
      interactionId: command.interactionId,
      ok: error === null,
    }
    if (error !== null) done.error = error
    this.channel.pushUrgent(done)
  }

  private onActuationDone(event: ActuationDone): void {
    const command = this.dispatcher.complete(event.commandId, event.ok, event.error)
    if (!command) {
      this.counters.discardedCompletions++
      return
    }
    if (!event.ok) this.counters.actuationFailures++
    this.emit('action:done', event.now, { commandId: event.commandId, ok: event.ok })
    this.interactions.get(event.interactionId)?.onActionDone(event.commandId)
  }

  private assertInvariants(): void {
    const conversing = Array.from(this.interactions.values()).filter(i => i.state === 'conversing')
    if (conversing.length > 1) {
      throw this.fail(new InvariantViolationError(`${conversing.length} interactions are conversing at once`))
    }

    const { personId } = this.arbiter.getDecision()
    if (personId !== null) {
      const person = this.tracker.get(personId)
      if (!person || person.liveness === 'lost') {
        throw this.fail(new InvariantViolationError(`focus references person #${personId} that is no longer tracked`))
      }
    }

    if (conversing.length === 1 && conversing[0].personId !== personId) {
      throw this.fail(new InvariantViolationError(`person #${conversing[0].personId} is conversing without focus`))
    }
  }

  private fail(err: Error): Error {
    this.fatal = err
    console.error(`[Orchestrator] FATAL: ${err.message}`)
    return err
  }

  private emit(type: OrchestratorEventType, at: number, payload: Record<string, unknown>): void {
    const listeners = this.listeners.get(type)
    if (!listeners) return

    const event: OrchestratorEvent = { type, at, payload }
    for (const listener of listeners) {
      try {
        listener(event)
      } catch (err) {
        console.error(`[Orchestrator] Error in listener for ${type}:`, err)
      }
    }
  }
}
