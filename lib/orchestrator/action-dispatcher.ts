/**
 * Action Dispatcher - single ordered stream of robot commands
 *
 * Order: engaged interaction first, then priority, then emission order.
 * Each actuator channel (voice, body, head) carries one command at a time;
 * the rest wait in the queue. Failed actuation is reported, never retried.
 */

import {
  ACTION_CHANNELS,
  type ActionCommand,
  type ActionPriorityLevel,
  type ActuatorChannel,
  type RobotAction,
} from '@/types/action'

export interface DispatcherStats {
  queued: number
  inFlight: number
  sent: number
  completed: number
  failed: number
  superseded: number
  cancelled: number
}

export interface EnqueueParams {
  interactionId: string
  personId: number
  action: RobotAction
  priority: ActionPriorityLevel
  emittedAt: number
}

export function compareCommands(a: ActionCommand, b: ActionCommand, engagedInteractionId: string | null): number {
  const aEngaged = a.interactionId === engagedInteractionId ? 0 : 1
  const bEngaged = b.interactionId === engagedInteractionId ? 0 : 1
  if (aEngaged !== bEngaged) return aEngaged - bEngaged
  if (a.priority !== b.priority) return b.priority - a.priority
  return a.seq - b.seq
}

export class ActionDispatcher {
  private send: (command: ActionCommand) => void
  private queue: ActionCommand[] = []
  private inFlight = new Map<ActuatorChannel, ActionCommand>()
  private nextSeq = 1
  private stats = { sent: 0, completed: 0, failed: 0, superseded: 0, cancelled: 0 }

  constructor(send: (command: ActionCommand) => void) {
    this.send = send
  }

  enqueue(params: EnqueueParams): ActionCommand {
    const seq = this.nextSeq++
    const command: ActionCommand = {
      id: `cmd-${seq}`,
      interactionId: params.interactionId,
      personId: params.personId,
      priority: params.priority,
      seq,
      emittedAt: params.emittedAt,
      action: params.action,
    }

    // Only the latest gaze target matters
    if (command.action.type === 'gaze') {
      this.stats.superseded += this.removeWhere(queued => queued.action.type === 'gaze')
    }

    this.queue.push(command)
    return command
  }

  /** Drop queued (not in-flight) speech of one interaction. */
  supersede(interactionId: string): number {
    const dropped = this.removeWhere(c => c.interactionId === interactionId && c.action.type === 'speak')
    this.stats.superseded += dropped
    return dropped
  }

  /** Drop everything queued for one interaction. */
  cancel(interactionId: string): number {
    const dropped = this.removeWhere(c => c.interactionId === interactionId)
    this.stats.cancelled += dropped
    return dropped
  }

  flush(engagedInteractionId: string | null): ActionCommand[] {
    const ordered = [...this.queue].sort((a, b) => compareCommands(a, b, engagedInteractionId))
    const sent: ActionCommand[] = []

    for (const command of ordered) {
      const channel = ACTION_CHANNELS[command.action.type]
      if (this.inFlight.has(channel)) continue
      this.inFlight.set(channel, command)
      sent.push(command)
    }

    if (sent.length === 0) return sent

    const sentIds = new Set(sent.map(c => c.id))
    this.queue = this.queue.filter(c => !sentIds.has(c.id))
    for (const command of sent) {
      this.stats.sent++
      this.send(command)
    }
    return sent
  }

  /** Returns the finished command, or null if it was not in flight. */
  complete(commandId: string, ok: boolean, error?: string): ActionCommand | null {
    for (const [channel, command] of this.inFlight) {
      if (command.id !== commandId) continue
      this.inFlight.delete(channel)
      if (ok) {
        this.stats.completed++
      } else {
        this.stats.failed++
        console.warn(`[Orchestrator:Dispatcher] ${command.action.type} ${command.id} failed: ${error ?? 'unknown error'}`)
      }
      return command
    }
    return null
  }

  isBusy(channel: ActuatorChannel): boolean {
    return this.inFlight.has(channel)
  }

  pending(engagedInteractionId: string | null = null): ActionCommand[] {
    return [...this.queue].sort((a, b) => compareCommands(a, b, engagedInteractionId))
  }

  getStats(): DispatcherStats {
    return {
      queued: this.queue.length,
      inFlight: this.inFlight.size,
      ...this.stats,
    }
  }

  private removeWhere(predicate: (command: ActionCommand) => boolean): number {
    const before = this.queue.length
    this.queue = this.queue.filter(c => !predicate(c))
    return before - this.queue.length
  }
}
