/**
 * Interaction Orchestrator Tests
 *
 * Consumer-turn behaviour with scripted collaborators: greeting and
 * conversation, focus hand-over, drops, status and lifecycle.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import type { OrchestratorEvent } from '@/lib/orchestrator/types'
import { flushPromises, reply } from '../test-utils/collaborator-mocks'
import { createHarness } from '../test-utils/harness'

describe('InteractionOrchestrator', () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe('engagement', () => {
    it('greets a new focus person and carries the conversation', async () => {
      const h = createHarness()

      h.see(0, 100, 100)
      await h.settle()

      expect(h.orchestrator.getFocus()).toEqual({ personId: 1, seq: 1, decidedAt: 0 })
      expect(h.orchestrator.getInteractionFor(1)?.state).toBe('greeting')
      expect(h.actuator.commands.map(c => c.action.type)).toEqual(['gaze', 'gesture'])
      expect(h.dialogue.calls[0].request).toMatchObject({ control: 'start', context: { personId: 1, turn: 0 } })

      h.dialogue.calls[0].resolve(reply('Hi! How can I help?', { gesture: 'explain' }))
      await h.settle()

      expect(h.orchestrator.getInteractionFor(1)?.state).toBe('conversing')
      expect(h.actuator.spoken()).toEqual(['Hi! How can I help?'])
      expect(h.actuator.gestures()).toEqual(['greet', 'explain'])

      h.hear(500, 'where is the cafe')
      await h.settle()

      expect(h.dialogue.calls[1].request).toMatchObject({
        utterance: 'where is the cafe',
        context: { personId: 1, turn: 1 },
      })
    })

    it('skips the greeting call when the engine has no greeting step', async () => {
      const h = createHarness({}, { supportsGreeting: false })

      h.see(0, 100, 100)
      await h.settle()

      expect(h.orchestrator.getInteractionFor(1)?.state).toBe('conversing')
      expect(h.dialogue.respond).not.toHaveBeenCalled()
    })

    it('ignores speech from a person who is not in focus', async () => {
      const h = createHarness()
      h.see(0, 100, 100)
      h.see(10, 400, 100)
      await h.settle()
      h.dialogue.calls[0].resolve(reply('Hello!'))
      await h.settle()

      // 400px in a 640px frame with a 57.2 degree field of view
      h.hear(100, 'excuse me', 7.15)
      await h.settle()

      expect(h.dialogue.calls).toHaveLength(1)
      expect(h.orchestrator.listPersons().find(p => p.id === 2)?.lastTranscript).toBe('excuse me')
    })

    it('closes the dialogue session when the chatbot ends it', async () => {
      const h = createHarness()
      h.see(0, 100, 100)
      await h.settle()
      h.dialogue.calls[0].resolve(reply('Hello!'))
      await h.settle()
      const sessionId = h.dialogue.calls[0].request.sessionId

      h.hear(200, 'goodbye')
      await h.settle()
      h.dialogue.calls[1].resolve(reply('Bye, enjoy your day!', { endOfSession: true }))
      await h.settle()

      expect(h.actuator.spoken()).toEqual(['Hello!', 'Bye, enjoy your day!'])
      expect(h.statesOf(1)).toEqual(['greeting', 'conversing', 'farewell', 'ended'])
      expect(h.orchestrator.listInteractions()).toEqual([])
      expect(h.dialogue.closedSessions).toEqual([sessionId])

      // Still in focus: no second greeting until the person is re-selected
      h.see(300, 100, 100)
      await h.settle()
      expect(h.orchestrator.listInteractions()).toEqual([])
    })
  })

  describe('focus hand-over', () => {
    it('moves on from a stale focus after the hold time and says goodbye', async () => {
      const h = createHarness()
      h.see(0, 100, 100)
      h.see(100, 400, 100)
      await h.settle()
      expect(h.orchestrator.getInteractionFor(2)?.state).toBe('idle')

      for (const t of [1000, 2000, 3000]) {
        h.see(t, 400, 100)
        h.tick(t)
        await h.settle()
      }
      expect(h.orchestrator.getFocus().personId).toBe(1)

      h.see(4000, 400, 100)
      await h.settle()

      expect(h.orchestrator.getFocus()).toEqual({ personId: 2, seq: 2, decidedAt: 4000 })
      expect(h.statesOf(1)).toEqual(['greeting', 'farewell', 'ended'])
      expect(h.orchestrator.getInteractionFor(2)?.state).toBe('greeting')
      expect(h.dialogue.calls[0].signal.aborted).toBe(true)
      expect(h.actuator.spoken()).toEqual(['Goodbye!'])
      expect(h.orchestrator.getStatus().collaborators).toMatchObject({ dialogueFailures: 0, discardedCompletions: 1 })
    })
  })

  describe('dispatch order', () => {
    it('keeps the focus person first while they say goodbye', async () => {
      const h = createHarness()
      h.actuator.holding = true

      h.see(0, 100, 100)
      await h.settle()
      h.dialogue.calls[0].resolve(reply('Hello!'))
      await h.settle()
      h.see(100, 400, 100)
      await h.settle()
      for (const t of [1000, 2000, 3000]) {
        h.see(t, 400, 100)
        h.tick(t)
        await h.settle()
      }
      h.see(4000, 400, 100)
      await h.settle()
      expect(h.orchestrator.getFocus().personId).toBe(2)

      h.dialogue.calls[1].resolve(reply('See you!', { endOfSession: true }))
      await h.settle()

      expect(h.orchestrator.getInteractionFor(2)).toBeUndefined()
      const queuedSpeech = h.orchestrator.pendingActions()
        .flatMap(c => c.action.type === 'speak' ? [c.action.text] : [])
      expect(queuedSpeech).toEqual(['See you!', 'Goodbye!'])

      h.actuator.held.splice(0).forEach(release => release())
      await h.settle()

      expect(h.actuator.spoken()).toEqual(['Hello!', 'See you!'])
    })
  })

  describe('degradation', () => {
    it('counts actuation failures and keeps going', async () => {
      const h = createHarness()
      h.actuator.failing = true

      h.see(0, 100, 100)
      await h.settle()

      expect(h.orchestrator.getInteractionFor(1)?.state).toBe('greeting')
      expect(h.orchestrator.getStatus().collaborators.actuationFailures).toBe(2)
      expect(h.orchestrator.getStatus().dispatcher).toMatchObject({ sent: 2, failed: 2, inFlight: 0 })
    })

    it('tracks nobody while the camera is disabled', async () => {
      const h = createHarness({ camera: { enabled: false, frameWidth: 640, horizontalFovDeg: 57.2 } })

      expect(h.see(0, 100, 100)).toEqual({ accepted: false, reason: 'disabled' })
      await h.settle()

      expect(h.orchestrator.listPersons()).toEqual([])
      expect(h.orchestrator.getStatus().perception.disabled).toBe(1)
    })

    it('drops perception beyond the channel capacity but never ticks', () => {
      const h = createHarness({ channelCapacity: 2 })

      h.see(0, 100, 100)
      h.see(0, 300, 100)
      expect(h.see(0, 500, 100)).toEqual({ accepted: false, reason: 'overflow' })
      h.tick(10)

      expect(h.orchestrator.getStatus().queuedEvents).toBe(3)
      expect(h.orchestrator.drain()).toBe(3)
    })
  })

  describe('status and listeners', () => {
    it('reports a snapshot of the whole pipeline', async () => {
      const h = createHarness()
      h.see(0, 100, 100)
      await h.settle()

      const status = h.orchestrator.getStatus()

      expect(status).toMatchObject({
        running: false,
        focus: { personId: 1, seq: 1 },
        perception: { accepted: 1, malformed: 0 },
        dispatcher: { sent: 2, completed: 2, queued: 0 },
        collaborators: { dialogue: 'scripted', actuator: 'recording' },
        queuedEvents: 0,
        fatal: null,
      })
      expect(status.persons).toHaveLength(1)
      expect(status.interactions.map(i => i.state)).toEqual(['greeting'])
    })

    it('notifies listeners and survives a throwing one', async () => {
      const h = createHarness()
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
      const seen: OrchestratorEvent[] = []
      const removed = vi.fn()
      h.orchestrator.on('focus:change', () => {
        throw new Error('listener bug')
      })
      h.orchestrator.on('focus:change', event => seen.push(event))
      h.orchestrator.on('person:created', removed)
      h.orchestrator.off('person:created', removed)

      h.see(0, 100, 100)
      await h.settle()

      expect(seen).toEqual([{ type: 'focus:change', at: 0, payload: { from: null, to: 1, seq: 1 } }])
      expect(removed).not.toHaveBeenCalled()
      expect(errorSpy).toHaveBeenCalled()
    })
  })

  describe('lifecycle', () => {
    it('runs the consumer loop until stopped', async () => {
      const h = createHarness()

      const run = h.orchestrator.start()
      expect(h.orchestrator.getStatus().running).toBe(true)
      expect(() => h.orchestrator.drain()).toThrow('drain() cannot be used while the consumer loop is running')

      h.see(0, 100, 100)
      await flushPromises()
      expect(h.orchestrator.listPersons()).toHaveLength(1)

      await h.orchestrator.stop()

      await expect(run).resolves.toBeUndefined()
      expect(h.orchestrator.getStatus().running).toBe(false)
      expect(h.dialogue.calls[0].signal.aborted).toBe(true)
    })

    it('ticks on its own while running', async () => {
      const h = createHarness({ tickIntervalMs: 250 })
      const run = h.orchestrator.start()
      h.see(0, 100, 100)
      await flushPromises()

      h.clock.set(2500)
      await vi.advanceTimersByTimeAsync(250)
      await flushPromises()

      expect(h.orchestrator.listPersons()[0]?.liveness).toBe('stale')
      await h.orchestrator.stop()
      await run
    })
  })
})
