/**
 * Perception server
 *
 *   WS  /detections  detector processes push detection records
 *   WS  /speech      the speech recognizer pushes transcripts
 *   WS  /status      observers receive focus and interaction updates
 *   GET /status      orchestrator status snapshot
 */

import http from 'http'
import { WebSocketServer, type WebSocket } from 'ws'
import { createActuator } from '@/lib/actuation'
import { loadConfig } from '@/lib/config'
import { createDialogueEngine } from '@/lib/dialogue'
import { InteractionOrchestrator } from '@/lib/orchestrator'
import type { OrchestratorEventType } from '@/lib/orchestrator/types'
import { rawDataToString } from '@/lib/ws-utils'
import { getOrchestratorStatus, submitDetections, submitSpeech, type ServiceResult, type SubmitSummary } from '@/services/perception-service'
import { broadcastStatusUpdate, setOrchestrator, statusSubscribers } from '@/services/shared-state'

const PRODUCER_ROUTES: Record<string, ((raw: string) => ServiceResult<SubmitSummary>) | undefined> = {
  '/detections': submitDetections,
  '/speech': submitSpeech,
}

const BROADCAST_EVENTS: OrchestratorEventType[] = [
  'person:created',
  'person:lost',
  'focus:change',
  'interaction:transition',
]

function handleProducer(ws: WebSocket, route: string, submit: (raw: string) => ServiceResult<SubmitSummary>): void {
  console.log(`[Server] Producer connected on ${route}`)
  ws.on('message', data => {
    const result = submit(rawDataToString(data))
    if (result.error) {
      ws.send(JSON.stringify({ type: 'error', message: result.error, status: result.status }))
    }
  })
  ws.on('close', () => console.log(`[Server] Producer disconnected from ${route}`))
}

function handleStatusObserver(ws: WebSocket): void {
  statusSubscribers.add(ws)
  const snapshot = getOrchestratorStatus()
  if (snapshot.data) {
    ws.send(JSON.stringify({ type: 'status', status: snapshot.data }))
  }
  ws.on('close', () => statusSubscribers.delete(ws))
}

async function main(): Promise<void> {
  const config = loadConfig()

  const orchestrator = new InteractionOrchestrator({
    config,
    dialogue: createDialogueEngine(config),
    actuator: createActuator(config),
  })
  setOrchestrator(orchestrator)
  for (const type of BROADCAST_EVENTS) {
    orchestrator.on(type, broadcastStatusUpdate)
  }

  const server = http.createServer((req, res) => {
    const { pathname } = new URL(req.url ?? '/', 'http://localhost')
    if (req.method === 'GET' && pathname === '/status') {
      const result = getOrchestratorStatus()
      res.writeHead(result.status, { 'Content-Type': 'application/json' })
      res.end(JSON.stringify(result.data ?? { error: result.error }))
      return
    }
    res.writeHead(404, { 'Content-Type': 'application/json' })
    res.end(JSON.stringify({ error: 'Not found' }))
  })

  const wss = new WebSocketServer({ noServer: true })

  server.on('upgrade', (req, socket, head) => {
    const { pathname } = new URL(req.url ?? '/', 'http://localhost')
    const submit = PRODUCER_ROUTES[pathname]
    if (!submit && pathname !== '/status') {
      socket.destroy()
      return
    }
    wss.handleUpgrade(req, socket, head, ws => {
      if (submit) handleProducer(ws, pathname, submit)
      else handleStatusObserver(ws)
    })
  })

  let shuttingDown = false
  const shutdown = async (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    console.log(`[Server] ${signal} received, shutting down`)
    for (const client of wss.clients) client.close(1001)
    wss.close()
    server.close()
    await orchestrator.stop()
    setOrchestrator(null)
    process.exit(0)
  }
  const onSignal = (signal: string) => {
    shutdown(signal).catch(error => {
      console.error('[Server] Shutdown failed:', error)
      process.exit(1)
    })
  }
  process.on('SIGINT', () => onSignal('SIGINT'))
  process.on('SIGTERM', () => onSignal('SIGTERM'))

  server.listen(config.server.port, () => {
    console.log(`[Server] Listening on port ${config.server.port}`)
  })

  try {
    await orchestrator.start()
  } catch (error) {
    console.error('[Server] Orchestrator stopped on a fatal error:', error)
    process.exit(1)
  }
}

main().catch(error => {
  console.error('[Server] Failed to start:', error instanceof Error ? error.message : error)
  process.exit(1)
})
