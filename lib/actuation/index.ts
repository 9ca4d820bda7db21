import { LoggingActuator } from './logging-actuator'
import { WebSocketActuator } from './ws-actuator'
import type { Actuator } from '@/types/action'
import type { OrchestratorConfig } from '@/types/config'

export { LoggingActuator, describeAction } from './logging-actuator'
export { WebSocketActuator, encodeCommand, type BridgeRequest } from './ws-actuator'

export function createActuator(config: OrchestratorConfig): Actuator {
  if (!config.robot.enabled) {
    console.log('[Robot] Robot disabled: actions are logged only')
    return new LoggingActuator()
  }
  const actuator = new WebSocketActuator({ url: config.robot.url })
  actuator.connect()
  return actuator
}
