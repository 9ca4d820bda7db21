import type { ActionCommand, Actuator, RobotAction } from '@/types/action'

export function describeAction(action: RobotAction): string {
  switch (action.type) {
    case 'speak':
      return `say "${action.text}"`
    case 'gesture':
      return `animate ${action.name}`
    case 'gaze':
      return `look at #${action.target.personId} (${action.target.azimuthDeg.toFixed(1)}°)`
  }
}

/** Stands in for the robot when it is disabled: every command succeeds at once. */
export class LoggingActuator implements Actuator {
  readonly name = 'log'

  async execute(command: ActionCommand): Promise<void> {
    console.log(`[Robot:disabled] ${describeAction(command.action)} for #${command.personId} (${command.id})`)
  }
}
