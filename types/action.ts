// Robot action commands consumed by the Action Dispatcher

/**
 * Animation names understood by the robot bridge. Other names are passed
 * through untouched, so custom animations still work.
 */
export const ROBOT_ANIMATIONS = ['calm', 'explain', 'greet', 'happy', 'showing_tablet', 'thinking'] as const
export type RobotAnimation = typeof ROBOT_ANIMATIONS[number]

export type GazeTarget = {
  personId: number
  azimuthDeg: number
}

export type RobotAction =
  | { type: 'speak'; text: string }
  | { type: 'gesture'; name: string }
  | { type: 'gaze'; target: GazeTarget }

export type RobotActionType = RobotAction['type']

export type ActuatorChannel = 'voice' | 'body' | 'head'

export const ACTION_CHANNELS: Record<RobotActionType, ActuatorChannel> = {
  speak: 'voice',
  gesture: 'body',
  gaze: 'head',
}

export const ActionPriority = {
  low: 0,
  normal: 1,
  high: 2,
} as const

export type ActionPriorityLevel = typeof ActionPriority[keyof typeof ActionPriority]

export interface ActionCommand {
  id: string
  interactionId: string
  personId: number
  priority: ActionPriorityLevel
  seq: number         // emission order across all interactions
  emittedAt: number
  action: RobotAction
}

export interface Actuator {
  readonly name: string
  execute(command: ActionCommand, signal: AbortSignal): Promise<void>
  close?(): Promise<void>
}
