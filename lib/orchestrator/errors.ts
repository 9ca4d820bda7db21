/**
 * Orchestrator error types
 *
 * Collaborator failures (dialogue, actuation, deadlines) are recovered locally.
 * InvariantViolationError is the only error that stops the consumer loop.
 */

export class DeadlineExceededError extends Error {
  readonly label: string
  readonly deadlineMs: number

  constructor(label: string, deadlineMs: number) {
    super(`${label} exceeded its ${deadlineMs}ms deadline`)
    this.name = 'DeadlineExceededError'
    this.label = label
    this.deadlineMs = deadlineMs
  }
}

export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvariantViolationError'
  }
}

export class ConfigError extends Error {
  readonly issues: string[]

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

export class ActuationUnavailableError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ActuationUnavailableError'
  }
}

export class DialogueEngineError extends Error {
  readonly status?: number

  constructor(message: string, status?: number) {
    super(message)
    this.name = 'DialogueEngineError'
    this.status = status
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
