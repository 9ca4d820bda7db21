import { DeadlineExceededError } from './errors'

/**
 * Run an async collaborator call with a hard deadline.
 *
 * The call receives an AbortSignal that fires on expiry or when `parent`
 * aborts. The returned promise settles no later than the deadline, whether
 * or not the call honours the signal.
 */
export async function withDeadline<T>(
  label: string,
  deadlineMs: number,
  run: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal,
): Promise<T> {
  if (parent?.aborted) {
    throw parent.reason ?? new Error(`${label} aborted`)
  }

  const controller = new AbortController()
  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true })
  })

  const onParentAbort = () => controller.abort(parent?.reason ?? new Error(`${label} aborted`))
  parent?.addEventListener('abort', onParentAbort, { once: true })

  const timer = setTimeout(() => controller.abort(new DeadlineExceededError(label, deadlineMs)), deadlineMs)

  try {
    return await Promise.race([run(controller.signal), aborted])
  } finally {
    clearTimeout(timer)
    parent?.removeEventListener('abort', onParentAbort)
  }
}
