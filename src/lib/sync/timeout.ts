import { TimeoutError } from '../errors'

/**
 * Reject with a TimeoutError when `work` has not settled within `timeoutMs`.
 * The optional controller is aborted on timeout so the request is dropped.
 */
export function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
  label: string,
  controller?: AbortController
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller?.abort()
      reject(new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs))
    }, timeoutMs)

    work.then(
      value => {
        clearTimeout(timer)
        resolve(value)
      },
      (error: unknown) => {
        clearTimeout(timer)
        reject(error)
      }
    )
  })
}
