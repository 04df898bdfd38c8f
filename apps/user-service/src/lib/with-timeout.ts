import type { Milliseconds } from "@usercache/clock"
import { BaseError } from "@usercache/errors"

export class OperationTimeoutError extends BaseError<"operation_timeout"> {
  constructor(operation: string, timeoutMs: Milliseconds) {
    super(`${operation} timed out after ${timeoutMs}ms`, {
      code: "operation_timeout",
      context: { operation, timeoutMs },
      isRetryable: true,
    })
  }
}

/**
 * Races `fn` against a timer. The losing call is not cancelled; its result is
 * dropped.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: Milliseconds,
  fn: () => Promise<T>,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined

  const timedOut = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(
      () => reject(new OperationTimeoutError(operation, timeoutMs)),
      timeoutMs,
    )
  })

  try {
    return await Promise.race([fn(), timedOut])
  } finally {
    clearTimeout(timer)
  }
}
