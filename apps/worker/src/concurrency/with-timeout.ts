/**
 * Runs `fn` with an AbortSignal that fires after `timeoutMs`. The returned
 * promise rejects with the timeout error at that moment whether or not `fn`
 * honours the signal; `fn` itself keeps running until it notices.
 */
export async function withTimeout<T>(
  timeoutMs: number,
  timeoutError: () => Error,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = timeoutError();
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
