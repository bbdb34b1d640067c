import { ExternalFunctionError, errorMessage } from '../pipeline/errors.js';

/**
 * Run an engine call under a deadline. The signal handed to `fn` is aborted
 * when the deadline passes, and the call settles with a timed-out
 * ExternalFunctionError whether or not `fn` honours the signal.
 *
 * Any other failure is wrapped in ExternalFunctionError as well.
 */
export async function runExternal<T>(
  label: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Settle first so a call that rejects on abort still reports the timeout
      reject(new ExternalFunctionError(`${label} timed out after ${timeoutMs}ms`, { timedOut: true }));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } catch (error) {
    if (error instanceof ExternalFunctionError) {
      throw error;
    }
    throw new ExternalFunctionError(`${label} failed: ${errorMessage(error)}`, { cause: error });
  } finally {
    clearTimeout(timer);
  }
}
