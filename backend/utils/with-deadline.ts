import { log } from 'backend/utils/log';
import { DeadlineExceededError, errorMessage } from 'backend/services/error-logging/errors';

/**
 * Race a promise against a timer. The underlying work is not cancelled; its
 * result is simply discarded once the deadline passes.
 */
export async function withDeadline<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  let expired = false;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      expired = true;
      reject(new DeadlineExceededError(timeoutMs));
    }, timeoutMs);
  });

  // A failure that lands after the deadline has no caller left to receive it
  work.catch((error: unknown) => {
    if (expired) {
      log(`Discarded failure after deadline: ${errorMessage(error)}`, 'deadline', 'debug');
    }
  });

  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
