/**
 * Collaborator call timeouts
 */

import { CollaboratorUnavailableError } from '../errors.js';

/**
 * Run a collaborator call with an abort signal that fires after
 * `timeoutMs`. Any failure, including the timeout, surfaces as
 * CollaboratorUnavailableError.
 */
export async function withTimeout<T>(
  collaborator: string,
  timeoutMs: number,
  call: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new CollaboratorUnavailableError(collaborator, `timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([call(controller.signal), timeout]);
  } catch (err) {
    if (err instanceof CollaboratorUnavailableError) throw err;
    const cause = err instanceof Error ? err : new Error(String(err));
    throw new CollaboratorUnavailableError(collaborator, cause.message, cause);
  } finally {
    clearTimeout(timer);
  }
}
