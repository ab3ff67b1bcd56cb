export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/** Exponential backoff: `retryDelay` before the second attempt, doubling after each further failure. */
export function backoffDelay(retryDelay: number, attempt: number): number {
  return retryDelay * 2 ** Math.max(0, attempt - 1);
}
