// =============================================================================
// withTimeout — Bound a promise by a deadline
// =============================================================================

/**
 * Settles with `operation`, or rejects with `onTimeout()` once `ms` elapses.
 * The timer is always cleared so nothing keeps the event loop alive.
 */
export async function withTimeout<T>(operation: Promise<T> | T, ms: number, onTimeout: () => Error): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });

  try {
    return await Promise.race([Promise.resolve(operation), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
