export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Polls `predicate` until it returns true or `timeoutMs` elapses.
 * The predicate always runs at least once, so a zero timeout is a single probe.
 */
export async function waitUntil(
  predicate: () => Promise<boolean>,
  timeoutMs: number,
  pollIntervalMs: number
): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  for (;;) {
    if (await predicate()) return true;
    const remaining = deadline - Date.now();
    if (remaining <= 0) return false;
    await sleep(Math.min(pollIntervalMs, remaining));
  }
}

/**
 * Polls `probe` until it yields a non-null value or `timeoutMs` elapses.
 */
export async function pollFor<T>(
  probe: () => Promise<T | null>,
  timeoutMs: number,
  pollIntervalMs: number
): Promise<T | null> {
  let value: T | null = null;
  await waitUntil(
    async () => {
      value = await probe();
      return value !== null;
    },
    timeoutMs,
    pollIntervalMs
  );
  return value;
}
