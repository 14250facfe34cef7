import type { Logger } from "pino";

/**
 * Runs `work` and logs how long it took, whether it succeeded or threw.
 * `onMeasured` receives the wall-clock duration in milliseconds in both cases.
 */
export async function timed<T>(
  label: string,
  logger: Logger,
  work: () => Promise<T> | T,
  onMeasured?: (durationMs: number) => void
): Promise<T> {
  const startedAt = performance.now();
  let succeeded = false;
  try {
    const result = await work();
    succeeded = true;
    return result;
  } finally {
    const durationMs = Math.round((performance.now() - startedAt) * 100) / 100;
    onMeasured?.(durationMs);
    logger.info({ stage: label, durationMs, succeeded }, `${label} ${succeeded ? "took" : "failed after"} ${durationMs}ms`);
  }
}
