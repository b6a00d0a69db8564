/**
 * Runtime settings read from the environment (.env is loaded by the entry points).
 */

function positiveNumber(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/** Length of one countdown/question "second" in ms. Lower it for demos. */
export function getTickIntervalMs(): number {
  return positiveNumber(process.env.QUIZ_TICK_MS, 1000);
}

export function getApiPort(): number {
  return positiveNumber(process.env.API_PORT, 3001);
}
