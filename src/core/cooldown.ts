import { env } from "./config";
import { sleep } from "./retry";

export function jitteredDelayMs(baseMs: number, jitterRatio = 0.3): number {
  const jitter = Math.random() * baseMs * jitterRatio;
  return baseMs + jitter;
}

export async function settle(baseMs: number): Promise<void> {
  if (baseMs <= 0) return;
  await sleep(jitteredDelayMs(baseMs));
}

export async function actionDelay(): Promise<void> {
  const min = env.SCRAPER_ACTION_DELAY_MIN_MS;
  const max = env.SCRAPER_ACTION_DELAY_MAX_MS;
  const delay = min + Math.random() * (max - min);

  await sleep(delay);
}
