export type Sleep = (ms: number) => Promise<void>;
export type RandomSource = () => number;

export const wait: Sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Uniform integer in [min, max] drawn from `random`.
 */
export function uniformDelayMs(range: { min: number; max: number }, random: RandomSource): number {
  return Math.round(range.min + (range.max - range.min) * random());
}

/**
 * Jittered exponential backoff: `base^(attempt-1) + random()` seconds, in ms.
 */
export function backoffDelayMs(attempt: number, base: number, random: RandomSource): number {
  return Math.round((Math.pow(base, attempt - 1) + random()) * 1000);
}

/**
 * Pick one element of a non-empty list.
 */
export function pickRandom<T>(items: readonly T[], random: RandomSource): T {
  const index = Math.min(Math.floor(random() * items.length), items.length - 1);
  const item = items[index];
  if (item === undefined) {
    throw new RangeError('pickRandom called with an empty list');
  }
  return item;
}

interface PauseContext {
  sleep: Sleep;
  random: RandomSource;
  config: { politenessDelayMs: { min: number; max: number } };
}

/**
 * The pause between two units of work. Returns the delay slept, in ms.
 */
export async function politePause(context: PauseContext): Promise<number> {
  const delay = uniformDelayMs(context.config.politenessDelayMs, context.random);
  await context.sleep(delay);
  return delay;
}
