export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)))
};

export type Random = () => number;

// uniform pick inside [min, max]
export function uniform(random: Random, [min, max]: [number, number]): number {
  return min + (max - min) * random();
}
