import { CancelledError } from '../core/errors';

export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export type RandomSource = () => number;

export const sleep = (ms: number, signal?: AbortSignal): Promise<void> => new Promise((resolve, reject) => {
  if (signal?.aborted) {
    reject(new CancelledError());
    return;
  }
  if (ms <= 0) {
    resolve();
    return;
  }
  const onAbort = (): void => {
    clearTimeout(timer);
    reject(new CancelledError());
  };
  const timer = setTimeout(() => {
    signal?.removeEventListener('abort', onAbort);
    resolve();
  }, ms);
  signal?.addEventListener('abort', onAbort, { once: true });
});

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};

export const randomBetween = (range: readonly [number, number], random: RandomSource = Math.random): number =>
  range[0] + (range[1] - range[0]) * random();

export const randomInt = (range: readonly [number, number], random: RandomSource = Math.random): number =>
  Math.floor(randomBetween([range[0], range[1] + 1], random));
