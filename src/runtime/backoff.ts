import type { RetryPolicyConfig } from "../config/configManager.js";

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export function computeDelay(attempt: number, retry: RetryPolicyConfig, random: () => number = Math.random): number {
  const exponentialDelay = retry.initialDelayMs * Math.pow(retry.backoffMultiplier, attempt - 1);
  const boundedDelay = Math.min(exponentialDelay, retry.maxDelayMs);
  const jitter = boundedDelay * 0.2 * random();
  return Math.round(boundedDelay + jitter);
}

export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/** Rejects with {@link TimeoutError} when `task` has not settled in time; the timer never outlives the race. */
export async function withTimeout<T>(task: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([task, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
