export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  /** Multiplies each delay by a random factor in [0.7, 1.3). */
  jitter?: boolean;
};

export type RetryInput<T> = {
  label: string;
  policy: RetryPolicy;
  isRetriable: (error: unknown) => boolean;
  op: (attempt: number) => Promise<T>;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
};

export function clampNumber(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const maxDelayMs = policy.maxDelayMs ?? 10_000;
  const factor = policy.jitter === false ? 1 : 0.7 + random() * 0.6;
  return clampNumber(Math.round(policy.baseDelayMs * Math.pow(2, attempt - 1) * factor), 0, maxDelayMs);
}

export async function withRetry<T>(input: RetryInput<T>): Promise<T> {
  const maxAttempts = clampNumber(Math.floor(Number(input.policy.maxAttempts || 1)), 1, 10);
  const wait = input.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await input.op(attempt);
    } catch (error) {
      lastError = error;
      if (attempt >= maxAttempts || !input.isRetriable(error)) {
        throw error;
      }
      const delayMs = backoffDelay(input.policy, attempt, input.random);
      input.onRetry?.({ attempt, delayMs, error });
      await wait(delayMs);
    }
  }

  throw lastError instanceof Error ? lastError : new Error(`${input.label} failed.`);
}

export class TimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${Math.round(timeoutMs / 1000)}s.`);
    this.name = "TimeoutError";
  }
}

export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  try {
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
    });
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
  }
}
