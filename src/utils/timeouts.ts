/**
 * Central Timeout Configuration
 *
 * Defaults for the config schemas and the providers, plus the helpers that
 * bound a single async step.
 */

/**
 * Default timeout values in milliseconds
 */
export const TIMEOUTS = {
  /** Page navigation (Playwright goto, static fetch) */
  NAVIGATION: 45000,

  /** Default for element operations (click, fill, evaluate) */
  ELEMENT_ACTION: 12000,

  /** One resolution strategy attempt */
  STRATEGY_ATTEMPT: 1500,

  /** Waiting for a free tab in the page pool */
  POOL_ACQUIRE: 30000,

  /** Whole task */
  TASK: 120000,

  /** Settle delay after navigation */
  POST_NAVIGATION: 250,

  /** Wait between auto-scroll steps for lazy-loaded content */
  SCROLL_STEP: 300,

  /** Debounce for selector cache persistence */
  CACHE_WRITE_DEBOUNCE: 500,

  /** How long a timed-out task may take to unwind and release its page */
  ABORT_GRACE: 2000,

  /** One file download */
  DOWNLOAD: 120000,
} as const;

/**
 * Raised by withTimeout when the step does not settle in time.
 */
export class StepTimeoutError extends Error {
  constructor(
    public readonly label: string,
    public readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'StepTimeoutError';
  }
}

/**
 * Race a promise against a timer. The timer is always cleared.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new StepTimeoutError(label, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Wait for a promise to settle, either way, for at most `timeoutMs`.
 * Resolves true when it settled in time.
 */
export async function settleWithin(promise: Promise<unknown>, timeoutMs: number): Promise<boolean> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });
  try {
    return await Promise.race([
      promise.then(
        () => true,
        () => true
      ),
      expired,
    ]);
  } finally {
    clearTimeout(timer);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
