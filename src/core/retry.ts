import { setTimeout as sleep } from 'node:timers/promises'

import { ConvergeError } from './errors.js'

export interface RetryPolicy {
  maxAttempts: number
  baseDelayMs: number
  backoffFactor: number
  maxDelayMs: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 2000,
  backoffFactor: 2,
  maxDelayMs: 30_000,
}

/**
 * Delay before the retry that follows attempt `attempt` (0-indexed).
 */
export function delayForAttempt(policy: RetryPolicy, attempt: number): number {
  const delay = policy.baseDelayMs * Math.pow(policy.backoffFactor, attempt)
  return Math.min(delay, policy.maxDelayMs)
}

export type RetryListener = (attempt: number, maxAttempts: number, error: ConvergeError, delayMs: number) => void

/**
 * Re-run `op` while it rejects with a retryable ConvergeError. Anything else propagates at once.
 */
export async function withRetry<T>(policy: RetryPolicy, op: () => Promise<T>, onRetry?: RetryListener): Promise<T> {
  const attempts = Math.max(1, policy.maxAttempts)
  for (let attempt = 0; ; attempt++) {
    try {
      return await op()
    } catch (e) {
      if (!(e instanceof ConvergeError) || !e.retryable || attempt + 1 >= attempts) throw e
      const delayMs = delayForAttempt(policy, attempt)
      onRetry?.(attempt + 1, attempts, e, delayMs)
      if (delayMs > 0) await sleep(delayMs)
    }
  }
}
