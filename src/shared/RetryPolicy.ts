export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface AttemptPolicy<T> {
  maxAttempts: number;
  /** 每次嘗試前（含第一次）的等待時間，attempt 從 0 起算 */
  delayBefore?: (attempt: number) => number;
  /** 結果驗收；不通過視為用掉一次嘗試，不另加冷卻 */
  accept?: (value: T) => boolean;
  /**
   * 失敗後的冷卻時間
   * @returns null 表示立即放棄，不再嘗試
   */
  cooldownAfter: (attempt: number, err: unknown) => number | null;
  onFailure?: (attempt: number, err: unknown, cooldownMs: number | null) => void;
  onRejected?: (attempt: number, value: T) => void;
  sleep?: Sleep;
}

export type AttemptResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; attempts: number; lastError: unknown; rejected: boolean };

/**
 * 有上限的嘗試迴圈
 * 總嘗試次數恆 ≤ maxAttempts，因此必定終止
 */
export async function runAttempts<T>(
  operation: (attempt: number) => Promise<T>,
  policy: AttemptPolicy<T>,
): Promise<AttemptResult<T>> {
  const wait = policy.sleep ?? sleep;
  let lastError: unknown = undefined;
  let rejected = false;
  let attempts = 0;

  for (let attempt = 0; attempt < policy.maxAttempts; attempt++) {
    const delay = policy.delayBefore?.(attempt) ?? 0;
    if (delay > 0) await wait(delay);

    attempts = attempt + 1;
    try {
      const value = await operation(attempt);
      if (!policy.accept || policy.accept(value)) {
        return { ok: true, value, attempts };
      }
      rejected = true;
      policy.onRejected?.(attempt, value);
    } catch (err) {
      lastError = err;
      rejected = false;
      const cooldown = policy.cooldownAfter(attempt, err);
      policy.onFailure?.(attempt, err, cooldown);
      if (cooldown === null) break;
      if (cooldown > 0) await wait(cooldown);
    }
  }

  return { ok: false, attempts, lastError, rejected };
}
