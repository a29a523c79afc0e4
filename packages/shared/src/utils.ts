export const CURRENCY_CODE = /^[A-Z]{3}$/
export const EUR = "EUR"

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/

export function isCurrencyCode(value: unknown): value is string {
  return typeof value === "string" && CURRENCY_CODE.test(value)
}

// YYYY-MM-DD that names a real calendar day (2024-02-30 is rejected)
export function isIsoDate(value: unknown): value is string {
  if (typeof value !== "string") return false
  const m = ISO_DATE.exec(value)
  if (!m) return false
  const [y, mo, d] = [Number(m[1]), Number(m[2]), Number(m[3])]
  const date = new Date(Date.UTC(y, mo - 1, d))
  return date.getUTCFullYear() === y && date.getUTCMonth() === mo - 1 && date.getUTCDate() === d
}

function statusOf(err: unknown): number | undefined {
  if (!err || typeof err !== "object") return undefined
  if ("status" in err && typeof err.status === "number") return err.status
  if ("response" in err && err.response && typeof err.response === "object"
    && "status" in err.response && typeof err.response.status === "number") {
    return err.response.status
  }
  return undefined
}

function messageOf(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}

// network failures, timeouts and 5xx answers are worth another try; 4xx never
export function isTransientError(err: unknown): boolean {
  const status = statusOf(err)
  if (status !== undefined) return status >= 500 || status === 429
  const code = err && typeof err === "object" && "code" in err ? String(err.code) : ""
  if (/^(ECONNRESET|ECONNREFUSED|ECONNABORTED|ETIMEDOUT|EAI_AGAIN|ENOTFOUND|ERR_NETWORK)$/.test(code)) return true
  return /timeout|timed out|network error|socket hang up|fetch failed/i.test(messageOf(err))
}

export type RetryOptions = {
  retries?: number
  baseMs?: number
  isRetryable?: (err: unknown) => boolean
  onRetry?: (err: unknown, attempt: number) => void
}

export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions = {}): Promise<T> {
  const { retries = 2, baseMs = 400, isRetryable = isTransientError, onRetry } = opts
  let lastErr: unknown
  for (let i = 0; i <= retries; i++) {
    try {
      return await fn()
    } catch (err) {
      lastErr = err
      if (!isRetryable(err) || i === retries) break
      onRetry?.(err, i + 1)
      await new Promise(r => setTimeout(r, baseMs * Math.pow(2, i)))
    }
  }
  throw lastErr
}

export function errorMessage(err: unknown): string {
  return messageOf(err)
}
