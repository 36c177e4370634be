export const LOG_PREFIX = "[tidy-paste]";

// Debug toggle (controlled via env or global flag to keep consoles quiet by default)
export function isDebugEnabled(): boolean {
  try {
    if (typeof process !== "undefined" && process.env) {
      if (process.env.TIDY_PASTE_DEBUG === "1") return true;
    }
  } catch {
    // ignore env read errors
  }
  const g = globalThis as { __TIDY_PASTE_DEBUG__?: boolean };
  return g.__TIDY_PASTE_DEBUG__ === true;
}

export function debugLog(stage: string, details: Record<string, unknown>): void {
  if (!isDebugEnabled()) return;
  console.debug(`${LOG_PREFIX} ${stage}`, details);
}

export function warnLog(message: string, error?: unknown): void {
  console.warn(`${LOG_PREFIX} ${message}`, error);
}
