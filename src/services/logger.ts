// =============================================================================
// Logging
// =============================================================================
// Tagged console output: "[Tag][2025-01-01T12:00:00.000Z] message"

export type Logger = {
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, error?: unknown): void;
};

export type LoggerOptions = {
  /** When false, nothing is written */
  enabled?: boolean;
};

const getTimestamp = () => new Date().toISOString();

export function createLogger(tag: string, options: LoggerOptions = {}): Logger {
  const enabled = options.enabled ?? true;
  const prefix = () => `[${tag}][${getTimestamp()}]`;

  return {
    info(message, data) {
      if (!enabled) return;
      console.log(`${prefix()} ${message}`, data ?? "");
    },
    warn(message, data) {
      if (!enabled) return;
      console.warn(`${prefix()} ${message}`, data ?? "");
    },
    error(message, error) {
      if (!enabled) return;
      console.error(`${prefix()} ${message}`, error ?? "");
    },
  };
}

/**
 * Shorten a response body for log output
 */
export const previewBody = (data: unknown): string => {
  const text = typeof data === "string" ? data : JSON.stringify(data);
  return (text ?? "").slice(0, 500);
};
