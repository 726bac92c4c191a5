/**
 * Structured Logger Service
 *
 * JSON lines on stderr (stdout is reserved for the MCP JSON-RPC protocol).
 * Every line from one generation request or one document ingestion shares a
 * request_id, so `grep req_abc123` shows the whole lifecycle.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  // Correlation
  request_id?: string;
  tenant_id?: string;
  document_id?: string;

  // Progress
  step?: string;
  status?: string;
  attempt?: number;
  chunks?: number;

  // Performance
  duration_ms?: number;

  // Errors
  error?: string;
  error_kind?: string;

  // Extensible
  [key: string]: unknown;
}

type LevelThreshold = LogLevel | 'silent';

const LEVEL_ORDER: Record<LevelThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLevelThreshold(value: string): value is LevelThreshold {
  return Object.keys(LEVEL_ORDER).some(level => level === value);
}

/**
 * LOG_LEVEL is read on every call so tests and the CLI can change it at runtime
 */
function minLevel(): number {
  const configured = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLevelThreshold(configured) ? LEVEL_ORDER[configured] : LEVEL_ORDER.info;
}

/**
 * Log a structured message to stderr
 *
 * Output format:
 * {"ts":"2026-03-02T10:30:45.123Z","level":"info","msg":"Document embedded","request_id":"req_...",...}
 */
export function log(level: LogLevel, message: string, context: LogContext = {}): void {
  if (LEVEL_ORDER[level] < minLevel()) {
    return;
  }
  const entry = {
    ts: new Date().toISOString(),
    level,
    msg: message,
    ...context,
  };
  console.error(JSON.stringify(entry));
}

// Convenience functions
export const logInfo = (msg: string, ctx?: LogContext) => log('info', msg, ctx);
export const logWarn = (msg: string, ctx?: LogContext) => log('warn', msg, ctx);
export const logError = (msg: string, ctx?: LogContext) => log('error', msg, ctx);
export const logDebug = (msg: string, ctx?: LogContext) => log('debug', msg, ctx);

/**
 * Generate a request id for log correlation
 * Format: req_<timestamp>_<random>
 *
 * Example: req_1734345045123_a1b2c3
 */
export function generateRequestId(prefix = 'req'): string {
  return `${prefix}_${Date.now()}_${Math.random().toString(36).substring(2, 8)}`;
}
