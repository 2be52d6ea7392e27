/**
 * Structured logging for shiplog
 *
 * Debug lines and warnings are only written when SHIPLOG_DEBUG=1.
 * Errors are always written. Everything goes to stderr so that rendered
 * changelogs on stdout stay clean.
 */

export type LogCategory =
  | 'git'
  | 'github'
  | 'config'
  | 'notes'
  | 'tags'
  | 'lint';

export function isDebugEnabled(): boolean {
  return process.env.SHIPLOG_DEBUG === '1';
}

/**
 * Log a debug message
 * Only outputs when SHIPLOG_DEBUG=1
 *
 * @example
 * ```typescript
 * logDebug('notes', 'Loaded note', { sha, path });
 * ```
 */
export function logDebug(category: LogCategory, message: string, metadata?: Record<string, unknown>): void {
  if (isDebugEnabled()) {
    const timestamp = new Date().toISOString();
    console.error(`[${timestamp}] [DEBUG] [${category}] ${message}`);
    if (metadata) {
      console.error(JSON.stringify(metadata, null, 2));
    }
  }
}

/**
 * Log a warning (non-critical problem)
 * Only outputs when SHIPLOG_DEBUG=1
 */
export function logWarning(category: LogCategory, message: string, error?: Error): void {
  if (isDebugEnabled()) {
    const timestamp = new Date().toISOString();
    console.error(`[${timestamp}] [WARN] [${category}] ${message}`);
    if (error) {
      console.error(`Error: ${error.message}`);
    }
  }
}

/**
 * Log an error (critical failure)
 * Always outputs, even without SHIPLOG_DEBUG
 */
export function logError(category: LogCategory, message: string, error?: Error): void {
  const timestamp = new Date().toISOString();
  console.error(`[${timestamp}] [ERROR] [${category}] ${message}`);
  if (error) {
    console.error(`Error: ${error.message}`);
    if (error.stack && isDebugEnabled()) {
      console.error(error.stack);
    }
  }
}
