/**
 * Timestamped, context-labelled progress logger.
 *
 * Line format:
 *   `[2026-10-19T08:30:00.000Z] [INFO ] [CatalogNavigator] Found 12 card link(s)`
 *
 * The threshold defaults to `info`; the orchestrator applies `LOG_LEVEL`
 * through `Logger.setLevel()` once config is loaded.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export class Logger {
  private static threshold: LogLevel = 'info';

  /** Label prepended to every message so you can tell which module is talking. */
  private readonly context: string;

  constructor(context: string) {
    this.context = context;
  }

  static setLevel(level: LogLevel): void {
    Logger.threshold = level;
  }

  // ── Public API ─────────────────────────────────────────

  /** Per-element chatter: header indexes, skipped rows, raw hrefs. */
  debug(message: string): void {
    this.emit('debug', message);
  }

  /** Routine progress: page loaded, records extracted, file renamed. */
  info(message: string): void {
    this.emit('info', message);
  }

  /** Recoverable per-item problem: card without a link, target skipped. */
  warn(message: string): void {
    this.emit('warn', message);
  }

  /** A failure that ended a page, a stage or the run. */
  error(message: string, err?: unknown): void {
    this.emit('error', message);
    if (err !== undefined && LEVEL_RANK.error >= LEVEL_RANK[Logger.threshold]) {
      console.error(err);
    }
  }

  // ── Internals ──────────────────────────────────────────

  private emit(level: LogLevel, message: string): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[Logger.threshold]) return;

    const timestamp = new Date().toISOString();
    const tag = level.toUpperCase().padEnd(5);
    const line = `[${timestamp}] [${tag}] [${this.context}] ${message}`;

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'debug':
        console.debug(line);
        break;
      default:
        console.log(line);
    }
  }
}

/** Render an unknown thrown value as a one-line reason. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
