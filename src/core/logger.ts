/**
 * logger.ts: Plain-language progress logger for the crawl pipeline.
 *
 * Every module creates its own `Logger` with a context label, so a batch run
 * reads like a narrative:
 *
 *   [2026-10-19T08:30:00.000Z] [INFO ] [RosterScanner] Organization 2/5: Acme Corp
 *   [2026-10-19T08:30:04.112Z] [WARN ] [OrganizationCrawler] People tab not clickable…
 *
 * The threshold comes from `LOG_LEVEL` (debug | info | warn | error) and is
 * read on every call, so tests and the CLI can change it at any time.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function currentThreshold(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

/**
 * Lightweight logger that emits human-readable, timestamped messages.
 *
 * Usage:
 *   const logger = new Logger('RosterScanner');
 *   logger.info('Found 12 members for Acme Corp, diffing against history…');
 */
export class Logger {
  /** A label prepended to every message so you can tell *which* module is talking. */
  private readonly context: string;

  constructor(context: string) {
    this.context = context;
  }

  // ── Public API ─────────────────────────────────────────

  /** Card-level detail: skipped cards, poll attempts. */
  debug(message: string): void {
    this.emit('debug', message);
  }

  /** Routine progress: page opened, members found, events stored. */
  info(message: string): void {
    this.emit('info', message);
  }

  /** Something unexpected but non-fatal: an organization crawl that degraded to zero members. */
  warn(message: string): void {
    this.emit('warn', message);
  }

  /** A hard failure: login rejected, store unreachable, browser crash. */
  error(message: string, err?: unknown): void {
    this.emit('error', message);
    // The raw error goes out separately so its stack survives.
    if (err !== undefined && this.enabled('error')) {
      console.error(err);
    }
  }

  // ── Internals ──────────────────────────────────────────

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[currentThreshold()];
  }

  /**
   * Formats and writes a single log line:
   * `[2026-10-19T08:30:00.000Z] [INFO ] [RosterScanner] Organization 2/5…`
   */
  private emit(level: LogLevel, message: string): void {
    if (!this.enabled(level)) return;

    const timestamp = new Date().toISOString();
    const tag = level.toUpperCase().padEnd(5); // "INFO " / "WARN " / "ERROR"
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

/** Best-effort message extraction for log lines. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
