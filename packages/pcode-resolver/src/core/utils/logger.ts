/**
 * Resolver Logger
 *
 * Console logger whose entries carry the fields of the engine that wrote
 * them (component, admin level). Pretty lines by default; one JSON object
 * per line when NODE_ENV=production.
 *
 * ```
 * [2024-05-01T10:00:00.000Z] INFO: Registered admin info (component=admin-level adminLevel=1 total=23)
 * ```
 */

export type LogLevel = 'debug' | 'info' | 'error';

export type LogFields = Readonly<Record<string, string | number | boolean | undefined>>;

export interface LoggerOptions {
  readonly level: LogLevel;
  readonly pretty: boolean;
  /** Attached to every entry */
  readonly fields?: LogFields;
}

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = { debug: 0, info: 1, error: 2 };

const WRITERS: Readonly<Record<LogLevel, (line: string) => void>> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  error: (line) => console.error(line),
};

export class Logger {
  constructor(private readonly options: LoggerOptions) {}

  /**
   * Logger writing the same way with extra bound fields
   */
  child(fields: LogFields): Logger {
    return new Logger({ ...this.options, fields: { ...this.options.fields, ...fields } });
  }

  debug(message: string, fields?: LogFields): void {
    this.write('debug', message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.write('info', message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.write('error', message, fields);
  }

  private write(level: LogLevel, message: string, fields: LogFields | undefined): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.options.level]) return;

    const entries = Object.entries({ ...this.options.fields, ...fields }).filter(
      (entry): entry is [string, string | number | boolean] => entry[1] !== undefined
    );
    const timestamp = new Date().toISOString();

    if (!this.options.pretty) {
      WRITERS[level](JSON.stringify({ timestamp, level, message, ...Object.fromEntries(entries) }));
      return;
    }

    const suffix =
      entries.length > 0 ? ` (${entries.map(([key, value]) => `${key}=${String(value)}`).join(' ')})` : '';
    WRITERS[level](`[${timestamp}] ${level.toUpperCase()}: ${message}${suffix}`);
  }
}

function levelFromEnv(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'error') return level;
  return 'info';
}

/**
 * Logger configured from LOG_LEVEL and NODE_ENV
 */
export function createLogger(fields: LogFields = {}): Logger {
  return new Logger({
    level: levelFromEnv(),
    pretty: process.env.NODE_ENV !== 'production',
    fields,
  });
}
