/**
 * Scoped, leveled logging.
 *
 * Lines go to stderr so that command output on stdout stays machine
 * readable. The CLI applies LOG_LEVEL and LOG_FORMAT from the loaded
 * configuration through configureLogger().
 *
 *   const log = createLogger('graph:builder');
 *   log.info('Batch committed', { file: 'src/a.js', mutations: 12 });
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const LOG_FORMATS = ['pretty', 'json'] as const;

export type LogFormat = (typeof LOG_FORMATS)[number];

type LogData = Record<string, unknown>;

export interface LogSettings {
    level: LogLevel;
    format: LogFormat;
    /** Receives each rendered line */
    sink: (line: string) => void;
}

// ============================================================================
// Levels and Settings
// ============================================================================

const LEVELS: Record<LogLevel, { rank: number; tag: string; color: string }> = {
    debug: { rank: 0, tag: 'DBG', color: '\x1b[90m' },
    info: { rank: 1, tag: 'INF', color: '\x1b[36m' },
    warn: { rank: 2, tag: 'WRN', color: '\x1b[33m' },
    error: { rank: 3, tag: 'ERR', color: '\x1b[31m' },
};

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const MAX_VALUE_LENGTH = 80;

const defaults: LogSettings = {
    level: 'info',
    format: 'pretty',
    sink: (line) => console.error(line),
};

let settings: LogSettings = { ...defaults };

/**
 * Override some settings; omitted ones keep their current value.
 * `configureLogger()` with no argument restores the defaults.
 */
export function configureLogger(overrides?: Partial<LogSettings>): void {
    settings = overrides ? { ...settings, ...overrides } : { ...defaults };
}

// ============================================================================
// Rendering
// ============================================================================

function renderValue(value: unknown): string {
    const text = typeof value === 'string' ? value : JSON.stringify(value);
    return text.length > MAX_VALUE_LENGTH ? `${text.slice(0, MAX_VALUE_LENGTH - 3)}...` : text;
}

function renderPretty(level: LogLevel, scope: string, message: string, data: LogData, durationMs?: number): string {
    const { tag, color } = LEVELS[level];
    const time = new Date().toISOString().slice(11, 23);
    let line = `${DIM}${time}${RESET} ${color}${tag}${RESET} ${DIM}[${scope}]${RESET} ${message}`;
    if (durationMs !== undefined) {
        line += ` ${DIM}(${durationMs}ms)${RESET}`;
    }
    const fields = Object.entries(data)
        .filter(([, value]) => value !== undefined)
        .map(([key, value]) => `${key}=${renderValue(value)}`);
    if (fields.length > 0) {
        line += ` ${DIM}${fields.join(' ')}${RESET}`;
    }
    return line;
}

function renderJson(level: LogLevel, scope: string, message: string, data: LogData, durationMs?: number): string {
    return JSON.stringify({ ts: new Date().toISOString(), level, scope, msg: message, ...data, durationMs });
}

/**
 * Renders an unknown thrown value for log data.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Logger
// ============================================================================

export class Logger {
    constructor(readonly scope: string) {}

    private write(level: LogLevel, message: string, data: LogData = {}, durationMs?: number): void {
        if (LEVELS[level].rank < LEVELS[settings.level].rank) return;
        const render = settings.format === 'json' ? renderJson : renderPretty;
        settings.sink(render(level, this.scope, message, data, durationMs));
    }

    debug(message: string, data?: LogData): void {
        this.write('debug', message, data);
    }

    info(message: string, data?: LogData): void {
        this.write('info', message, data);
    }

    warn(message: string, data?: LogData): void {
        this.write('warn', message, data);
    }

    error(message: string, data?: LogData): void {
        this.write('error', message, data);
    }

    /**
     * Time an async operation. Failures are logged and rethrown.
     */
    async time<T>(message: string, fn: () => Promise<T>, data?: LogData): Promise<T> {
        const start = Date.now();
        try {
            const result = await fn();
            this.write('info', message, data, Date.now() - start);
            return result;
        } catch (error) {
            this.write('error', `${message} (failed)`, { ...data, error: errorMessage(error) }, Date.now() - start);
            throw error;
        }
    }
}

export function createLogger(scope: string): Logger {
    return new Logger(scope);
}
