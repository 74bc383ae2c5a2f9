type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const levelOrder: Record<LogLevel, number> = {
    error: 0,
    warn: 1,
    info: 2,
    debug: 3,
};

const BUFFER_SIZE = 500;

const isLogLevel = (value: string): value is LogLevel => value in levelOrder;

class Logger {
    level: LogLevel;
    private lines: string[] = [];

    constructor(level: string | undefined) {
        const normalized = (level ?? '').trim().toLowerCase();
        this.level = isLogLevel(normalized) ? normalized : 'info';
    }

    setLevel(level: string) {
        const normalized = level.trim().toLowerCase();
        if (isLogLevel(normalized))
            this.level = normalized;
    }

    private shouldLog(level: LogLevel): boolean {
        return levelOrder[level] <= levelOrder[this.level];
    }

    private write(level: LogLevel, message: string): string | null {
        if (!this.shouldLog(level))
            return null;
        const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}`;
        this.lines.push(line);
        if (this.lines.length > BUFFER_SIZE)
            this.lines.splice(0, this.lines.length - BUFFER_SIZE);
        return line;
    }

    debug(message: string) {
        const line = this.write('debug', message);
        if (line) console.debug(line);
    }

    info(message: string) {
        const line = this.write('info', message);
        if (line) console.log(line);
    }

    warn(message: string) {
        const line = this.write('warn', message);
        if (line) console.warn(line);
    }

    error(message: string, error?: unknown) {
        const detail = error instanceof Error ? `: ${error.message}` : '';
        const line = this.write('error', `${message}${detail}`);
        if (line) console.error(line);
    }

    /** Most recent lines, oldest first. */
    recent(): string[] {
        return [...this.lines];
    }

    clear() {
        this.lines = [];
    }
}

const logger = new Logger(process.env.LOG_LEVEL);

export { logger, Logger };
export type { LogLevel };
