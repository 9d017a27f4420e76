import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

export interface LoggerOptions {
    level?: LogLevel;
    file?: string;      // Append log lines to this file as well
}

// Console logger with an optional log file
class Logger {
    private level: LogLevel = 'info';
    private logStream: fs.WriteStream | null = null;

    configure(options: LoggerOptions): void {
        if (options.level) {
            this.level = options.level;
        }
        if (options.file !== undefined) {
            this.closeFile();
            if (options.file) {
                this.openFile(options.file);
            }
        }
    }

    private openFile(file: string): void {
        try {
            this.logStream = fs.createWriteStream(file, { flags: 'a' });
            this.logStream.on('error', (error) => {
                console.error(`Log file ${file} failed, logging to console only:`, error.message);
                this.logStream = null;
            });
        } catch (error) {
            console.error('Failed to create log file:', error);
        }
    }

    private closeFile(): void {
        if (this.logStream) {
            this.logStream.end();
            this.logStream = null;
        }
    }

    private write(level: LogLevel, args: unknown[]): void {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
            return;
        }

        const timestamp = new Date().toISOString();
        const message = args.map((arg) => {
            if (arg instanceof Error) {
                return arg.stack ?? arg.message;
            }
            return typeof arg === 'object' ? JSON.stringify(arg) : String(arg);
        }).join(' ');

        if (this.logStream) {
            this.logStream.write(`[${timestamp}] ${level.toUpperCase()} ${message}\n`);
        }

        switch (level) {
            case 'error':
                console.error(`[${timestamp}] ERROR ${message}`);
                break;
            case 'warn':
                console.warn(`[${timestamp}] WARN ${message}`);
                break;
            default:
                console.log(`[${timestamp}] ${level.toUpperCase()} ${message}`);
        }
    }

    debug(...args: unknown[]): void {
        this.write('debug', args);
    }

    info(...args: unknown[]): void {
        this.write('info', args);
    }

    warn(...args: unknown[]): void {
        this.write('warn', args);
    }

    error(...args: unknown[]): void {
        this.write('error', args);
    }

    close(): void {
        this.closeFile();
    }
}

// Singleton instance
export const logger = new Logger();
