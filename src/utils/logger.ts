import fs from 'fs';
import path from 'path';
import { config, LOG_LEVELS, LogLevel } from '../config';

type LogMeta = Record<string, unknown>;

export class Logger {
    private logStream?: fs.WriteStream;
    private readonly threshold: number;

    constructor(level: LogLevel = config.logLevel, logDir: string | undefined = config.paths.logs) {
        this.threshold = LOG_LEVELS.indexOf(level);

        if (logDir) {
            const dir = path.resolve(logDir);
            try {
                fs.mkdirSync(dir, { recursive: true });
                this.logStream = fs.createWriteStream(path.join(dir, 'kyc-voice.log'), { flags: 'a' });
                this.logStream.on('error', (err) => {
                    console.error('Failed to write to log file stream:', err);
                    this.logStream = undefined;
                });
            } catch (e) {
                console.error(`Failed to create log directory at ${dir}:`, e);
            }
        }
    }

    private formatLog(level: LogLevel, message: string, meta?: LogMeta) {
        return JSON.stringify({
            timestamp: new Date().toISOString(),
            level: level.toUpperCase(),
            message,
            ...(meta && { meta })
        });
    }

    private log(level: LogLevel, message: string, meta?: LogMeta) {
        const log = this.formatLog(level, message, meta);

        // File gets every level; console only at or above the threshold
        this.logStream?.write(log + '\n');

        if (LOG_LEVELS.indexOf(level) < this.threshold) return;

        if (level === 'error') {
            console.error(log);
        } else if (level === 'warn') {
            console.warn(log);
        } else {
            console.log(log);
        }
    }

    debug(message: string, meta?: LogMeta) {
        this.log('debug', message, meta);
    }

    info(message: string, meta?: LogMeta) {
        this.log('info', message, meta);
    }

    warn(message: string, meta?: LogMeta) {
        this.log('warn', message, meta);
    }

    error(message: string, meta?: LogMeta) {
        this.log('error', message, meta);
    }

    close(): Promise<void> {
        const stream = this.logStream;
        this.logStream = undefined;
        if (!stream) return Promise.resolve();
        return new Promise((resolve) => stream.end(() => resolve()));
    }
}

export const logger = new Logger();
