export type ErrorMeta = Record<string, unknown>;

export class AppError extends Error {
    public readonly code: string;
    public readonly meta: ErrorMeta;

    constructor(message: string, code: string = 'INTERNAL_ERROR', meta: ErrorMeta = {}) {
        super(message);
        this.name = this.constructor.name;
        this.code = code;
        this.meta = meta;
        Error.captureStackTrace(this, this.constructor);
    }
}

export class SpeechInputError extends AppError {
    constructor(message: string, meta: ErrorMeta = {}) {
        super(message, 'SPEECH_INPUT_ERROR', meta);
    }
}

export class SpeechOutputError extends AppError {
    constructor(message: string, meta: ErrorMeta = {}) {
        super(message, 'SPEECH_OUTPUT_ERROR', meta);
    }
}

export class AudioDeviceError extends AppError {
    constructor(message: string, meta: ErrorMeta = {}) {
        super(message, 'AUDIO_DEVICE_ERROR', meta);
    }
}

export class PersistenceError extends AppError {
    constructor(message: string, meta: ErrorMeta = {}) {
        super(message, 'PERSISTENCE_ERROR', meta);
    }
}

export class SessionStateError extends AppError {
    constructor(message: string, meta: ErrorMeta = {}) {
        super(message, 'SESSION_STATE_ERROR', meta);
    }
}

export class ConfigError extends AppError {
    constructor(message: string, meta: ErrorMeta = {}) {
        super(message, 'CONFIG_ERROR', meta);
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function errorDetails(error: unknown): ErrorMeta {
    if (error instanceof AppError) {
        return {
            name: error.name,
            code: error.code,
            message: error.message,
            ...error.meta,
        };
    }
    if (error instanceof Error) {
        return {
            name: error.name,
            message: error.message,
            stack: error.stack,
        };
    }
    return { value: String(error) };
}
