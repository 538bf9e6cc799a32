import dotenv from 'dotenv';
import { ConfigError } from './utils/errors';

if (process.env.NODE_ENV !== 'production') {
    dotenv.config();
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type VoiceInputBackend = 'deepgram' | 'keyboard';
export type VoiceOutputBackend = 'deepgram' | 'text';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
export const VOICE_INPUTS: readonly VoiceInputBackend[] = ['deepgram', 'keyboard'];
export const VOICE_OUTPUTS: readonly VoiceOutputBackend[] = ['deepgram', 'text'];

export interface Config {
    nodeEnv: string;
    logLevel: LogLevel;

    deepgram: {
        apiKey: string;
        sttModel: string;
        ttsModel: string;
        language: string;
    };

    voice: {
        input: VoiceInputBackend;
        output: VoiceOutputBackend;
        speechOnsetTimeoutMs: number;
        phraseTimeLimitMs: number;
        utteranceEndMs: number;
        pauseAfterSpeechMs: number;
        summaryPauseMs: number;
    };

    audio: {
        recordCommand: string;
        playCommand: string;
    };

    session: {
        outputPath: string;
    };

    paths: {
        logs?: string;
    };

    // Raw values that failed to parse, reported by validateEnvironment()
    invalid: string[];
}

type Env = Record<string, string | undefined>;

function getEnvVar(env: Env, key: string, defaultValue: string): string {
    const value = env[key];
    return value && value.trim() ? value.trim() : defaultValue;
}

function isOneOf<T extends string>(value: string, allowed: readonly T[]): value is T {
    return allowed.some(option => option === value);
}

export function loadConfig(env: Env = process.env): Config {
    const invalid: string[] = [];

    const choice = <T extends string>(key: string, allowed: readonly T[], fallback: T): T => {
        const raw = getEnvVar(env, key, fallback).toLowerCase();
        if (isOneOf(raw, allowed)) return raw;
        invalid.push(`${key} must be one of ${allowed.join(', ')} (got "${raw}")`);
        return fallback;
    };

    const millis = (key: string, fallback: number): number => {
        const raw = getEnvVar(env, key, String(fallback));
        const value = Number(raw);
        if (Number.isInteger(value) && value >= 0) return value;
        invalid.push(`${key} must be a non-negative integer of milliseconds (got "${raw}")`);
        return fallback;
    };

    return {
        nodeEnv: getEnvVar(env, 'NODE_ENV', 'development'),
        logLevel: choice('LOG_LEVEL', LOG_LEVELS, 'warn'),

        deepgram: {
            apiKey: env.DEEPGRAM_API_KEY?.trim() || '',
            sttModel: getEnvVar(env, 'DEEPGRAM_STT_MODEL', 'nova-2'),
            ttsModel: getEnvVar(env, 'DEEPGRAM_TTS_MODEL', 'aura-asteria-en'),
            language: getEnvVar(env, 'DEEPGRAM_LANGUAGE', 'en-IN'),
        },

        voice: {
            input: choice('VOICE_INPUT', VOICE_INPUTS, 'deepgram'),
            output: choice('VOICE_OUTPUT', VOICE_OUTPUTS, 'deepgram'),
            speechOnsetTimeoutMs: millis('SPEECH_ONSET_TIMEOUT_MS', 10000),
            phraseTimeLimitMs: millis('PHRASE_TIME_LIMIT_MS', 10000),
            utteranceEndMs: millis('UTTERANCE_END_MS', 1000),
            pauseAfterSpeechMs: millis('PAUSE_AFTER_SPEECH_MS', 300),
            summaryPauseMs: millis('SUMMARY_PAUSE_MS', 500),
        },

        audio: {
            recordCommand: getEnvVar(env, 'AUDIO_RECORD_COMMAND', 'rec -q -t raw -b 16 -e signed-integer -r 16000 -c 1 -'),
            playCommand: getEnvVar(env, 'AUDIO_PLAY_COMMAND', 'play -q -t wav -'),
        },

        session: {
            outputPath: getEnvVar(env, 'KYC_OUTPUT_PATH', 'kyc_session.json'),
        },

        paths: {
            logs: env.LOGS_PATH?.trim() || undefined,
        },

        invalid,
    };
}

export const config: Config = loadConfig();

/**
 * Collects every configuration problem and throws them together, so the
 * operator can fix the environment in one pass.
 */
export function validateEnvironment(target: Config = config): void {
    const errors = [...target.invalid];

    const usesDeepgram = target.voice.input === 'deepgram' || target.voice.output === 'deepgram';
    if (usesDeepgram && !target.deepgram.apiKey) {
        errors.push('DEEPGRAM_API_KEY (required for the deepgram voice input or output)');
    }

    if (target.voice.utteranceEndMs > 0 && target.voice.utteranceEndMs < 1000) {
        errors.push('UTTERANCE_END_MS must be at least 1000 (Deepgram minimum)');
    }

    if (errors.length > 0) {
        throw new ConfigError('Invalid environment configuration', { errors });
    }
}
