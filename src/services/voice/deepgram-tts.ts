import { createClient } from '@deepgram/sdk';
import { SpeechOutputError, errorDetails, errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { sleep } from '../../utils/date-time';
import { IAudioPlayer, ISpeechEngine, ISpeechOutput } from './interfaces';

export interface DeepgramSpeechOptions {
    apiKey: string;
    model: string;
    sampleRate?: number;
}

export class DeepgramSpeechEngine implements ISpeechEngine {
    private deepgram: ReturnType<typeof createClient>;

    constructor(private readonly options: DeepgramSpeechOptions) {
        this.deepgram = createClient(options.apiKey);
    }

    /**
     * Generates a complete WAV clip for the text
     */
    public async synthesize(text: string): Promise<Buffer> {
        const response = await this.deepgram.speak.request(
            { text },
            {
                model: this.options.model,
                encoding: 'linear16',
                sample_rate: this.options.sampleRate ?? 24000,
                container: 'wav',
            }
        );

        const stream = await response.getStream();
        if (!stream) {
            throw new SpeechOutputError('Error generating audio: No stream returned', { model: this.options.model });
        }

        const reader = stream.getReader();
        const chunks: Uint8Array[] = [];

        while (true) {
            const { done, value } = await reader.read();
            if (done) break;
            if (value) chunks.push(value);
        }

        return Buffer.concat(chunks);
    }
}

/**
 * Speaks through Deepgram TTS and a local player. Every utterance gets a new
 * engine and a new player, so no state carries over between calls.
 */
export class DeepgramSpeechOutput implements ISpeechOutput {
    constructor(
        private readonly createEngine: () => ISpeechEngine,
        private readonly createPlayer: () => IAudioPlayer,
        private readonly pauseAfterSpeechMs: number = 300
    ) {}

    public async speak(text: string): Promise<void> {
        console.log(`\nBot: ${text}`);

        try {
            const engine = this.createEngine();
            const audio = await engine.synthesize(text);
            await this.createPlayer().play(audio);
        } catch (error) {
            logger.warn('Speech output failed', errorDetails(error));
            console.log(`TTS Error: ${errorMessage(error)}`);
            console.log('(Please read the text above)');
            return;
        }

        await sleep(this.pauseAfterSpeechMs);
    }
}
