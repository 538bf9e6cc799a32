import { createClient, LiveTranscriptionEvents } from '@deepgram/sdk';
import { errorDetails, errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import {
    IAudioCapture,
    ISpeechInput,
    TranscriptionFactory,
    TranscriptionHandlers,
    TranscriptionStream
} from './interfaces';
import { ListenOutcome, ListenTiming, UtteranceCollector } from './utterance-collector';

export interface DeepgramLiveOptions {
    apiKey: string;
    model: string;
    language: string;
    utteranceEndMs: number;
    sampleRate?: number;
}

interface LiveResultsMessage {
    channel?: {
        alternatives?: Array<{ transcript?: string; confidence?: number }>;
    };
    is_final?: boolean;
    speech_final?: boolean;
}

/**
 * Copies a chunk into a standalone ArrayBuffer for the socket.
 */
export function toArrayBuffer(audio: Buffer): ArrayBuffer {
    const copy = new ArrayBuffer(audio.byteLength);
    new Uint8Array(copy).set(audio);
    return copy;
}

/**
 * Opens a Deepgram live transcription socket for raw 16-bit mono PCM and
 * forwards its events to the handlers.
 */
export function createDeepgramTranscription(options: DeepgramLiveOptions): TranscriptionFactory {
    return (handlers: TranscriptionHandlers): TranscriptionStream => {
        const deepgram = createClient(options.apiKey);
        const connection = deepgram.listen.live({
            model: options.model,
            language: options.language,
            smart_format: true,
            encoding: 'linear16',
            sample_rate: options.sampleRate ?? 16000,
            channels: 1,
            interim_results: true,
            vad_events: true,
            endpointing: 300,
            ...(options.utteranceEndMs > 0 ? { utterance_end_ms: options.utteranceEndMs } : {})
        });

        connection.on(LiveTranscriptionEvents.Open, () => {
            logger.debug('Deepgram STT Connection Opened');
            handlers.onOpen();
        });

        connection.on(LiveTranscriptionEvents.Transcript, (data: LiveResultsMessage) => {
            const alt = data.channel?.alternatives?.[0];
            handlers.onTranscript({
                text: alt?.transcript ?? '',
                isFinal: !!data.is_final,
                speechFinal: !!data.speech_final,
                confidence: alt?.confidence
            });
        });

        connection.on(LiveTranscriptionEvents.SpeechStarted, () => handlers.onSpeechStarted());
        connection.on(LiveTranscriptionEvents.UtteranceEnd, () => handlers.onUtteranceEnd());

        connection.on(LiveTranscriptionEvents.Error, (err: unknown) => {
            logger.warn('Deepgram STT Error event', errorDetails(err));
            handlers.onError(err);
        });

        connection.on(LiveTranscriptionEvents.Close, () => {
            logger.debug('Deepgram STT Connection Closed');
            handlers.onClose();
        });

        return {
            send: (audio: Buffer) => connection.send(toArrayBuffer(audio)),
            close: () => connection.requestClose()
        };
    };
}

/**
 * Speech input backed by the microphone and Deepgram live transcription.
 * Each listen() owns its own recorder process and socket and releases both
 * once the utterance settles.
 */
export class DeepgramSpeechInput implements ISpeechInput {
    constructor(
        private readonly openTranscription: TranscriptionFactory,
        private readonly createCapture: () => IAudioCapture,
        private readonly timing: ListenTiming
    ) {}

    public listen(): Promise<string | null> {
        console.log('\n[LISTENING] (speak now)');

        return new Promise((resolve) => {
            const capture = this.createCapture();
            const pending: Buffer[] = [];
            let stream: TranscriptionStream | null = null;
            let open = false;

            const collector = new UtteranceCollector(this.timing, (outcome) => {
                capture.stop();
                pending.length = 0;
                if (stream) {
                    try {
                        stream.close();
                    } catch (err) {
                        logger.debug('Transcription close failed', errorDetails(err));
                    }
                }
                resolve(this.report(outcome));
            });

            collector.begin();

            try {
                stream = this.openTranscription({
                    onOpen: () => {
                        if (collector.isSettled()) return;
                        open = true;
                        while (stream && pending.length > 0) {
                            const chunk = pending.shift();
                            if (chunk) stream.send(chunk);
                        }
                    },
                    onTranscript: (chunk) => collector.transcript(chunk),
                    onSpeechStarted: () => collector.speechStarted(),
                    onUtteranceEnd: () => collector.utteranceEnd(),
                    onError: (error) => collector.fail(error),
                    onClose: () => collector.closed()
                });

                capture.start(
                    (chunk) => {
                        if (collector.isSettled()) return;
                        if (open && stream) {
                            stream.send(chunk);
                        } else {
                            pending.push(chunk);
                        }
                    },
                    (error) => collector.fail(error)
                );
            } catch (error) {
                collector.fail(error);
            }
        });
    }

    private report(outcome: ListenOutcome): string | null {
        switch (outcome.status) {
            case 'recognized':
                console.log(`You: ${outcome.text}`);
                logger.info('Speech recognized', { characters: outcome.text.length });
                return outcome.text;
            case 'timeout':
                console.log('No speech detected (timeout)');
                logger.info('Listen timed out');
                return null;
            case 'no_match':
                console.log('Could not understand audio');
                logger.info('Speech not recognized');
                return null;
            case 'error':
                console.log(`Speech recognition error: ${errorMessage(outcome.error)}`);
                logger.warn('Speech recognition failed', errorDetails(outcome.error));
                return null;
        }
    }
}
