import { SpeechInputError } from '../../utils/errors';
import { TranscriptChunk } from './interfaces';

export interface ListenTiming {
    speechOnsetTimeoutMs: number;
    phraseTimeLimitMs: number;
}

export type ListenOutcome =
    | { status: 'recognized'; text: string }
    | { status: 'timeout' }
    | { status: 'no_match' }
    | { status: 'error'; error: unknown };

/**
 * Turns a live transcription event stream into a single utterance.
 * Settles exactly once; later events are ignored.
 */
export class UtteranceCollector {
    private finals: string[] = [];
    private speaking = false;
    private settled = false;
    private onsetTimer?: NodeJS.Timeout;
    private phraseTimer?: NodeJS.Timeout;

    constructor(
        private readonly timing: ListenTiming,
        private readonly onSettle: (outcome: ListenOutcome) => void
    ) {}

    public begin(): void {
        if (this.settled || this.onsetTimer) return;
        this.onsetTimer = setTimeout(() => this.settle({ status: 'timeout' }), this.timing.speechOnsetTimeoutMs);
    }

    public speechStarted(): void {
        if (this.settled || this.speaking) return;
        this.speaking = true;
        clearTimeout(this.onsetTimer);
        this.phraseTimer = setTimeout(() => this.settle(this.conclude()), this.timing.phraseTimeLimitMs);
    }

    public transcript(chunk: TranscriptChunk): void {
        if (this.settled) return;

        const text = chunk.text.trim();
        if (text) this.speechStarted();
        if (chunk.isFinal && text) this.finals.push(text);

        // speech_final with nothing final yet is background noise
        if (chunk.speechFinal && this.finals.length > 0) {
            this.settle(this.conclude());
        }
    }

    public utteranceEnd(): void {
        if (this.finals.length > 0) {
            this.settle(this.conclude());
        }
    }

    public fail(error: unknown): void {
        this.settle({ status: 'error', error });
    }

    public closed(): void {
        if (this.finals.length > 0) {
            this.settle(this.conclude());
        } else {
            this.settle({ status: 'error', error: new SpeechInputError('Transcription stream closed before an utterance was recognized') });
        }
    }

    public isSettled(): boolean {
        return this.settled;
    }

    private conclude(): ListenOutcome {
        const text = this.finals.join(' ').trim();
        return text ? { status: 'recognized', text } : { status: 'no_match' };
    }

    private settle(outcome: ListenOutcome): void {
        if (this.settled) return;
        this.settled = true;
        clearTimeout(this.onsetTimer);
        clearTimeout(this.phraseTimer);
        this.onSettle(outcome);
    }
}
