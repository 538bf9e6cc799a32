export interface ISpeechInput {
    /**
     * Captures one utterance and returns the recognized text.
     * Resolves null for silence, unintelligible audio or a backend failure alike.
     */
    listen(): Promise<string | null>;
}

export interface ISpeechOutput {
    /**
     * Renders text as speech. Every call is independent of the calls before it,
     * and the promise never rejects: failures fall back to the on-screen text.
     */
    speak(text: string): Promise<void>;
}

export interface TranscriptChunk {
    text: string;
    isFinal: boolean;
    speechFinal: boolean;
    confidence?: number;
}

export interface TranscriptionHandlers {
    onOpen(): void;
    onTranscript(chunk: TranscriptChunk): void;
    onSpeechStarted(): void;
    onUtteranceEnd(): void;
    onError(error: unknown): void;
    onClose(): void;
}

export interface TranscriptionStream {
    send(audio: Buffer): void;
    close(): void;
}

export type TranscriptionFactory = (handlers: TranscriptionHandlers) => TranscriptionStream;

export interface IAudioCapture {
    start(onData: (chunk: Buffer) => void, onError: (error: unknown) => void): void;
    stop(): void;
}

export interface IAudioPlayer {
    play(audio: Buffer): Promise<void>;
}

export interface ISpeechEngine {
    synthesize(text: string): Promise<Buffer>;
}
