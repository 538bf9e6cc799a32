import { Config } from '../../config';
import { ILinePrompt } from '../../cli/console';
import { CommandMicrophone } from '../audio/microphone';
import { CommandAudioPlayer } from '../audio/player';
import { DeepgramSpeechInput, createDeepgramTranscription } from './deepgram-stt';
import { DeepgramSpeechEngine, DeepgramSpeechOutput } from './deepgram-tts';
import { ISpeechInput, ISpeechOutput } from './interfaces';
import { KeyboardSpeechInput } from './keyboard-input';
import { TextSpeechOutput } from './text-output';

export function createSpeechInput(config: Config, prompt: ILinePrompt): ISpeechInput {
    switch (config.voice.input) {
        case 'keyboard':
            return new KeyboardSpeechInput(prompt);
        case 'deepgram':
            return new DeepgramSpeechInput(
                createDeepgramTranscription({
                    apiKey: config.deepgram.apiKey,
                    model: config.deepgram.sttModel,
                    language: config.deepgram.language,
                    utteranceEndMs: config.voice.utteranceEndMs
                }),
                () => new CommandMicrophone(config.audio.recordCommand),
                {
                    speechOnsetTimeoutMs: config.voice.speechOnsetTimeoutMs,
                    phraseTimeLimitMs: config.voice.phraseTimeLimitMs
                }
            );
    }
}

export function createSpeechOutput(config: Config): ISpeechOutput {
    switch (config.voice.output) {
        case 'text':
            return new TextSpeechOutput();
        case 'deepgram':
            return new DeepgramSpeechOutput(
                () => new DeepgramSpeechEngine({ apiKey: config.deepgram.apiKey, model: config.deepgram.ttsModel }),
                () => new CommandAudioPlayer(config.audio.playCommand),
                config.voice.pauseAfterSpeechMs
            );
    }
}
