import { ISpeechOutput } from './interfaces';

export class TextSpeechOutput implements ISpeechOutput {
    public async speak(text: string): Promise<void> {
        console.log(`\nBot: ${text}`);
    }
}
