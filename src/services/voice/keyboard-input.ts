import { logger } from '../../utils/logger';
import { ILinePrompt } from '../../cli/console';
import { ISpeechInput } from './interfaces';

/**
 * Offline stand-in for speech recognition: the answer is typed.
 * An empty line counts as nothing heard.
 */
export class KeyboardSpeechInput implements ISpeechInput {
    constructor(private readonly prompt: ILinePrompt) {}

    public async listen(): Promise<string | null> {
        console.log('\n[LISTENING] (type your answer)');
        const line = await this.prompt.ask('You: ');

        if (line === null) {
            console.log('\nInput closed');
            logger.info('Keyboard input stream ended');
            return null;
        }

        const answer = line.trim();
        if (!answer) {
            console.log('No input detected');
            logger.info('Keyboard input empty');
            return null;
        }

        return answer;
    }
}
