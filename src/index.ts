#!/usr/bin/env node
import { Config, config, loadConfig, validateEnvironment } from './config';
import { ConsolePrompt, printBanner, printSection } from './cli/console';
import { reportOutcome } from './cli/report';
import { DialogueController } from './services/dialogue/dialogue-controller';
import { createSpeechInput, createSpeechOutput } from './services/voice/factory';
import { sessionRepository } from './storage/session-repository';
import { errorDetails } from './utils/errors';
import { logger } from './utils/logger';

const VOICE_INSTRUCTIONS = [
    '1. Make sure your microphone is working',
    "2. Speak clearly when you see '[LISTENING]'",
    '3. The bot will SPEAK to you - LISTEN for voice prompts',
    '4. Wait for the listening indicator before speaking',
    "5. Turn up your volume if you can't hear the bot",
];

const KEYBOARD_INSTRUCTIONS = [
    "1. Type your answer when you see '[LISTENING]' and press Enter",
    '2. Pressing Enter on an empty line counts as no answer',
    '3. Read the bot prompts on screen (or listen, if voice output is on)',
];

function arg(name: string, fallback = ''): string {
    const idx = process.argv.indexOf(`--${name}`);
    return idx !== -1 && process.argv[idx + 1] ? process.argv[idx + 1] : fallback;
}

function runtimeConfig(): Config {
    const overrides: Record<string, string> = {};
    const input = arg('input');
    const voice = arg('voice');
    if (input) overrides.VOICE_INPUT = input;
    if (voice) overrides.VOICE_OUTPUT = voice;

    return Object.keys(overrides).length > 0 ? loadConfig({ ...process.env, ...overrides }) : config;
}

async function main() {
    const settings = runtimeConfig();
    validateEnvironment(settings);

    const outputPath = arg('output', settings.session.outputPath);

    printSection('SETUP INSTRUCTIONS', settings.voice.input === 'keyboard' ? KEYBOARD_INSTRUCTIONS : VOICE_INSTRUCTIONS);

    const prompt = new ConsolePrompt();
    try {
        await prompt.ask("Press Enter when you're ready to start...");

        const controller = new DialogueController(
            createSpeechInput(settings, prompt),
            createSpeechOutput(settings),
            { summaryPauseMs: settings.voice.summaryPauseMs }
        );

        logger.info('Voice backends selected', { input: settings.voice.input, output: settings.voice.output });
        printBanner('KYC VOICE VERIFICATION');

        const outcome = await controller.runSession();
        reportOutcome(outcome, outputPath, sessionRepository);
    } finally {
        prompt.close();
        await logger.close();
    }
}

main().catch((err) => {
    console.error(JSON.stringify({ ok: false, ...errorDetails(err) }, null, 2));
    process.exit(1);
});
