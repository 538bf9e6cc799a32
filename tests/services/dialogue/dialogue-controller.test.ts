import { DialogueController } from '../../../src/services/dialogue/dialogue-controller';
import { SessionStateManager } from '../../../src/models/session-state';
import { SessionStateError } from '../../../src/utils/errors';
import { PhoneFormatter } from '../../../src/utils/phone-formatter';
import { NameValidator } from '../../../src/utils/name-validator';
import { FailingSpeechOutput, RecordingSpeechOutput, ScriptedSpeechInput } from '../../helpers/fakes';

const NAME_PROMPT = 'May I have your full name please?';
const PHONE_PROMPT = 'Thank you. Now, please provide your 10-digit mobile number.';
const PAN_PROMPT = "Great. Now, please say your PAN number. That's 10 characters: 5 letters, 4 numbers, and 1 letter.";
const CONSENT_PROMPT = 'Do you consent to this KYC verification? Please say yes or no.';
const DECLINED = 'You have declined consent. Verification cannot proceed.';

const FIXED_NOW = new Date('2026-03-01T10:00:00.000Z');

function controllerFor(answers: Array<string | null | Error>) {
    const input = new ScriptedSpeechInput(answers);
    const output = new RecordingSpeechOutput();
    const controller = new DialogueController(input, output, {
        summaryPauseMs: 0,
        now: () => FIXED_NOW,
        sessionId: 'test-session'
    });
    return { input, output, controller };
}

const nameRequest = {
    prompt: NAME_PROMPT,
    validate: (value: string) => NameValidator.isValid(value),
    fieldName: 'name',
    maxRetries: 2
};

const phoneRequest = {
    prompt: PHONE_PROMPT,
    validate: (value: string) => PhoneFormatter.isValid(value),
    extract: (raw: string) => PhoneFormatter.extract(raw),
    fieldName: 'phone number',
    maxRetries: 2
};

describe('DialogueController.collectField', () => {
    test('returns a valid first answer after a single prompt', async () => {
        const { controller, output, input } = controllerFor(['John Smith']);

        await expect(controller.collectField(nameRequest)).resolves.toBe('John Smith');
        expect(output.spoken).toEqual([NAME_PROMPT]);
        expect(input.calls).toBe(1);
    });

    test('applies extraction before validation', async () => {
        const { controller } = controllerFor(['my number is 98-765 43210 ok']);

        await expect(controller.collectField(phoneRequest)).resolves.toBe('9876543210');
    });

    test('escalates reprompts while nothing is heard, then gives up', async () => {
        const { controller, output, input } = controllerFor([null, null, null]);

        await expect(controller.collectField(nameRequest)).resolves.toBeNull();
        expect(output.spoken).toEqual([
            NAME_PROMPT,
            "I didn't catch that. Please say it again.",
            "I'm still having trouble hearing you. Let's try one more time.",
            "I'm sorry, I couldn't hear your name."
        ]);
        expect(input.calls).toBe(3);
    });

    test('recovers when speech arrives on the last reprompt', async () => {
        const { controller, output } = controllerFor([null, null, 'Priya Nair']);

        await expect(controller.collectField(nameRequest)).resolves.toBe('Priya Nair');
        expect(output.spoken).toHaveLength(3);
    });

    test('retries an invalid answer and accepts a corrected one', async () => {
        const { controller, output } = controllerFor(['123', '98765 43210']);

        await expect(controller.collectField(phoneRequest)).resolves.toBe('9876543210');
        expect(output.spoken).toEqual([
            PHONE_PROMPT,
            "That phone number doesn't seem valid. Please try again."
        ]);
    });

    test('stops after the validation budget is spent', async () => {
        const { controller, output, input } = controllerFor(['A', 'B', 'C', 'Al']);

        await expect(controller.collectField(nameRequest)).resolves.toBeNull();
        expect(output.spoken).toEqual([
            NAME_PROMPT,
            "That name doesn't seem valid. Please try again.",
            "That name doesn't seem valid. Please try again.",
            'I was unable to verify your name.'
        ]);
        expect(input.calls).toBe(3);
        expect(input.remaining()).toBe(1);
    });

    test('a silent validation retry spends an attempt', async () => {
        const { controller, output } = controllerFor(['A', null, 'Al']);

        await expect(controller.collectField(nameRequest)).resolves.toBe('Al');
        expect(output.spoken).toEqual([
            NAME_PROMPT,
            "That name doesn't seem valid. Please try again.",
            "I didn't catch that. Let's try again.",
            "That name doesn't seem valid. Please try again."
        ]);
    });

    test('silence on the last validation retry ends the field', async () => {
        const { controller, output, input } = controllerFor(['A', null, null, 'Al']);

        await expect(controller.collectField(nameRequest)).resolves.toBeNull();
        expect(output.spoken[output.spoken.length - 1]).toBe("I'm sorry, I couldn't hear your response.");
        expect(input.calls).toBe(3);
    });

    test('capture retries and validation retries are counted separately', async () => {
        const { controller, output } = controllerFor([null, 'A', 'Al']);

        await expect(controller.collectField(nameRequest)).resolves.toBe('Al');
        expect(output.spoken).toEqual([
            NAME_PROMPT,
            "I didn't catch that. Please say it again.",
            "That name doesn't seem valid. Please try again."
        ]);
    });

    test('treats a failing listen as nothing heard', async () => {
        const { controller, output } = controllerFor([new Error('microphone unplugged'), 'Al']);

        await expect(controller.collectField(nameRequest)).resolves.toBe('Al');
        expect(output.spoken).toEqual([NAME_PROMPT, "I didn't catch that. Please say it again."]);
    });

    test('keeps going when speech output fails', async () => {
        const input = new ScriptedSpeechInput(['Al']);
        const output = new FailingSpeechOutput();
        const controller = new DialogueController(input, output, { summaryPauseMs: 0 });

        await expect(controller.collectField(nameRequest)).resolves.toBe('Al');
        expect(output.attempts).toEqual([NAME_PROMPT]);
    });

    test('repeats the last reprompt when the budget outgrows the ladder', async () => {
        const { controller, output } = controllerFor([null, null, null, 'Al']);

        await expect(controller.collectField({ ...nameRequest, maxRetries: 3 })).resolves.toBe('Al');
        expect(output.spoken).toEqual([
            NAME_PROMPT,
            "I didn't catch that. Please say it again.",
            "I'm still having trouble hearing you. Let's try one more time.",
            "I'm still having trouble hearing you. Let's try one more time."
        ]);
    });
});

describe('DialogueController.collectConsent', () => {
    test('an affirmative answer grants consent', async () => {
        const { controller, output } = controllerFor(['yes absolutely']);

        await expect(controller.collectConsent()).resolves.toBe(true);
        expect(output.spoken).toEqual([CONSENT_PROMPT]);
    });

    test('a decline is acknowledged', async () => {
        const { controller, output } = controllerFor(['no thanks']);

        await expect(controller.collectConsent()).resolves.toBe(false);
        expect(output.spoken).toEqual([CONSENT_PROMPT, DECLINED]);
    });

    test('an unclear answer spends a retry', async () => {
        const { controller, output } = controllerFor(['maybe', 'sure']);

        await expect(controller.collectConsent()).resolves.toBe(true);
        expect(output.spoken).toEqual([CONSENT_PROMPT, 'Please say yes or no.']);
    });

    test('unclear answers until the budget is spent mean no consent', async () => {
        const { controller, output } = controllerFor(['maybe', 'perhaps', 'later']);

        await expect(controller.collectConsent()).resolves.toBe(false);
        expect(output.spoken).toEqual([
            CONSENT_PROMPT,
            'Please say yes or no.',
            'Please say yes or no.',
            "I couldn't understand your response. Verification cannot proceed."
        ]);
    });

    test('silence throughout means no consent', async () => {
        const { controller, output } = controllerFor([null, null, null]);

        await expect(controller.collectConsent()).resolves.toBe(false);
        expect(output.spoken).toEqual([
            CONSENT_PROMPT,
            "I didn't catch that. Do you consent? Say yes or no.",
            'Please say yes or no for consent.',
            "I couldn't get your consent. Verification cannot proceed."
        ]);
    });

    test('silence during a consent retry uses the consent wording', async () => {
        const { controller, output } = controllerFor(['maybe', null, 'yeah']);

        await expect(controller.collectConsent()).resolves.toBe(true);
        expect(output.spoken).toEqual([
            CONSENT_PROMPT,
            'Please say yes or no.',
            "I didn't hear you. Say yes or no.",
            'Please say yes or no.'
        ]);
    });
});

describe('DialogueController.runSession', () => {
    test('completes and stamps the record when every step succeeds', async () => {
        const { controller, output } = controllerFor(['John Smith', '9876543210', 'abcde1234f', 'yes']);

        const outcome = await controller.runSession();

        expect(outcome).toEqual({
            status: 'completed',
            record: {
                name: 'John Smith',
                phone: '9876543210',
                identifier: 'ABCDE1234F',
                consent: true,
                timestamp: '2026-03-01T10:00:00.000Z'
            }
        });
        expect(output.spoken).toEqual([
            'Welcome to KYC verification. I will guide you through a quick verification process.',
            NAME_PROMPT,
            PHONE_PROMPT,
            PAN_PROMPT,
            CONSENT_PROMPT,
            'Thank you. Let me confirm your details.',
            'Name: John Smith',
            'Phone: 9876543210',
            'PAN: ABCDE1234F',
            'Consent: Provided',
            'Your KYC verification is complete. Thank you for using our service.'
        ]);
    });

    test('a declined consent ends the session without summary or timestamp', async () => {
        const { controller, output } = controllerFor(['John Smith', '9876543210', 'abcde1234f', 'no']);

        const outcome = await controller.runSession();

        expect(outcome).toEqual({
            status: 'aborted',
            reason: 'consent_declined',
            record: {
                name: 'John Smith',
                phone: '9876543210',
                identifier: 'ABCDE1234F',
                consent: false
            }
        });
        expect(outcome.record.timestamp).toBeUndefined();
        expect(output.spoken[output.spoken.length - 1]).toBe(DECLINED);
    });

    test('unresolved consent is reported separately from a decline', async () => {
        const { controller } = controllerFor(['John Smith', '9876543210', 'abcde1234f', null, null, null]);

        const outcome = await controller.runSession();

        expect(outcome.status).toBe('aborted');
        expect(outcome).toMatchObject({ reason: 'consent_unresolved', record: { consent: false } });
    });

    test('three silences on the name abort with an empty record', async () => {
        const { controller, output, input } = controllerFor([null, null, null, 'John Smith']);

        const outcome = await controller.runSession();

        expect(outcome).toEqual({
            status: 'aborted',
            reason: 'missing_field',
            field: 'name',
            record: { consent: false }
        });
        expect(output.spoken[output.spoken.length - 1]).toBe('Unable to proceed without a valid name. Ending verification.');
        expect(input.remaining()).toBe(1);
    });

    test('an unverifiable phone keeps the name and stops before the PAN', async () => {
        const { controller, output } = controllerFor(['Jane Doe', '123', '456', '789']);

        const outcome = await controller.runSession();

        expect(outcome).toEqual({
            status: 'aborted',
            reason: 'missing_field',
            field: 'phone',
            record: { name: 'Jane Doe', consent: false }
        });
        expect(output.spoken).not.toContain(PAN_PROMPT);
        expect(output.spoken[output.spoken.length - 1]).toBe('Unable to proceed without a valid phone number. Ending verification.');
    });

    test('an unverifiable PAN aborts with name and phone kept', async () => {
        const { controller } = controllerFor(['Jane Doe', '9876543210', 'ABCDE12345', 'hello', 'world']);

        const outcome = await controller.runSession();

        expect(outcome).toEqual({
            status: 'aborted',
            reason: 'missing_field',
            field: 'identifier',
            record: { name: 'Jane Doe', phone: '9876543210', consent: false }
        });
    });

    test('a refused stage transition stops the session', async () => {
        const transition = jest.spyOn(SessionStateManager.prototype, 'transitionTo').mockReturnValue(false);
        const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        try {
            const { controller, output, input } = controllerFor(['John Smith']);

            await expect(controller.runSession()).rejects.toBeInstanceOf(SessionStateError);
            expect(output.spoken).toEqual([]);
            expect(input.calls).toBe(0);
        } finally {
            transition.mockRestore();
            errorSpy.mockRestore();
        }
    });
});
