import { FieldKey } from '../../models/session-record';
import { IdentifierFormatter } from '../../utils/identifier-formatter';
import { NameValidator } from '../../utils/name-validator';
import { PhoneFormatter } from '../../utils/phone-formatter';

/**
 * Everything spoken around one question. The reprompt ladder escalates on
 * consecutive capture absences; its last rung repeats when the budget is longer.
 */
export interface RetryScript {
    prompt: string;
    reprompts: readonly [string, ...string[]];
    captureExhausted: string;
    invalid: string;
    retryUnheard: string;
    retryExhaustedUnheard: string;
    invalidExhausted: string;
}

export interface FieldDefinition {
    key: FieldKey;
    fieldName: string;
    prompt: string;
    validate: (value: string) => boolean;
    extract?: (raw: string) => string;
    abortMessage: string;
    summaryLabel: string;
}

export const MESSAGES = {
    welcome: 'Welcome to KYC verification. I will guide you through a quick verification process.',
    summaryIntro: 'Thank you. Let me confirm your details.',
    consentProvided: 'Consent: Provided',
    completed: 'Your KYC verification is complete. Thank you for using our service.',
    consentDeclined: 'You have declined consent. Verification cannot proceed.',
} as const;

export function fieldScript(prompt: string, fieldName: string): RetryScript {
    return {
        prompt,
        reprompts: [
            "I didn't catch that. Please say it again.",
            "I'm still having trouble hearing you. Let's try one more time.",
        ],
        captureExhausted: `I'm sorry, I couldn't hear your ${fieldName}.`,
        invalid: `That ${fieldName} doesn't seem valid. Please try again.`,
        retryUnheard: "I didn't catch that. Let's try again.",
        retryExhaustedUnheard: "I'm sorry, I couldn't hear your response.",
        invalidExhausted: `I was unable to verify your ${fieldName}.`,
    };
}

export const CONSENT_SCRIPT: RetryScript = {
    prompt: 'Do you consent to this KYC verification? Please say yes or no.',
    reprompts: [
        "I didn't catch that. Do you consent? Say yes or no.",
        'Please say yes or no for consent.',
    ],
    captureExhausted: "I couldn't get your consent. Verification cannot proceed.",
    invalid: 'Please say yes or no.',
    retryUnheard: "I didn't hear you. Say yes or no.",
    retryExhaustedUnheard: "I couldn't get your consent. Verification cannot proceed.",
    invalidExhausted: "I couldn't understand your response. Verification cannot proceed.",
};

export const FIELDS: Readonly<Record<FieldKey, FieldDefinition>> = {
    name: {
        key: 'name',
        fieldName: 'name',
        prompt: 'May I have your full name please?',
        validate: (value) => NameValidator.isValid(value),
        abortMessage: 'Unable to proceed without a valid name. Ending verification.',
        summaryLabel: 'Name',
    },
    phone: {
        key: 'phone',
        fieldName: 'phone number',
        prompt: 'Thank you. Now, please provide your 10-digit mobile number.',
        validate: (value) => PhoneFormatter.isValid(value),
        extract: (raw) => PhoneFormatter.extract(raw),
        abortMessage: 'Unable to proceed without a valid phone number. Ending verification.',
        summaryLabel: 'Phone',
    },
    identifier: {
        key: 'identifier',
        fieldName: 'PAN',
        prompt: "Great. Now, please say your PAN number. That's 10 characters: 5 letters, 4 numbers, and 1 letter.",
        validate: (value) => IdentifierFormatter.isValid(value),
        extract: (raw) => IdentifierFormatter.extract(raw),
        abortMessage: 'Unable to proceed without a valid PAN. Ending verification.',
        summaryLabel: 'PAN',
    },
};
