export type ConsentIntent = 'affirm' | 'decline' | 'unknown';

const AFFIRM_WORDS = ['yes', 'yeah', 'sure'];
const DECLINE_WORDS = ['no', 'nope'];

/**
 * Classifies a spoken consent answer by case-insensitive substring match.
 * Affirmation wins when both appear ("yes, no problem").
 */
export function detectConsent(text: string): ConsentIntent {
    const lowered = text.toLowerCase();

    if (AFFIRM_WORDS.some(word => lowered.includes(word))) {
        return 'affirm';
    }
    if (DECLINE_WORDS.some(word => lowered.includes(word))) {
        return 'decline';
    }
    return 'unknown';
}
