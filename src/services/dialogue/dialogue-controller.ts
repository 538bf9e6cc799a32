import { randomUUID } from 'crypto';
import {
    CompletedSessionRecord,
    SessionOutcome,
    SessionRecord,
    createSessionRecord
} from '../../models/session-record';
import { SessionStage, SessionStateManager } from '../../models/session-state';
import { isoTimestamp, sleep } from '../../utils/date-time';
import { SessionStateError, errorDetails } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { ISpeechInput, ISpeechOutput } from '../voice/interfaces';
import { detectConsent } from './consent-detector';
import { CONSENT_SCRIPT, FIELDS, FieldDefinition, MESSAGES, RetryScript, fieldScript } from './scripts';

// Not read from configuration; every session gets the same budget
export const MAX_RETRIES = 2;

export interface CollectFieldRequest {
    prompt: string;
    validate: (value: string) => boolean;
    extract?: (raw: string) => string;
    fieldName: string;
    maxRetries?: number;
}

export interface DialogueOptions {
    maxRetries?: number;
    summaryPauseMs?: number;
    now?: () => Date;
    sessionId?: string;
}

type Interpretation<T> = { accepted: true; value: T } | { accepted: false };

export class DialogueController {
    private readonly maxRetries: number;
    private readonly summaryPauseMs: number;
    private readonly now: () => Date;
    private readonly sessionId: string;

    constructor(
        private readonly input: ISpeechInput,
        private readonly output: ISpeechOutput,
        options: DialogueOptions = {}
    ) {
        this.maxRetries = options.maxRetries ?? MAX_RETRIES;
        this.summaryPauseMs = options.summaryPauseMs ?? 500;
        this.now = options.now ?? (() => new Date());
        this.sessionId = options.sessionId ?? randomUUID();
    }

    /**
     * Asks for one field and returns the extracted, validated value, or null
     * once the retry budget is spent.
     */
    public collectField(request: CollectFieldRequest): Promise<string | null> {
        const { prompt, validate, extract, fieldName, maxRetries = this.maxRetries } = request;

        return this.converse<string>(
            fieldScript(prompt, fieldName),
            (raw) => {
                const candidate = extract ? extract(raw) : raw;
                return validate(candidate) ? { accepted: true, value: candidate } : { accepted: false };
            },
            maxRetries,
            fieldName
        );
    }

    /**
     * True only for an affirmative answer; a decline or an exhausted budget is false.
     */
    public async collectConsent(maxRetries: number = this.maxRetries): Promise<boolean> {
        return (await this.resolveConsent(maxRetries)) === true;
    }

    public async runSession(): Promise<SessionOutcome> {
        const state = new SessionStateManager(this.sessionId);
        let record = createSessionRecord();

        logger.info('KYC session started', { sessionId: this.sessionId });

        this.advance(state, SessionStage.WELCOME);
        await this.say(MESSAGES.welcome);

        this.advance(state, SessionStage.NAME);
        const name = await this.collectDefined(FIELDS.name);
        if (name === null) return this.abortOnField(state, FIELDS.name, record);
        record = { ...record, name };

        this.advance(state, SessionStage.PHONE);
        const phone = await this.collectDefined(FIELDS.phone);
        if (phone === null) return this.abortOnField(state, FIELDS.phone, record);
        record = { ...record, phone };

        this.advance(state, SessionStage.IDENTIFIER);
        const identifier = await this.collectDefined(FIELDS.identifier);
        if (identifier === null) return this.abortOnField(state, FIELDS.identifier, record);
        record = { ...record, identifier };

        this.advance(state, SessionStage.CONSENT);
        const consent = await this.resolveConsent(this.maxRetries);
        record = { ...record, consent: consent === true };

        if (consent !== true) {
            const reason = consent === false ? 'consent_declined' : 'consent_unresolved';
            this.advance(state, SessionStage.ABORTED);
            logger.info('KYC session aborted', { sessionId: this.sessionId, reason });
            return { status: 'aborted', reason, record };
        }

        this.advance(state, SessionStage.SUMMARY);
        await this.say(MESSAGES.summaryIntro);

        const summary = [
            `${FIELDS.name.summaryLabel}: ${name}`,
            `${FIELDS.phone.summaryLabel}: ${phone}`,
            `${FIELDS.identifier.summaryLabel}: ${identifier}`,
            MESSAGES.consentProvided
        ];
        for (const line of summary) {
            await sleep(this.summaryPauseMs);
            await this.say(line);
        }

        const completed: CompletedSessionRecord = {
            name,
            phone,
            identifier,
            consent: true,
            timestamp: isoTimestamp(this.now())
        };

        await this.say(MESSAGES.completed);
        this.advance(state, SessionStage.COMPLETED);
        logger.info('KYC session completed', { sessionId: this.sessionId });

        return { status: 'completed', record: completed };
    }

    private advance(state: SessionStateManager, stage: SessionStage): void {
        if (state.transitionTo(stage)) return;

        logger.error('Session stage transition refused', { sessionId: this.sessionId, from: state.getStage(), to: stage });
        throw new SessionStateError(`Cannot move session from ${state.getStage()} to ${stage}`, {
            sessionId: this.sessionId,
            from: state.getStage(),
            to: stage
        });
    }

    private collectDefined(field: FieldDefinition): Promise<string | null> {
        return this.collectField({
            prompt: field.prompt,
            validate: field.validate,
            extract: field.extract,
            fieldName: field.fieldName
        });
    }

    private async abortOnField(state: SessionStateManager, field: FieldDefinition, record: SessionRecord): Promise<SessionOutcome> {
        await this.say(field.abortMessage);
        this.advance(state, SessionStage.ABORTED);
        logger.info('KYC session aborted', { sessionId: this.sessionId, reason: 'missing_field', field: field.key });
        return { status: 'aborted', reason: 'missing_field', field: field.key, record };
    }

    /**
     * Null when consent could not be resolved at all, false when declined.
     */
    private async resolveConsent(maxRetries: number): Promise<boolean | null> {
        const answer = await this.converse<boolean>(
            CONSENT_SCRIPT,
            (raw) => {
                const intent = detectConsent(raw);
                if (intent === 'unknown') return { accepted: false };
                return { accepted: true, value: intent === 'affirm' };
            },
            maxRetries,
            'consent'
        );

        if (answer === false) {
            await this.say(MESSAGES.consentDeclined);
        }
        return answer;
    }

    /**
     * The single capture/validate/retry routine behind every question.
     *
     * Capture phase: the prompt plus up to maxRetries reprompts while nothing
     * is heard. Validation phase: up to maxRetries further attempts after a
     * rejected answer, where hearing nothing also spends an attempt.
     */
    private async converse<T>(
        script: RetryScript,
        interpret: (raw: string) => Interpretation<T>,
        maxRetries: number,
        label: string
    ): Promise<T | null> {
        await this.say(script.prompt);
        let heard = await this.hear();

        for (let attempt = 0; heard === null && attempt < maxRetries; attempt++) {
            const rung = script.reprompts[Math.min(attempt, script.reprompts.length - 1)];
            await this.say(rung);
            heard = await this.hear();
        }

        if (heard === null) {
            logger.info('Nothing heard, capture budget exhausted', { sessionId: this.sessionId, field: label });
            await this.say(script.captureExhausted);
            return null;
        }

        let result = interpret(heard);
        if (result.accepted) {
            logger.info('Answer accepted', { sessionId: this.sessionId, field: label, attempt: 0 });
            return result.value;
        }

        for (let attempt = 0; attempt < maxRetries; attempt++) {
            logger.info('Answer rejected', { sessionId: this.sessionId, field: label, attempt });
            await this.say(script.invalid);
            const retry = await this.hear();

            if (retry === null) {
                if (attempt < maxRetries - 1) {
                    await this.say(script.retryUnheard);
                    continue;
                }
                await this.say(script.retryExhaustedUnheard);
                return null;
            }

            result = interpret(retry);
            if (result.accepted) {
                logger.info('Answer accepted', { sessionId: this.sessionId, field: label, attempt: attempt + 1 });
                return result.value;
            }
        }

        logger.info('Validation budget exhausted', { sessionId: this.sessionId, field: label });
        await this.say(script.invalidExhausted);
        return null;
    }

    private async hear(): Promise<string | null> {
        try {
            return await this.input.listen();
        } catch (error) {
            logger.warn('Speech input failed, treating as nothing heard', { sessionId: this.sessionId, ...errorDetails(error) });
            return null;
        }
    }

    private async say(text: string): Promise<void> {
        try {
            await this.output.speak(text);
        } catch (error) {
            logger.warn('Speech output failed', { sessionId: this.sessionId, ...errorDetails(error) });
        }
    }
}
