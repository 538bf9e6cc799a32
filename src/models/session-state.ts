import { logger } from '../utils/logger';

export enum SessionStage {
    INIT = 'INIT',
    WELCOME = 'WELCOME',
    NAME = 'NAME',
    PHONE = 'PHONE',
    IDENTIFIER = 'IDENTIFIER',
    CONSENT = 'CONSENT',
    SUMMARY = 'SUMMARY',
    COMPLETED = 'COMPLETED',
    ABORTED = 'ABORTED'
}

const ORDER: readonly SessionStage[] = [
    SessionStage.INIT,
    SessionStage.WELCOME,
    SessionStage.NAME,
    SessionStage.PHONE,
    SessionStage.IDENTIFIER,
    SessionStage.CONSENT,
    SessionStage.SUMMARY,
    SessionStage.COMPLETED
];

export class SessionStateManager {
    private currentStage: SessionStage = SessionStage.INIT;
    private sessionId: string;

    constructor(sessionId: string) {
        this.sessionId = sessionId;
    }

    public getStage(): SessionStage {
        return this.currentStage;
    }

    public isTerminal(): boolean {
        return this.currentStage === SessionStage.COMPLETED || this.currentStage === SessionStage.ABORTED;
    }

    /**
     * Moves one step forward, or to ABORTED from any live stage.
     * Returns false when the transition was refused.
     */
    public transitionTo(newStage: SessionStage): boolean {
        if (this.currentStage === newStage) return true;

        if (this.isTerminal()) {
            logger.warn(`Attempted to transition from ${this.currentStage} to ${newStage}`, { sessionId: this.sessionId });
            return false;
        }

        if (newStage !== SessionStage.ABORTED && ORDER.indexOf(newStage) !== ORDER.indexOf(this.currentStage) + 1) {
            logger.warn(`Out-of-order transition ${this.currentStage} -> ${newStage} refused`, { sessionId: this.sessionId });
            return false;
        }

        logger.info(`Stage Transition: ${this.currentStage} -> ${newStage}`, {
            sessionId: this.sessionId,
            from: this.currentStage,
            to: newStage
        });

        this.currentStage = newStage;
        return true;
    }
}
