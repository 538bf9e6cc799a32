import { SessionOutcome, toDocument } from '../models/session-record';
import { SessionRepository } from '../storage/session-repository';
import { errorMessage } from '../utils/errors';
import { printBanner } from './console';

export interface ReportResult {
    saved: boolean;
    path?: string;
}

/**
 * Persists a completed session and prints what was collected. A failed write
 * is reported but does not change the outcome of the session.
 */
export function reportOutcome(outcome: SessionOutcome, outputPath: string, repository: SessionRepository): ReportResult {
    if (outcome.status === 'aborted') {
        console.log('\nKYC verification was not completed successfully.');
        console.log('Partial data collected:');
        console.log(JSON.stringify(toDocument(outcome.record), null, 2));
        return { saved: false };
    }

    let result: ReportResult = { saved: false };
    try {
        const path = repository.save(outcome.record, outputPath);
        console.log(`\nKYC data saved to ${path}`);
        result = { saved: true, path };
    } catch (error) {
        console.error(`Error saving JSON: ${errorMessage(error)}`);
    }

    printBanner('KYC SESSION DATA');
    console.log(JSON.stringify(toDocument(outcome.record), null, 2));
    return result;
}
