import fs from 'fs';
import path from 'path';
import { CompletedSessionRecord, toDocument } from '../models/session-record';
import { PersistenceError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export class SessionRepository {
    /**
     * Writes the completed session as a JSON document and returns the
     * absolute path written.
     */
    save(record: CompletedSessionRecord, filePath: string): string {
        const target = path.resolve(filePath);

        try {
            fs.mkdirSync(path.dirname(target), { recursive: true });
            fs.writeFileSync(target, JSON.stringify(toDocument(record), null, 2) + '\n', 'utf-8');
        } catch (error) {
            logger.error('Failed to save KYC session', { path: target, error: errorMessage(error) });
            throw new PersistenceError(`Could not write ${target}: ${errorMessage(error)}`, { path: target });
        }

        logger.info('KYC session saved', { path: target });
        return target;
    }
}

export const sessionRepository = new SessionRepository();
