export type FieldKey = 'name' | 'phone' | 'identifier';

export interface SessionRecord {
    name?: string;
    phone?: string;
    identifier?: string;
    consent: boolean;
    timestamp?: string;
}

export interface CompletedSessionRecord {
    name: string;
    phone: string;
    identifier: string;
    consent: true;
    timestamp: string;
}

/**
 * On-disk shape of a session. The identifier is stored under `pan`, and
 * fields that were never collected are written as empty strings.
 */
export interface SessionDocument {
    name: string;
    phone: string;
    pan: string;
    consent: boolean;
    timestamp: string;
}

export type AbortReason = 'missing_field' | 'consent_declined' | 'consent_unresolved';

export type SessionOutcome =
    | { status: 'completed'; record: CompletedSessionRecord }
    | { status: 'aborted'; reason: AbortReason; field?: FieldKey; record: SessionRecord };

export function createSessionRecord(): SessionRecord {
    return { consent: false };
}

export function toDocument(record: SessionRecord | CompletedSessionRecord): SessionDocument {
    return {
        name: record.name ?? '',
        phone: record.phone ?? '',
        pan: record.identifier ?? '',
        consent: record.consent,
        timestamp: record.timestamp ?? '',
    };
}
