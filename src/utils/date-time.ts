export function sleep(ms: number): Promise<void> {
    if (ms <= 0) return Promise.resolve();
    return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isoTimestamp(date: Date = new Date()): string {
    return date.toISOString();
}
