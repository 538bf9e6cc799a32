// Permanent Account Number layout: five letters, four digits, one letter
const PAN_PATTERN = /^[A-Z]{5}[0-9]{4}[A-Z]$/;

export class IdentifierFormatter {
    static extract(text: string): string {
        return text.replace(/ /g, '').toUpperCase();
    }

    static isValid(identifier: string): boolean {
        const cleaned = this.extract(identifier);
        return cleaned.length === 10 && PAN_PATTERN.test(cleaned);
    }
}
