export const PHONE_DIGITS = 10;

export class PhoneFormatter {
    static digitsOnly(phone: string): string {
        return phone.replace(/\D/g, '');
    }

    /**
     * Pulls a mobile number out of a spoken phrase such as
     * "my number is 98-765 43210 ok". Extra digits past the tenth are dropped.
     */
    static extract(text: string): string {
        const digits = this.digitsOnly(text);
        if (digits.length >= PHONE_DIGITS) {
            return digits.slice(0, PHONE_DIGITS);
        }
        return digits;
    }

    static isValid(phone: string): boolean {
        return this.digitsOnly(phone).length === PHONE_DIGITS;
    }
}
