export class NameValidator {
    static isValid(name: string): boolean {
        if (!name || name.trim().length < 2) {
            return false;
        }
        return /[a-zA-Z]/.test(name);
    }
}
