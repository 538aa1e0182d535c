const AMOUNT_PATTERN = /^(\d+)\.(\d{2})$/;

export function isAmount(value: string): boolean {
    const match = AMOUNT_PATTERN.exec(value);
    if (!match) return false;
    return Number.isSafeInteger(Number(match[1]) * 100 + Number(match[2]));
}

/**
 * Converts a two-decimal amount such as "35.35" to integer cents (3535).
 * Scoring never touches the floating-point value of an amount.
 */
export function parseCents(value: string): number {
    const match = AMOUNT_PATTERN.exec(value);
    if (!match) throw new RangeError(`Not a two-decimal amount: "${value}"`);
    const cents = Number(match[1]) * 100 + Number(match[2]);
    if (!Number.isSafeInteger(cents)) throw new RangeError(`Amount out of range: "${value}"`);
    return cents;
}
