import { ReceiptSchema, type Receipt } from './models/receipt';

export type ValidationResult =
    | { valid: true; receipt: Receipt }
    | { valid: false; issues: string[] };

/**
 * Accepts a receipt only when every field is present and well formed.
 * The issues are for diagnostics; callers outside the service only see accept/reject.
 */
export function validateReceipt(candidate: unknown): ValidationResult {
    const result = ReceiptSchema.safeParse(candidate);
    if (result.success) return { valid: true, receipt: result.data };

    const issues = result.error.issues.map((issue) => {
        const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `${path}: ${issue.message}`;
    });
    return { valid: false, issues };
}

export function isValidReceipt(candidate: unknown): boolean {
    return validateReceipt(candidate).valid;
}
