export class HttpError extends Error {
    constructor(
        readonly status: number,
        message: string,
    ) {
        super(message);
        this.name = new.target.name;
    }
}

export class InvalidReceiptError extends HttpError {
    constructor(readonly issues: string[] = []) {
        super(400, 'Invalid receipt format');
    }
}

export class ReceiptNotFoundError extends HttpError {
    constructor(readonly receiptId: string) {
        super(404, 'Receipt not found');
    }
}
