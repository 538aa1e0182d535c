import express, { type ErrorRequestHandler, type Request, type RequestHandler, type Response } from 'express';
import { pinoHttp } from 'pino-http';
import { HttpError, InvalidReceiptError, ReceiptNotFoundError } from './errors';
import { logError, type AppLogger } from './logger';
import type { GetPointsResponse, ProcessReceiptResponse } from './models/receipt';
import { pointsBreakdown, totalPoints } from './points';
import type { PointsRepository } from './repositories/PointsRepository';
import { validateReceipt } from './validation';

export interface AppOptions {
    logger: AppLogger;
    bodyLimit?: string;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

const handle = (fn: AsyncHandler): RequestHandler => (req, res, next) => {
    fn(req, res).catch(next);
};

// body-parser reports unparseable or oversized bodies as 4xx errors with a `type`.
function isBodyParserError(error: unknown): boolean {
    if (typeof error !== 'object' || error === null) return false;
    if (!('type' in error) || typeof error.type !== 'string') return false;
    const status = 'status' in error ? error.status : undefined;
    return typeof status === 'number' && status >= 400 && status < 500;
}

export function createApp(repo: PointsRepository, options: AppOptions) {
    const app = express();
    const { logger } = options;

    app.use(
        pinoHttp({
            logger,
            customLogLevel: (_req, res, err) => {
                if (err || res.statusCode >= 500) return 'error';
                if (res.statusCode >= 400) return 'warn';
                return 'info';
            },
        }),
    );
    // Bodies are read as JSON whatever their Content-Type.
    app.use(express.json({ limit: options.bodyLimit ?? '10mb', type: () => true }));

    app.post('/receipts/process', handle(async (req, res) => {
        const result = validateReceipt(req.body);
        if (!result.valid) {
            throw new InvalidReceiptError(result.issues);
        }

        const breakdown = pointsBreakdown(result.receipt);
        const points = totalPoints(breakdown);
        const { id } = await repo.insertPoints(points);

        req.log.debug({ event: 'receipt_processed', id, points, breakdown }, 'Receipt processed');
        const body: ProcessReceiptResponse = { id };
        res.status(200).json(body);
    }));

    app.get('/receipts/:id/points', handle(async (req, res) => {
        const { id } = req.params;
        const points = await repo.getPointsById(id);
        if (points === null) {
            throw new ReceiptNotFoundError(id);
        }

        const body: GetPointsResponse = { points };
        res.status(200).json(body);
    }));

    const errorHandler: ErrorRequestHandler = (err, req, res, next) => {
        const error: unknown = isBodyParserError(err) ? new InvalidReceiptError() : err;

        if (res.headersSent) {
            next(error);
            return;
        }

        if (error instanceof HttpError) {
            if (error instanceof InvalidReceiptError && error.issues.length > 0) {
                req.log.debug({ event: 'receipt_rejected', issues: error.issues }, 'Receipt failed validation');
            }
            res.status(error.status).type('text/plain').send(error.message);
            return;
        }

        logError(req.log, error, { method: req.method, url: req.originalUrl });
        res.status(500).type('text/plain').send('Internal server error');
    };
    app.use(errorHandler);

    return app;
}
