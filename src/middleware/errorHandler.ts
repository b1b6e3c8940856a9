// src/middleware/errorHandler.ts
import { Request, Response, NextFunction } from 'express';
import { ConversionError, UnsupportedFileTypeError } from '../core/documentConverter';
import { FetchError } from '../services/fetcher';

export function statusForError(error: unknown): number {
    if (error instanceof UnsupportedFileTypeError) return 415;
    if (error instanceof ConversionError) return 422;
    if (error instanceof FetchError) return 502;
    return 500;
}

export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction) {
    const status = statusForError(error);
    console.error(`Error in ${req.method} ${req.originalUrl}:`, error);

    if (res.headersSent) {
        res.end();
        return;
    }
    const message = status === 500 || !(error instanceof Error)
        ? 'An internal server error occurred.'
        : error.message;
    res.status(status).json({ error: message });
}
