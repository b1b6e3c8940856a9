// src/app.ts
import express from 'express';
import cors from 'cors';
import { createDocumentRouter } from './api/documents/document.routes';
import { DocumentChunker } from './api/documents/document.service';
import { errorHandler } from './middleware/errorHandler';

export function createApp(chunker: DocumentChunker) {
    const app = express();
    app.use(cors());

    // Middleware
    app.use(express.json());

    // API Routes
    app.use('/api/documents', createDocumentRouter(chunker));

    // Error Handler
    app.use(errorHandler);

    return app;
}
