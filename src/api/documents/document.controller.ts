// src/api/documents/document.controller.ts
import { Request, Response, NextFunction } from 'express';
import * as documentService from './document.service';

export function createDocumentController(chunker: documentService.DocumentChunker) {
    async function chunkFromUrl(req: Request, res: Response, next: NextFunction) {
        try {
            const { url } = req.body ?? {};
            if (!documentService.isHttpUrl(url)) {
                res.status(400).json({ error: 'An http(s) "url" is required.' });
                return;
            }
            console.log(`Received chunking request for: ${url}`);

            const result = await documentService.chunkDocumentFromUrl(chunker, url);
            res.json(result);
        } catch (error) {
            next(error);
        }
    }

    async function chunkUpload(req: Request, res: Response, next: NextFunction) {
        try {
            if (!req.file) {
                res.status(400).json({ error: 'No file uploaded.' });
                return;
            }

            const result = await documentService.chunkUploadedDocument(chunker, req.file);
            res.json(result);
        } catch (error) {
            next(error);
        }
    }

    return { chunkFromUrl, chunkUpload };
}
