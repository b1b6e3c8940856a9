// src/api/documents/document.routes.ts
import { Router } from 'express';
import multer from 'multer';
import { createDocumentController } from './document.controller';
import { DocumentChunker } from './document.service';

export function createDocumentRouter(chunker: DocumentChunker): Router {
    const router = Router();
    const upload = multer({ dest: 'uploads/' });
    const documentController = createDocumentController(chunker);

    router.post('/chunk', documentController.chunkFromUrl);
    router.post('/upload', upload.single('document'), documentController.chunkUpload);

    return router;
}
