// src/api/documents/document.service.ts
import fs from 'fs/promises';
import { Chunk } from '../../core/types';

// The slice of DocumentPipeline the HTTP layer needs.
export interface DocumentChunker {
    loadAndChunkInBackground(documentUrl: string): Promise<Chunk[]>;
    chunkFile(filePath: string, originalFilename: string): Promise<Chunk[]>;
}

export interface UploadedDocument {
    path: string;
    originalname: string;
}

export interface ChunkResponse {
    count: number;
    chunks: Chunk[];
}

export function isHttpUrl(value: unknown): value is string {
    if (typeof value !== 'string' || !URL.canParse(value)) {
        return false;
    }
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
}

export async function chunkDocumentFromUrl(chunker: DocumentChunker, documentUrl: string): Promise<ChunkResponse> {
    const chunks = await chunker.loadAndChunkInBackground(documentUrl);
    return { count: chunks.length, chunks };
}

export async function chunkUploadedDocument(chunker: DocumentChunker, file: UploadedDocument): Promise<ChunkResponse> {
    try {
        const chunks = await chunker.chunkFile(file.path, file.originalname);
        return { count: chunks.length, chunks };
    } finally {
        await fs.rm(file.path, { force: true });
        console.log(`[document.service] Removed upload ${file.path}`);
    }
}
