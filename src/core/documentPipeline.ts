// --- FILE: core/documentPipeline.ts ---
import path from 'path';
import PQueue from 'p-queue';
import { DocumentFetcher, fetchDocument } from '../services/fetcher';
import { withTempFile } from '../services/tempFile';
import { DocumentConverter, SUPPORTED_EXTENSIONS, defaultConverter } from './documentConverter';
import { withEmphasis } from './emphasisExtractor';
import { extractHeadings } from './headingExtractor';
import { HeadingCursor } from './hierarchyMapper';
import { RecursiveTextSplitter, SplitterOptions, TextSplitter } from './textSplitter';
import { Chunk, HeadingLineage, PipelineLogger } from './types';

export interface PipelineConfig extends SplitterOptions {
    maxHeadingDepth: number;
    headingLineage: HeadingLineage;
    fetchTimeoutMs: number;
    backgroundConcurrency: number;
}

export interface PipelineCollaborators {
    fetcher?: DocumentFetcher;
    converter?: DocumentConverter;
    splitter?: TextSplitter;
    logger?: PipelineLogger;
}

const DEFAULT_FILENAME = 'document.pdf';

const CONTENT_TYPE_EXTENSIONS = new Map<string, string>([
    ['application/pdf', '.pdf'],
    ['application/vnd.openxmlformats-officedocument.wordprocessingml.document', '.docx'],
    ['text/markdown', '.md'],
    ['text/x-markdown', '.md'],
    ['text/plain', '.txt'],
]);

/**
 * Picks the filename (and so the converter) for a downloaded document:
 * the Content-Type header first, then the URL path extension, then PDF.
 */
export function resolveDocumentFilename(documentUrl: string, contentType?: string): string {
    const mimeType = contentType?.split(';')[0].trim().toLowerCase();
    const fromHeader = mimeType ? CONTENT_TYPE_EXTENSIONS.get(mimeType) : undefined;
    if (fromHeader) {
        return `document${fromHeader}`;
    }

    if (URL.canParse(documentUrl)) {
        const extension = path.posix.extname(new URL(documentUrl).pathname).toLowerCase();
        if (SUPPORTED_EXTENSIONS.some(supported => supported === extension)) {
            return `document${extension}`;
        }
    }
    return DEFAULT_FILENAME;
}

/**
 * Fetch → convert → extract headings → split → map heading lineage → extract emphasis.
 * Holds no per-document state, so one instance can serve concurrent invocations.
 */
export class DocumentPipeline {
    private readonly fetcher: DocumentFetcher;
    private readonly converter: DocumentConverter;
    private readonly splitter: TextSplitter;
    private readonly logger: PipelineLogger;
    private readonly queue: PQueue;

    constructor(private readonly config: PipelineConfig, collaborators: PipelineCollaborators = {}) {
        this.fetcher = collaborators.fetcher ?? fetchDocument;
        this.converter = collaborators.converter ?? defaultConverter;
        this.splitter = collaborators.splitter ?? new RecursiveTextSplitter(config);
        this.logger = collaborators.logger ?? console.log;
        this.queue = new PQueue({ concurrency: config.backgroundConcurrency });
    }

    async loadAndChunk(documentUrl: string): Promise<Chunk[]> {
        const startedAt = Date.now();

        this.logger(`[pipeline] Fetching document from URL: ${documentUrl}`);
        const { data, contentType } = await this.fetcher(documentUrl, { timeoutMs: this.config.fetchTimeoutMs });
        const filename = resolveDocumentFilename(documentUrl, contentType);

        const markdown = await withTempFile(data, filename, filePath => this.convert(filePath, filename));
        const chunks = await this.chunkMarkdown(markdown);

        this.logger(`[pipeline] Successfully created ${chunks.length} structured chunks in ${Date.now() - startedAt}ms.`);
        return chunks;
    }

    // Same contract as loadAndChunk, run on the pipeline's background queue.
    loadAndChunkInBackground(documentUrl: string): Promise<Chunk[]> {
        this.logger(`[pipeline] Queued ${documentUrl} (${this.queue.size} waiting, ${this.queue.pending} running).`);
        return this.queue.add(() => this.loadAndChunk(documentUrl));
    }

    // The caller owns `filePath`; it is not removed.
    async chunkFile(filePath: string, originalFilename: string): Promise<Chunk[]> {
        const markdown = await this.convert(filePath, originalFilename);
        return this.chunkMarkdown(markdown);
    }

    async chunkMarkdown(markdown: string): Promise<Chunk[]> {
        const headings = extractHeadings(markdown);
        this.logger(`[pipeline] Found ${headings.length} headings.`);

        const pieces = await this.splitter.split(markdown);
        const cursor = new HeadingCursor(headings, {
            maxDepth: this.config.maxHeadingDepth,
            lineage: this.config.headingLineage,
        });

        // The start offset is only needed for the lineage lookup and is not carried into the output.
        return pieces.map(piece => ({
            content: piece.content,
            metadata: withEmphasis(cursor.pathAt(piece.startOffset), piece.content),
        }));
    }

    private convert(filePath: string, filename: string): Promise<string> {
        this.logger(`[pipeline] Converting ${filename} to Markdown...`);
        return this.converter.convert(filePath, filename);
    }
}
