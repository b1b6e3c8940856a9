// --- FILE: core/documentConverter.ts ---
import fs from 'fs/promises';
import path from 'path';
import mammoth from 'mammoth';
import TurndownService from 'turndown';
import { extractPdfRuns } from './pdfExtractor';
import { pdfLayoutToMarkdown } from './pdfMarkdown';

export class ConversionError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ConversionError';
    }
}

export class UnsupportedFileTypeError extends ConversionError {
    constructor(message: string) {
        super(message);
        this.name = 'UnsupportedFileTypeError';
    }
}

export interface DocumentConverter {
    convert(filePath: string, originalFilename: string): Promise<string>;
}

export const SUPPORTED_EXTENSIONS = ['.pdf', '.docx', '.md', '.markdown', '.txt'] as const;

// ATX headings and '**' strong keep the output in the marker style the heading and
// emphasis extractors scan for.
const turndownService = new TurndownService({
    headingStyle: 'atx',
    strongDelimiter: '**',
});

// Paragraphs that only hold bold text are headings in documents that skip heading styles.
turndownService.addRule('strongIsHeading', {
    filter: node => {
        if (node.nodeName !== 'P' || node.childNodes.length !== 1) {
            return false;
        }
        const child = node.firstChild;
        if (!child || child.nodeName !== 'STRONG') {
            return false;
        }
        return (child.textContent || '').length < 200;
    },
    replacement: content => `## ${content.replace(/\*\*/g, '').trim()}\n\n`,
});

const DOCX_STYLE_MAP = [
    "p[style-name='Heading 1'] => h1:fresh",
    "p[style-name='Heading 2'] => h2:fresh",
    "p[style-name='Heading 3'] => h3:fresh",
    "p[style-name='heading 1'] => h1:fresh",
    "p[style-name='heading 2'] => h2:fresh",
    "p[style-name='heading 3'] => h3:fresh",
];

async function convertBuffer(buffer: Buffer, extension: string): Promise<string> {
    switch (extension) {
        case '.pdf': {
            const pages = await extractPdfRuns(new Uint8Array(buffer));
            return pdfLayoutToMarkdown(pages);
        }
        case '.docx': {
            const htmlResult = await mammoth.convertToHtml({ buffer }, { styleMap: DOCX_STYLE_MAP });
            return turndownService.turndown(htmlResult.value);
        }
        default:
            return buffer.toString('utf-8');
    }
}

/**
 * Converts a file on disk to markdown with '#' heading markers and '**' emphasis.
 * @param filePath The path to the file on disk (usually a temporary file).
 * @param originalFilename The name the extension is taken from.
 * @throws {UnsupportedFileTypeError} if the extension is not supported.
 * @throws {ConversionError} if the file cannot be read or parsed.
 */
export async function convertFileToMarkdown(filePath: string, originalFilename: string): Promise<string> {
    const extension = path.extname(originalFilename).toLowerCase();
    if (!SUPPORTED_EXTENSIONS.some(supported => supported === extension)) {
        throw new UnsupportedFileTypeError(`File type "${extension || originalFilename}" is not supported for conversion.`);
    }

    try {
        const buffer = await fs.readFile(filePath);
        return await convertBuffer(buffer, extension);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConversionError(`Failed to convert "${originalFilename}": ${reason}`, { cause: error });
    }
}

export const defaultConverter: DocumentConverter = {
    convert: convertFileToMarkdown,
};
