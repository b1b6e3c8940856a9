// --- FILE: core/textSplitter.ts ---
import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters';
import { SplitChunk } from './types';

export class SplitterError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SplitterError';
    }
}

export interface SplitterOptions {
    chunkSize: number;
    chunkOverlap: number;
}

export interface TextSplitter {
    split(text: string): Promise<SplitChunk[]>;
}

export function validateSplitterOptions({ chunkSize, chunkOverlap }: SplitterOptions): void {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
        throw new SplitterError(`chunkSize must be a positive integer, got ${chunkSize}.`);
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
        throw new SplitterError(`chunkOverlap must be a non-negative integer, got ${chunkOverlap}.`);
    }
    if (chunkOverlap >= chunkSize) {
        throw new SplitterError(`chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize}).`);
    }
}

/**
 * Recovers the start offset of each split piece within `text`.
 * Each piece is searched for from where the previous one ended minus the overlap, but
 * never before the previous start. A short piece that is a prefix of the next one
 * shares its offset, so offsets never decrease.
 * @throws {SplitterError} if a piece cannot be found in the source text.
 */
export function locatePieces(text: string, pieces: readonly string[], chunkOverlap: number): SplitChunk[] {
    const located: SplitChunk[] = [];
    let previousStart = 0;
    let previousLength = 0;

    for (const piece of pieces) {
        const searchFrom = Math.max(previousStart, previousStart + previousLength - chunkOverlap);
        const startOffset = text.indexOf(piece, searchFrom);
        if (startOffset === -1) {
            throw new SplitterError(`Could not locate chunk ${located.length + 1} in the source text after offset ${searchFrom}.`);
        }
        located.push({ content: piece, startOffset });
        previousStart = startOffset;
        previousLength = piece.length;
    }
    return located;
}

/**
 * Size-based splitter backed by langchain's RecursiveCharacterTextSplitter,
 * reporting where every chunk starts in the input.
 */
export class RecursiveTextSplitter implements TextSplitter {
    private readonly splitter: RecursiveCharacterTextSplitter;

    constructor(private readonly options: SplitterOptions) {
        validateSplitterOptions(options);
        this.splitter = new RecursiveCharacterTextSplitter({
            chunkSize: options.chunkSize,
            chunkOverlap: options.chunkOverlap,
        });
    }

    async split(text: string): Promise<SplitChunk[]> {
        const pieces = await this.splitter.splitText(text);
        return locatePieces(text, pieces, this.options.chunkOverlap);
    }
}
