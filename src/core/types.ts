// --- FILE: core/types.ts ---

export interface Heading {
    level: number;
    text: string;
    // Offset of the first marker character within the converted document.
    startOffset: number;
}

export interface SplitChunk {
    content: string;
    startOffset: number;
}

export type HeadingKey = `H${number}`;

// Nearest enclosing heading text per level, e.g. { H1: 'Intro', H2: 'Intro: Scope' }.
export type HeadingPath = Partial<Record<HeadingKey, string>>;

export type ChunkMetadata = HeadingPath & {
    important_phrases?: string[];
};

export interface Chunk {
    content: string;
    metadata: ChunkMetadata;
}

// Decides whether a sub-heading still belongs to the heading tracked one level above it.
export type HeadingLineage = 'text-prefix' | 'document-order';

export type PipelineLogger = (message: string) => void;
