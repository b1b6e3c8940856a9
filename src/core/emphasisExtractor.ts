// --- FILE: core/emphasisExtractor.ts ---
import { ChunkMetadata } from './types';

const BOLD_PATTERN = /\*\*(.*?)\*\*/gs;

/**
 * Returns the text of every `**bold**` span in order of appearance,
 * with whitespace runs (newlines included) collapsed to single spaces.
 */
export function extractEmphasis(content: string): string[] {
    return Array.from(content.matchAll(BOLD_PATTERN), match => match[1].replace(/\s+/g, ' ').trim());
}

// Absence of `important_phrases` means no emphasis; it is never set to an empty list.
export function withEmphasis(metadata: ChunkMetadata, content: string): ChunkMetadata {
    const phrases = extractEmphasis(content);
    if (phrases.length === 0) {
        return metadata;
    }
    return { ...metadata, important_phrases: phrases };
}
