// --- FILE: core/headingExtractor.ts ---
import { Heading } from './types';

// One or more '#' at the start of a line, a single separator, then the heading text.
const HEADING_PATTERN = /^(#+)\s(.*)/gm;

/**
 * Scans converted markdown for heading lines.
 * @returns Headings in document order, each carrying the absolute offset of its first '#'.
 */
export function extractHeadings(markdown: string): Heading[] {
    const headings: Heading[] = [];
    for (const match of markdown.matchAll(HEADING_PATTERN)) {
        headings.push({
            level: match[1].length,
            text: match[2],
            startOffset: match.index ?? 0,
        });
    }
    return headings;
}
