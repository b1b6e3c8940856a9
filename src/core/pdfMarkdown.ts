// --- FILE: core/pdfMarkdown.ts ---

/** One positioned text item from a PDF page, in page coordinates (y grows upwards). */
export interface PdfTextRun {
    text: string;
    x: number;
    y: number;
    width: number;
    fontSize: number;
    bold: boolean;
    /** The run closes its line. */
    endsLine: boolean;
}

interface Segment {
    text: string;
    bold: boolean;
}

interface PdfLine {
    segments: Segment[];
    fontSize: number;
    y: number;
    /** Vertical distance from the previous line on the same page; null on a new page. */
    gap: number | null;
}

type Block =
    | { kind: 'heading'; level: number; text: string }
    | { kind: 'paragraph'; lines: string[] };

interface PreviousLine {
    text: string;
    heading: boolean;
}

// Fractions of the font size.
const SAME_LINE_TOLERANCE = 0.5;
const WORD_GAP = 0.15;
const PARAGRAPH_GAP = 1.5;
const MAX_HEADING_LEVEL = 6;

// "2", "2.1", "2.1.3." followed by a capitalised title, e.g. "2.1 Scope of Cover".
const OUTLINE_HEADING = /^(\d{1,3}(?:\.\d{1,3}){0,5})\.?\s+\p{Lu}.{0,118}$/u;
// A short standalone line in capitals, e.g. "GENERAL TERMS AND CONDITIONS".
const CAPS_HEADING = /^[\p{Lu}\d][\p{Lu}\d\s,&'()/:-]{2,78}$/u;
const SENTENCE_END = /[.,;]$/;
const CLAUSE_END = /[.!?:;]$/;
const MIN_CAPS_LETTERS = 4;

function needsSpace(previous: PdfTextRun, run: PdfTextRun): boolean {
    if (/\s$/.test(previous.text) || /^\s/.test(run.text)) {
        return false;
    }
    return run.x - (previous.x + previous.width) > run.fontSize * WORD_GAP;
}

function appendText(line: PdfLine, text: string, bold: boolean): void {
    const last: Segment | undefined = line.segments[line.segments.length - 1];
    // Whitespace between two bold runs stays inside the emphasis.
    const emphasised = text.trim() === '' && last ? last.bold : bold;
    if (last && last.bold === emphasised) {
        last.text += text;
    } else {
        line.segments.push({ text, bold: emphasised });
    }
}

function groupLines(runs: readonly PdfTextRun[]): PdfLine[] {
    const lines: PdfLine[] = [];
    let current: PdfLine | null = null;
    let previousRun: PdfTextRun | null = null;
    let lineOpen = false;

    for (const run of runs) {
        if (run.text === '') {
            if (run.endsLine) {
                lineOpen = false;
            }
            continue;
        }
        if (current && previousRun && lineOpen && Math.abs(run.y - current.y) <= current.fontSize * SAME_LINE_TOLERANCE) {
            if (needsSpace(previousRun, run)) {
                appendText(current, ' ', false);
            }
        } else {
            current = {
                segments: [],
                fontSize: run.fontSize,
                y: run.y,
                gap: current ? Math.abs(current.y - run.y) : null,
            };
            lines.push(current);
        }
        appendText(current, run.text, run.bold);
        previousRun = run;
        lineOpen = !run.endsLine;
    }
    return lines;
}

function plainText(line: PdfLine): string {
    return line.segments.map(segment => segment.text).join('').replace(/\s+/g, ' ').trim();
}

function emphasize(text: string): string {
    const match = /^(\s*)(.*?)(\s*)$/s.exec(text);
    if (!match || match[2] === '') {
        return text;
    }
    return `${match[1]}**${match[2]}**${match[3]}`;
}

function renderLine(line: PdfLine): string {
    return line.segments
        .map(segment => (segment.bold ? emphasize(segment.text) : segment.text))
        .join('')
        .replace(/[ \t]+/g, ' ')
        .trim();
}

function roundSize(size: number): number {
    return Math.round(size * 2) / 2;
}

/**
 * The most used font size (by characters) is body text. Every larger size is a heading
 * level, the largest being level 1.
 */
function headingLevelsBySize(lines: readonly PdfLine[]): Map<number, number> {
    const charsBySize = new Map<number, number>();
    for (const line of lines) {
        const size = roundSize(line.fontSize);
        charsBySize.set(size, (charsBySize.get(size) ?? 0) + plainText(line).length);
    }

    let bodySize = 0;
    let bodyChars = -1;
    for (const [size, chars] of charsBySize) {
        if (chars > bodyChars) {
            bodySize = size;
            bodyChars = chars;
        }
    }

    const larger = [...charsBySize.keys()]
        .filter(size => size > bodySize)
        .sort((a, b) => b - a)
        .slice(0, MAX_HEADING_LEVEL);
    return new Map(larger.map((size, index) => [size, index + 1]));
}

/**
 * Heading rules for PDFs set in a single font size: outline numbering (depth = number of
 * segments) or a line in capitals. A line that continues an unfinished sentence is never
 * a heading.
 */
function textHeadingLevel(line: string, previous: PreviousLine | null): number | null {
    if (previous && !previous.heading && !CLAUSE_END.test(previous.text)) {
        return null;
    }
    if (SENTENCE_END.test(line)) {
        return null;
    }
    const outline = OUTLINE_HEADING.exec(line);
    if (outline) {
        return outline[1].split('.').filter(part => part.length > 0).length;
    }
    if (CAPS_HEADING.test(line) && (line.match(/\p{Lu}/gu) ?? []).length >= MIN_CAPS_LETTERS) {
        return 1;
    }
    return null;
}

function renderBlock(block: Block): string {
    return block.kind === 'heading'
        ? `${'#'.repeat(block.level)} ${block.text}`
        : block.lines.join('\n');
}

/**
 * Builds markdown from the text runs of each page: larger font sizes become '#'
 * headings, bold runs become '**' spans, and a vertical gap wider than the line
 * spacing starts a new paragraph.
 */
export function pdfLayoutToMarkdown(pages: readonly (readonly PdfTextRun[])[]): string {
    const lines = pages.flatMap(groupLines);
    const levelsBySize = headingLevelsBySize(lines);
    const sizedHeadings = levelsBySize.size > 0;
    const blocks: Block[] = [];
    let previous: PreviousLine | null = null;

    for (const line of lines) {
        const text = plainText(line);
        if (text === '') {
            continue;
        }
        const startsParagraph = line.gap === null || line.gap > line.fontSize * PARAGRAPH_GAP;
        const level: number | null = sizedHeadings
            ? levelsBySize.get(roundSize(line.fontSize)) ?? null
            : textHeadingLevel(text, startsParagraph ? null : previous);
        const last: Block | undefined = blocks[blocks.length - 1];

        if (level !== null) {
            if (sizedHeadings && !startsParagraph && last?.kind === 'heading' && last.level === level) {
                last.text = `${last.text} ${text}`;
            } else {
                blocks.push({ kind: 'heading', level, text });
            }
        } else if (!startsParagraph && last?.kind === 'paragraph') {
            last.lines.push(renderLine(line));
        } else {
            blocks.push({ kind: 'paragraph', lines: [renderLine(line)] });
        }
        previous = { text, heading: level !== null };
    }

    return blocks.map(renderBlock).join('\n\n');
}
