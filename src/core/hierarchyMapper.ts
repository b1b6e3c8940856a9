// --- FILE: core/hierarchyMapper.ts ---
import { Heading, HeadingKey, HeadingLineage, HeadingPath } from './types';

export interface HierarchyOptions {
    // Deepest heading level carried into a chunk's metadata.
    maxDepth?: number;
    lineage?: HeadingLineage;
}

export const DEFAULT_MAX_DEPTH = 3;

type LevelSlots = Map<number, Heading>;

function headingKey(level: number): HeadingKey {
    return `H${level}`;
}

function belongsTo(child: Heading, parent: Heading, lineage: HeadingLineage): boolean {
    if (lineage === 'document-order') {
        return child.startOffset > parent.startOffset;
    }
    return child.text.startsWith(parent.text);
}

/**
 * Turns the latest heading seen at each level into a HeadingPath.
 * Validation runs top-down: a level survives only when the level above it survived
 * and the lineage rule accepts it, so a leftover sub-heading from an earlier branch
 * never reaches the chunk.
 */
function resolvePath(slots: LevelSlots, maxDepth: number, lineage: HeadingLineage): HeadingPath {
    const path: HeadingPath = {};
    const top = slots.get(1);
    if (!top) {
        return path;
    }
    path[headingKey(1)] = top.text;

    let parent = top;
    for (let level = 2; level <= maxDepth; level++) {
        const current = slots.get(level);
        if (!current || !belongsTo(current, parent, lineage)) {
            break;
        }
        path[headingKey(level)] = current.text;
        parent = current;
    }
    return path;
}

function recordHeading(slots: LevelSlots, heading: Heading, maxDepth: number): void {
    if (heading.level <= maxDepth) {
        slots.set(heading.level, heading);
    }
}

/**
 * Computes the heading lineage in effect at `chunkOffset`.
 * Headings must be sorted by start offset; a heading that starts exactly at the
 * chunk offset is included. Pure: no state survives between calls.
 */
export function mapHeadingPath(
    headings: readonly Heading[],
    chunkOffset: number,
    options: HierarchyOptions = {},
): HeadingPath {
    const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    const slots: LevelSlots = new Map();

    for (const heading of headings) {
        if (heading.startOffset > chunkOffset) {
            break;
        }
        recordHeading(slots, heading, maxDepth);
    }
    return resolvePath(slots, maxDepth, options.lineage ?? 'text-prefix');
}

/**
 * Forward cursor over a sorted heading list for chunks that arrive in increasing
 * offset order. Each heading is visited once across the whole document instead of
 * once per chunk; results are identical to mapHeadingPath.
 */
export class HeadingCursor {
    private readonly maxDepth: number;
    private readonly lineage: HeadingLineage;
    private slots: LevelSlots = new Map();
    private next = 0;
    private lastOffset = -1;

    constructor(private readonly headings: readonly Heading[], options: HierarchyOptions = {}) {
        this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
        this.lineage = options.lineage ?? 'text-prefix';
    }

    pathAt(chunkOffset: number): HeadingPath {
        if (chunkOffset < this.lastOffset) {
            this.slots = new Map();
            this.next = 0;
        }
        this.lastOffset = chunkOffset;

        while (this.next < this.headings.length && this.headings[this.next].startOffset <= chunkOffset) {
            recordHeading(this.slots, this.headings[this.next], this.maxDepth);
            this.next++;
        }
        return resolvePath(this.slots, this.maxDepth, this.lineage);
    }
}
