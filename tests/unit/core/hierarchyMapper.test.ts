import { describe, it, expect } from 'vitest';
import { HeadingCursor, mapHeadingPath } from '../../../src/core/hierarchyMapper';
import { Heading } from '../../../src/core/types';

const h = (level: number, text: string, startOffset: number): Heading => ({ level, text, startOffset });

const outline: Heading[] = [
  h(1, 'Intro', 0),
  h(2, 'Background', 50),
  h(2, 'Scope', 200),
  h(1, 'Methods', 400),
];

const numbered: Heading[] = [
  h(1, 'Section 2', 0),
  h(2, 'Section 2.1', 20),
  h(3, 'Section 2.1.4', 40),
  h(1, 'Section 3', 100),
  h(2, 'Section 3.1', 120),
  h(3, 'Appendix', 140),
];

describe('mapHeadingPath', () => {
  it('returns an empty path before the first heading', () => {
    expect(mapHeadingPath([h(1, 'Intro', 10)], 5)).toEqual({});
    expect(mapHeadingPath([], 500)).toEqual({});
  });

  it('includes a heading that starts exactly at the chunk offset', () => {
    const headings = [h(1, 'Intro', 0), h(1, 'Part Two', 100)];
    expect(mapHeadingPath(headings, 99)).toEqual({ H1: 'Intro' });
    expect(mapHeadingPath(headings, 100)).toEqual({ H1: 'Part Two' });
  });

  it('keeps nested headings whose text continues the parent text', () => {
    expect(mapHeadingPath(numbered, 50)).toEqual({
      H1: 'Section 2',
      H2: 'Section 2.1',
      H3: 'Section 2.1.4',
    });
  });

  it('drops an H3 that does not start with its H2', () => {
    expect(mapHeadingPath(numbered, 150)).toEqual({ H1: 'Section 3', H2: 'Section 3.1' });
  });

  it('drops a stale H2 left over from the previous H1 branch', () => {
    expect(mapHeadingPath(numbered, 110)).toEqual({ H1: 'Section 3' });
    expect(mapHeadingPath(outline, 450)).toEqual({ H1: 'Methods' });
  });

  it('drops an H2 that does not start with the H1 text', () => {
    expect(mapHeadingPath(outline, 150)).toEqual({ H1: 'Intro' });
  });

  it('drops an H3 once its H2 has been dropped', () => {
    const headings = [h(1, 'A', 0), h(2, 'B', 10), h(3, 'B.1', 20)];
    expect(mapHeadingPath(headings, 30)).toEqual({ H1: 'A' });
  });

  it('drops sub-headings when there is no H1 to validate against', () => {
    const headings = [h(2, 'Sub A', 10)];
    expect(mapHeadingPath(headings, 10)).toEqual({});
    expect(mapHeadingPath(headings, 1000)).toEqual({});
    expect(mapHeadingPath(headings, 1000, { lineage: 'document-order' })).toEqual({});
  });

  it('lets the later of two headings at the same level and offset win', () => {
    expect(mapHeadingPath([h(1, 'First', 0), h(1, 'Second', 0)], 0)).toEqual({ H1: 'Second' });
  });

  it('tracks only levels up to maxDepth', () => {
    const headings = [h(1, 'A', 0), h(2, 'A.1', 10), h(3, 'A.1.a', 20), h(4, 'A.1.a.i', 30)];
    expect(mapHeadingPath(headings, 40)).toEqual({ H1: 'A', H2: 'A.1', H3: 'A.1.a' });
    expect(mapHeadingPath(headings, 40, { maxDepth: 4 })).toEqual({
      H1: 'A',
      H2: 'A.1',
      H3: 'A.1.a',
      H4: 'A.1.a.i',
    });
    expect(mapHeadingPath(headings, 40, { maxDepth: 1 })).toEqual({ H1: 'A' });
  });

  describe('document-order lineage', () => {
    const options = { lineage: 'document-order' as const };

    it('keeps a sub-heading that follows its parent', () => {
      expect(mapHeadingPath(outline, 150, options)).toEqual({ H1: 'Intro', H2: 'Background' });
      expect(mapHeadingPath(outline, 250, options)).toEqual({ H1: 'Intro', H2: 'Scope' });
    });

    it('drops a sub-heading that precedes the current parent', () => {
      expect(mapHeadingPath(outline, 450, options)).toEqual({ H1: 'Methods' });
    });

    it('keeps sub-headings regardless of their text', () => {
      expect(mapHeadingPath(numbered, 150, options)).toEqual({
        H1: 'Section 3',
        H2: 'Section 3.1',
        H3: 'Appendix',
      });
    });
  });

  it('never assigns a heading that starts after the chunk', () => {
    const byText = new Map(numbered.map(heading => [heading.text, heading]));
    for (let offset = 0; offset <= 200; offset += 5) {
      for (const lineage of ['text-prefix', 'document-order'] as const) {
        const path = mapHeadingPath(numbered, offset, { lineage });
        for (const text of Object.values(path)) {
          expect(byText.get(text ?? '')?.startOffset).toBeLessThanOrEqual(offset);
        }
      }
    }
  });

  it('returns the same mapping for repeated calls', () => {
    expect(mapHeadingPath(numbered, 50)).toEqual(mapHeadingPath(numbered, 50));
  });
});

describe('HeadingCursor', () => {
  it('matches mapHeadingPath for increasing offsets', () => {
    const offsets = [0, 10, 20, 40, 41, 99, 100, 120, 135, 140, 500];
    const cursor = new HeadingCursor(numbered);
    for (const offset of offsets) {
      expect(cursor.pathAt(offset)).toEqual(mapHeadingPath(numbered, offset));
    }
  });

  it('matches mapHeadingPath when an offset moves backwards', () => {
    const cursor = new HeadingCursor(outline, { lineage: 'document-order' });
    expect(cursor.pathAt(450)).toEqual({ H1: 'Methods' });
    expect(cursor.pathAt(150)).toEqual({ H1: 'Intro', H2: 'Background' });
    expect(cursor.pathAt(250)).toEqual(mapHeadingPath(outline, 250, { lineage: 'document-order' }));
  });

  it('returns an empty path before the first heading', () => {
    const cursor = new HeadingCursor([h(1, 'Intro', 30)]);
    expect(cursor.pathAt(0)).toEqual({});
    expect(cursor.pathAt(30)).toEqual({ H1: 'Intro' });
  });
});
