import { describe, it, expect } from 'vitest';
import { PdfTextRun, pdfLayoutToMarkdown } from '../../../src/core/pdfMarkdown';
import { extractEmphasis } from '../../../src/core/emphasisExtractor';
import { extractHeadings } from '../../../src/core/headingExtractor';

// A whole line set in one run at the left margin.
const line = (text: string, y: number, options: { size?: number; bold?: boolean } = {}): PdfTextRun => ({
  text,
  x: 72,
  y,
  width: text.length * 5,
  fontSize: options.size ?? 10,
  bold: options.bold ?? false,
  endsLine: true,
});

const run = (text: string, x: number, width: number, bold = false, endsLine = false, y = 700): PdfTextRun => ({
  text,
  x,
  y,
  width,
  fontSize: 10,
  bold,
  endsLine,
});

describe('pdfLayoutToMarkdown', () => {
  it('ranks font sizes larger than the body text as heading levels', () => {
    const page = [
      line('Policy Wording', 760, { size: 20 }),
      line('Section One', 730, { size: 14 }),
      line('The cover applies to', 710),
      line('insured persons.', 698),
      line('Claims', 670, { size: 14 }),
      line('Notify us first.', 650),
    ];

    expect(pdfLayoutToMarkdown([page])).toBe(
      [
        '# Policy Wording',
        '## Section One',
        'The cover applies to\ninsured persons.',
        '## Claims',
        'Notify us first.',
      ].join('\n\n'),
    );
  });

  it('joins a heading wrapped over two lines', () => {
    const page = [
      line('Schedule of', 760, { size: 16 }),
      line('Benefits', 742, { size: 16 }),
      line('Body text here is long enough.', 710),
    ];

    expect(pdfLayoutToMarkdown([page])).toBe('# Schedule of Benefits\n\nBody text here is long enough.');
  });

  it('wraps bold runs in ** markers', () => {
    const page = [
      run('Claims must be made within ', 72, 130),
      run('30 days', 202, 35, true),
      run(' of discharge.', 237, 60, false, true),
      run('Sum', 72, 20, true, false, 680),
      run(' ', 92, 3, false, false, 680),
      run('Insured', 95, 35, true, false, 680),
      run(' is the limit.', 130, 60, false, true, 680),
    ];

    const markdown = pdfLayoutToMarkdown([page]);

    expect(markdown).toBe('Claims must be made within **30 days** of discharge.\n\n**Sum Insured** is the limit.');
    expect(extractEmphasis(markdown)).toEqual(['30 days', 'Sum Insured']);
  });

  it('inserts a space between runs separated by a horizontal gap', () => {
    const page = [run('Waiting', 72, 35), run('period', 109, 30), run('s.', 139, 8, false, true)];

    expect(pdfLayoutToMarkdown([page])).toBe('Waiting periods.');
  });

  it('starts a new paragraph on each page', () => {
    expect(pdfLayoutToMarkdown([[line('First page text.', 700)], [line('Second page text.', 700)]])).toBe(
      'First page text.\n\nSecond page text.',
    );
  });

  it('falls back to outline numbering and capitals when the PDF uses one font size', () => {
    const page = [
      line('GENERAL TERMS', 700),
      line('This policy covers things.', 688),
      line('2.1 Scope of Cover', 676),
      line('Some text here.', 664),
      line('3.2.1. Waiting Periods', 640),
      line('Read the schedule.', 628),
    ];

    expect(pdfLayoutToMarkdown([page])).toBe(
      [
        '# GENERAL TERMS',
        'This policy covers things.',
        '## 2.1 Scope of Cover',
        'Some text here.',
        '### 3.2.1. Waiting Periods',
        'Read the schedule.',
      ].join('\n\n'),
    );
  });

  it('does not promote lines that continue a wrapped sentence', () => {
    const page = [
      line('SECTION A', 700),
      line('The insured must notify the insurer within', 688),
      line('30 Days from the date of admission', 676),
      line('and provide', 664),
      line('IN WITNESS WHEREOF THE PARTIES', 652),
      line('agree.', 640),
    ];

    const markdown = pdfLayoutToMarkdown([page]);

    expect(extractHeadings(markdown)).toEqual([{ level: 1, text: 'SECTION A', startOffset: 0 }]);
    expect(markdown).toBe(
      '# SECTION A\n\nThe insured must notify the insurer within\n30 Days from the date of admission\nand provide\nIN WITNESS WHEREOF THE PARTIES\nagree.',
    );
  });

  it('leaves short capitals and years alone', () => {
    const page = [line('ABC', 700), line('2023 Annual Report', 676), line('Total due: 1,000.', 652)];

    expect(pdfLayoutToMarkdown([page])).toBe('ABC\n\n2023 Annual Report\n\nTotal due: 1,000.');
  });

  it('returns an empty string for a PDF without text', () => {
    expect(pdfLayoutToMarkdown([[], [run('', 0, 0, false, true)]])).toBe('');
  });
});
