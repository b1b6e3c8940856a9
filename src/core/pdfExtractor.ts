// --- FILE: core/pdfExtractor.ts ---
import * as pdfjs from 'pdfjs-dist';
import { PdfTextRun } from './pdfMarkdown';

const BOLD_FONT_NAME = /bold|black|heavy|semibold|demi/i;

interface PdfTextItem {
    str: string;
    transform: number[];
    width: number;
    fontName: string;
    hasEOL: boolean;
}

interface FontObjects {
    has(id: string): boolean;
    get(id: string): unknown;
}

function isBoldFont(fonts: FontObjects, fontName: string): boolean {
    if (!fonts.has(fontName)) {
        return false;
    }
    const font = fonts.get(fontName);
    if (typeof font !== 'object' || font === null) {
        return false;
    }
    if ('bold' in font && font.bold === true) {
        return true;
    }
    return 'name' in font && typeof font.name === 'string' && BOLD_FONT_NAME.test(font.name);
}

function toRun(item: PdfTextItem, fonts: FontObjects): PdfTextRun {
    const [, , skewX, scaleY, x, y] = item.transform;
    return {
        text: item.str,
        x,
        y,
        width: item.width,
        fontSize: Math.hypot(skewX, scaleY),
        bold: isBoldFont(fonts, item.fontName),
        endsLine: item.hasEOL,
    };
}

/**
 * Reads the positioned text runs of every page, with font size and weight.
 * @param data The PDF bytes. pdf.js rejects a Node Buffer, so pass a plain Uint8Array.
 */
export async function extractPdfRuns(data: Uint8Array): Promise<PdfTextRun[][]> {
    const pdf = await pdfjs.getDocument({
        data,
        disableFontFace: true,
        isEvalSupported: false,
        verbosity: pdfjs.VerbosityLevel.ERRORS,
    }).promise;

    try {
        const pages: PdfTextRun[][] = [];
        for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
            const page = await pdf.getPage(pageNumber);
            // Font names reach commonObjs only once the operator list is built.
            await page.getOperatorList();
            const content = await page.getTextContent();
            pages.push(content.items.flatMap(item => ('str' in item ? [toRun(item, page.commonObjs)] : [])));
        }
        return pages;
    } finally {
        await pdf.destroy();
    }
}
