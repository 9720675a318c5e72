import { PDFDocument, PDFFont, PDFPage, StandardFonts, rgb } from 'pdf-lib';
import { safeLogger } from '../../security/safeLogger';
import { Block, layoutPages, PAGE, PlacedLine, TextMeasure, TextRun } from './layout';

export type Fonts = { regular: PDFFont; bold: PDFFont };

const REPLACEMENTS: Record<string, string> = {
  '≥': '>=',
  '≤': '<=',
  '→': '->',
};

function canEncode(font: PDFFont, text: string): boolean {
  try {
    font.encodeText(text);
    return true;
  } catch {
    return false;
  }
}

/**
 * Maps the text onto what the standard (WinAnsi) fonts can draw; anything else becomes '?'.
 */
export function toEncodable(font: PDFFont, text: string): string {
  return Array.from(text, (ch) => {
    if (canEncode(font, ch)) return ch;
    const replacement = REPLACEMENTS[ch];
    return replacement !== undefined && canEncode(font, replacement) ? replacement : '?';
  }).join('');
}

/**
 * Width as drawn: text the font cannot encode is measured after replacement.
 */
export function measureWith(fonts: Fonts): TextMeasure {
  return (text, bold, size) => {
    const font = bold ? fonts.bold : fonts.regular;
    return font.widthOfTextAtSize(toEncodable(font, text), size);
  };
}

function drawRuns(page: PDFPage, line: PlacedLine, runs: readonly TextRun[], fonts: Fonts) {
  let x = line.x;
  for (const run of runs) {
    const font = run.bold ? fonts.bold : fonts.regular;
    page.drawText(run.text, { x, y: line.y, size: line.size, font, color: rgb(0, 0, 0) });
    x += font.widthOfTextAtSize(run.text, line.size);
  }
}

function drawLine(page: PDFPage, line: PlacedLine, fonts: Fonts) {
  const encodable = line.runs.every((run) => canEncode(run.bold ? fonts.bold : fonts.regular, run.text));
  if (encodable) {
    drawRuns(page, line, line.runs, fonts);
    return;
  }
  // Whole line as plain text, regular weight.
  const text = line.runs.map((run) => run.text).join('');
  safeLogger.info('reports.pdf.line_fallback', { y: line.y, length: text.length });
  drawRuns(page, line, [{ text: toEncodable(fonts.regular, text), bold: false }], fonts);
}

/**
 * Lays the blocks out against the embedded fonts' glyph widths and draws them.
 */
export async function renderPdf(blocks: readonly Block[], meta: { title: string }): Promise<Uint8Array> {
  const pdf = await PDFDocument.create();
  pdf.setTitle(meta.title);
  pdf.setCreator('change-impact-api');

  const fonts: Fonts = {
    regular: await pdf.embedFont(StandardFonts.Helvetica),
    bold: await pdf.embedFont(StandardFonts.HelveticaBold),
  };

  for (const laidOut of layoutPages(blocks, { measure: measureWith(fonts) })) {
    const page = pdf.addPage([PAGE.width, PAGE.height]);
    for (const line of laidOut.lines) {
      drawLine(page, line, fonts);
    }
  }

  return pdf.save();
}
