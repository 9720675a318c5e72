export type TextRun = {
  text: string;
  bold: boolean;
};

export type Block =
  | { kind: 'line'; runs: TextRun[]; x: number; size: number; advance: number }
  | { kind: 'paragraph'; runs: TextRun[]; x: number; size: number; leading: number; width: number }
  | { kind: 'gap'; height: number };

export type PlacedLine = {
  x: number;
  y: number;
  size: number;
  runs: TextRun[];
};

export type LaidOutPage = {
  lines: PlacedLine[];
};

// US Letter, in points.
export const PAGE = {
  width: 612,
  height: 792,
  top: 50,
  bottom: 70,
  right: 50,
} as const;

export const BODY_SIZE = 10;
export const BODY_LEADING = 12;
export const LIST_WIDTH = 90;
export const PARAGRAPH_WIDTH = 95;

// Drawn width of `text` in points.
export type TextMeasure = (text: string, bold: boolean, size: number) => number;

export const plain = (text: string): TextRun[] => [{ text, bold: false }];
export const strong = (text: string): TextRun[] => [{ text, bold: true }];

export function title(text: string): Block {
  return { kind: 'line', runs: strong(text), x: 50, size: 16, advance: 30 };
}

export function heading(text: string, options: { x?: number; size?: number; advance?: number } = {}): Block {
  return { kind: 'line', runs: strong(text), x: options.x ?? 50, size: options.size ?? 12, advance: options.advance ?? 18 };
}

export function textLine(text: string, options: { x?: number; advance?: number } = {}): Block {
  return { kind: 'line', runs: plain(text), x: options.x ?? 60, size: BODY_SIZE, advance: options.advance ?? 16 };
}

export function paragraph(
  content: string | TextRun[],
  options: { x?: number; width?: number; size?: number; leading?: number } = {}
): Block {
  return {
    kind: 'paragraph',
    runs: typeof content === 'string' ? plain(content) : content,
    x: options.x ?? 60,
    size: options.size ?? BODY_SIZE,
    leading: options.leading ?? BODY_LEADING,
    width: options.width ?? PARAGRAPH_WIDTH,
  };
}

export function gap(height: number): Block {
  return { kind: 'gap', height };
}

type Word = TextRun[];

function splitWords(runs: readonly TextRun[]): Word[] {
  const words: Word[] = [];
  let current: Word = [];

  for (const run of runs) {
    for (const piece of run.text.split(/(\s+)/)) {
      if (!piece) continue;
      if (/^\s+$/.test(piece)) {
        if (current.length) words.push(current);
        current = [];
      } else {
        current.push({ text: piece, bold: run.bold });
      }
    }
  }
  if (current.length) words.push(current);
  return words;
}

const wordLength = (word: Word) => word.reduce((n, fragment) => n + fragment.text.length, 0);

export type Fits = (runs: readonly TextRun[]) => boolean;

const always: Fits = () => true;

// A word that does not fit on a line of its own is cut into pieces that do.
function breakWord(word: Word, width: number, fits: Fits): Word[] {
  const chars = word.flatMap((fragment) => Array.from(fragment.text, (ch) => ({ text: ch, bold: fragment.bold })));
  const pieces: Word[] = [];
  let current: TextRun[] = [];
  for (const ch of chars) {
    const next = [...current, ch];
    if (current.length && (next.length > width || !fits(mergeRuns(next)))) {
      pieces.push(mergeRuns(current));
      current = [ch];
    } else {
      current = next;
    }
  }
  if (current.length) pieces.push(mergeRuns(current));
  return pieces;
}

export function mergeRuns(runs: readonly TextRun[]): TextRun[] {
  const merged: TextRun[] = [];
  for (const run of runs) {
    if (!run.text) continue;
    const last = merged[merged.length - 1];
    if (last && last.bold === run.bold) {
      last.text += run.text;
    } else {
      merged.push({ ...run });
    }
  }
  return merged;
}

function joinWords(words: readonly Word[]): TextRun[] {
  const runs: TextRun[] = [];
  words.forEach((word, i) => {
    const prev = words[i - 1];
    if (prev) {
      const prevLast = prev[prev.length - 1];
      const bold = Boolean(prevLast?.bold && word[0]?.bold);
      runs.push({ text: ' ', bold });
    }
    runs.push(...word);
  });
  return mergeRuns(runs);
}

/**
 * Greedy word wrap on character columns, and on drawn width when `fits` is given.
 * Whitespace collapses to single spaces.
 */
export function wrapRuns(runs: readonly TextRun[], width: number, fits: Fits = always): TextRun[][] {
  const lines: TextRun[][] = [];
  let current: Word[] = [];
  let currentLength = 0;

  for (const word of splitWords(runs)) {
    const pieces = wordLength(word) > width || !fits(word) ? breakWord(word, width, fits) : [word];
    for (const piece of pieces) {
      const length = wordLength(piece);
      const needed = current.length ? currentLength + 1 + length : length;
      if (current.length && (needed > width || !fits(joinWords([...current, piece])))) {
        lines.push(joinWords(current));
        current = [piece];
        currentLength = length;
      } else {
        current.push(piece);
        currentLength = needed;
      }
    }
  }
  if (current.length) lines.push(joinWords(current));
  return lines;
}

export function lineWidth(runs: readonly TextRun[], size: number, measure: TextMeasure): number {
  return runs.reduce((width, run) => width + measure(run.text, run.bold, size), 0);
}

/**
 * Places blocks top-down. A line that would start below the bottom margin opens a new page.
 * With a `measure`, paragraphs also wrap before the right margin.
 */
export function layoutPages(blocks: readonly Block[], options: { measure?: TextMeasure } = {}): LaidOutPage[] {
  const { measure } = options;
  const pages: LaidOutPage[] = [{ lines: [] }];
  let page = pages[0];
  let y = PAGE.height - PAGE.top;

  const place = (runs: TextRun[], x: number, size: number) => {
    if (y < PAGE.bottom) {
      page = { lines: [] };
      pages.push(page);
      y = PAGE.height - PAGE.top;
    }
    page.lines.push({ x, y, size, runs });
  };

  for (const block of blocks) {
    switch (block.kind) {
      case 'gap':
        y -= block.height;
        break;
      case 'line':
        place(block.runs, block.x, block.size);
        y -= block.advance;
        break;
      case 'paragraph': {
        const maxWidth = PAGE.width - PAGE.right - block.x;
        const fits: Fits = measure ? (runs) => lineWidth(runs, block.size, measure) <= maxWidth : always;
        for (const line of wrapRuns(block.runs, block.width, fits)) {
          place(line, block.x, block.size);
          y -= block.leading;
        }
        break;
      }
    }
  }

  return pages;
}
