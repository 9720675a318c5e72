import { gap, layoutPages, lineWidth, PAGE, paragraph, plain, TextMeasure, textLine, title, wrapRuns } from './layout';

const wrapText = (text: string, width: number) =>
  wrapRuns(plain(text), width).map((line) => line.map((run) => run.text).join(''));

// Half the font size per character, bold at 0.8.
const fixedMeasure: TextMeasure = (text, bold, size) => text.length * size * (bold ? 0.8 : 0.5);

describe('wrapRuns on columns', () => {
  it('breaks on word boundaries at the column limit', () => {
    expect(wrapText('aaa bbb ccc', 7)).toEqual(['aaa bbb', 'ccc']);
  });

  it('collapses runs of whitespace', () => {
    expect(wrapText('a   b\tc', 10)).toEqual(['a b c']);
  });

  it('cuts words longer than a line', () => {
    expect(wrapText('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
    expect(wrapText('xy abcdefghij', 4)).toEqual(['xy', 'abcd', 'efgh', 'ij']);
  });

  it('yields no lines for blank text', () => {
    expect(wrapText('   ', 10)).toEqual([]);
  });
});

describe('wrapRuns', () => {
  it('keeps emphasis on the words it belongs to', () => {
    expect(
      wrapRuns(
        [
          { text: 'Key', bold: true },
          { text: ' action', bold: false },
        ],
        95
      )
    ).toEqual([
      [
        { text: 'Key', bold: true },
        { text: ' action', bold: false },
      ],
    ]);
  });

  it('keeps the space inside an emphasized phrase emphasized', () => {
    expect(wrapRuns([{ text: 'Two words', bold: true }], 95)).toEqual([[{ text: 'Two words', bold: true }]]);
  });

  it('carries emphasis across a line break', () => {
    expect(wrapRuns([{ text: 'alpha beta', bold: true }, { text: ' gamma', bold: false }], 10)).toEqual([
      [{ text: 'alpha beta', bold: true }],
      [{ text: 'gamma', bold: false }],
    ]);
  });
});

describe('layoutPages', () => {
  it('advances the cursor by each block', () => {
    const [page] = layoutPages([title('Title'), gap(10), textLine('Body')]);
    expect(page.lines.map((line) => [line.y, line.x, line.size])).toEqual([
      [742, 50, 16],
      [702, 60, 10],
    ]);
  });

  it('starts a new page once the cursor passes the bottom margin', () => {
    const blocks = Array.from({ length: 80 }, (_, i) => paragraph(`line ${i}`));
    const pages = layoutPages(blocks);

    expect(pages).toHaveLength(2);
    expect(pages[0].lines).toHaveLength(57);
    expect(pages[0].lines[56].y).toBe(70);
    expect(pages[1].lines).toHaveLength(23);
    expect(pages[1].lines[0]).toEqual({ x: 60, y: 742, size: 10, runs: [{ text: 'line 57', bold: false }] });
  });

  it('breaks pages inside a single long paragraph', () => {
    const words = Array.from({ length: 70 }, () => 'x'.repeat(94)).join(' ');
    const pages = layoutPages([paragraph(words)]);
    expect(pages.map((p) => p.lines.length)).toEqual([57, 13]);
  });
});

describe('layoutPages with a measure', () => {
  it('wraps emphasized text on drawn width before the column limit', () => {
    const words = Array.from({ length: 30 }, () => 'abcd').join(' ');
    const [page] = layoutPages([paragraph([{ text: words, bold: true }])], { measure: fixedMeasure });

    // 12 bold words: 12 * 32 + 11 * 8 = 472 pt, under the 502 pt between x 60 and the margin
    expect(page.lines.map((line) => line.runs[0]?.text.split(' ').length)).toEqual([12, 12, 6]);
    for (const line of page.lines) {
      expect(line.x + lineWidth(line.runs, line.size, fixedMeasure)).toBeLessThanOrEqual(PAGE.width - PAGE.right);
    }
  });

  it('keeps the column limit when text is narrow', () => {
    const words = Array.from({ length: 30 }, () => 'abcd').join(' ');
    const [page] = layoutPages([paragraph(words)], { measure: fixedMeasure });
    expect(page.lines.map((line) => line.runs[0]?.text.length)).toEqual([94, 54]);
  });

  it('cuts a wide word at the margin', () => {
    const [page] = layoutPages([paragraph([{ text: 'x'.repeat(80), bold: true }])], { measure: fixedMeasure });
    expect(page.lines.map((line) => line.runs[0]?.text.length)).toEqual([62, 18]);
  });
});
