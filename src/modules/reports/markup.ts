import { mergeRuns, TextRun } from './layout';

export type AdvisoryLine =
  | { kind: 'blank' }
  | { kind: 'heading'; text: string }
  | { kind: 'body'; text: string };

export class MarkupError extends Error {}

export function classifyLine(raw: string): AdvisoryLine {
  const line = raw.trim();
  if (!line) return { kind: 'blank' };
  if (line.startsWith('##')) {
    return { kind: 'heading', text: line.replace(/^#+/, '').replace(/\*\*/g, '').trim() };
  }
  return { kind: 'body', text: line };
}

export function escapeMarkup(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Escapes the line, then turns `**span**` into `<b>span</b>`. An unmatched `**` stays literal.
 */
export function toMarkup(text: string): string {
  return escapeMarkup(text).replace(/\*\*(.+?)\*\*/g, '<b>$1</b>');
}

const ENTITIES: Record<string, string> = { '&amp;': '&', '&lt;': '<', '&gt;': '>' };

export function parseMarkup(markup: string): TextRun[] {
  const runs: TextRun[] = [];
  let bold = false;
  let buffer = '';

  const flush = () => {
    if (buffer) runs.push({ text: buffer, bold });
    buffer = '';
  };

  let i = 0;
  while (i < markup.length) {
    const ch = markup[i];
    if (ch === '<') {
      const end = markup.indexOf('>', i);
      const tag = end === -1 ? markup.slice(i) : markup.slice(i, end + 1);
      if (tag === '<b>' && !bold) {
        flush();
        bold = true;
      } else if (tag === '</b>' && bold) {
        flush();
        bold = false;
      } else {
        throw new MarkupError(`Unexpected tag '${tag}' at ${i}`);
      }
      i += tag.length;
    } else if (ch === '&') {
      const end = markup.indexOf(';', i);
      const entity = end === -1 ? '' : markup.slice(i, end + 1);
      const decoded = ENTITIES[entity];
      if (decoded === undefined) {
        throw new MarkupError(`Unknown entity at ${i}`);
      }
      buffer += decoded;
      i += entity.length;
    } else {
      buffer += ch;
      i += 1;
    }
  }

  if (bold) throw new MarkupError('Unclosed <b>');
  flush();
  return mergeRuns(runs);
}
