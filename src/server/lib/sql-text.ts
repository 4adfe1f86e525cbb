/**
 * Lexical helpers shared by the validator and the rewriter.
 *
 * These work on raw text, before (or instead of) a parse, so they only
 * need to know where comments, string literals and quoted identifiers
 * begin and end.
 */

type SegmentKind = 'code' | 'quoted' | 'comment';

interface Segment {
  kind: SegmentKind;
  start: number;
  end: number;
  /** Length of the opening and closing delimiters (close is 0 when unterminated). */
  open: number;
  close: number;
}

const IDENTIFIER_CHAR = /[A-Za-z0-9_$]/;
const DOLLAR_TAG = /^\$([A-Za-z_][A-Za-z0-9_]*)?\$/;

function followsIdentifier(sql: string, index: number): boolean {
  return index > 0 && IDENTIFIER_CHAR.test(sql[index - 1]);
}

/** `E'...'` strings take backslash escapes; plain literals do not. */
function isEscapeString(sql: string, quote: number): boolean {
  const prefix = sql[quote - 1];
  return (prefix === 'E' || prefix === 'e') && !followsIdentifier(sql, quote - 1);
}

/** Index just past the closing quote, or -1 when the quote is never closed. */
function quotedEnd(sql: string, start: number, quote: string, backslashEscapes: boolean): number {
  let j = start + 1;
  while (j < sql.length) {
    if (backslashEscapes && sql[j] === '\\') {
      j += 2;
      continue;
    }
    if (sql[j] === quote) {
      if (sql[j + 1] === quote) {
        j += 2;
        continue;
      }
      return j + 1;
    }
    j++;
  }
  return -1;
}

/** Block comments nest in PostgreSQL. Returns -1 when unterminated. */
function blockCommentEnd(sql: string, start: number): number {
  let depth = 0;
  let j = start;
  while (j < sql.length) {
    if (sql.startsWith('/*', j)) {
      depth++;
      j += 2;
    } else if (sql.startsWith('*/', j)) {
      depth--;
      j += 2;
      if (depth === 0) return j;
    } else {
      j++;
    }
  }
  return -1;
}

/** Split SQL text into code, quoted and comment segments. */
function segments(sql: string): Segment[] {
  const out: Segment[] = [];
  let codeStart = 0;
  let i = 0;

  const push = (segment: Segment) => {
    if (segment.start > codeStart) {
      out.push({ kind: 'code', start: codeStart, end: segment.start, open: 0, close: 0 });
    }
    out.push(segment);
    codeStart = segment.end;
    i = segment.end;
  };

  while (i < sql.length) {
    const ch = sql[i];

    if (ch === '-' && sql[i + 1] === '-') {
      const newline = sql.indexOf('\n', i);
      const end = newline === -1 ? sql.length : newline;
      push({ kind: 'comment', start: i, end, open: 2, close: 0 });
      continue;
    }

    if (ch === '/' && sql[i + 1] === '*') {
      const end = blockCommentEnd(sql, i);
      push(
        end === -1
          ? { kind: 'comment', start: i, end: sql.length, open: 2, close: 0 }
          : { kind: 'comment', start: i, end, open: 2, close: 2 },
      );
      continue;
    }

    if (ch === "'" || ch === '"') {
      const end = quotedEnd(sql, i, ch, ch === "'" && isEscapeString(sql, i));
      push(
        end === -1
          ? { kind: 'quoted', start: i, end: sql.length, open: 1, close: 0 }
          : { kind: 'quoted', start: i, end, open: 1, close: 1 },
      );
      continue;
    }

    if (ch === '$' && !followsIdentifier(sql, i)) {
      const tag = DOLLAR_TAG.exec(sql.slice(i));
      if (tag) {
        const length = tag[0].length;
        const closeAt = sql.indexOf(tag[0], i + length);
        push(
          closeAt === -1
            ? { kind: 'quoted', start: i, end: sql.length, open: length, close: 0 }
            : { kind: 'quoted', start: i, end: closeAt + length, open: length, close: length },
        );
        continue;
      }
    }

    i++;
  }

  if (codeStart < sql.length) {
    out.push({ kind: 'code', start: codeStart, end: sql.length, open: 0, close: 0 });
  }
  return out;
}

/**
 * Strip both single-line (`--`) and multi-line SQL comments that sit
 * outside literals and quoted identifiers.
 *
 * Block comments become a single space so that the tokens on either
 * side are not glued together. An unterminated block comment is left in
 * place for the parser to reject.
 */
export function stripComments(sql: string): string {
  let result = '';
  for (const segment of segments(sql)) {
    if (segment.kind !== 'comment') {
      result += sql.slice(segment.start, segment.end);
    } else if (sql[segment.start] === '/') {
      result += segment.close === 0 ? sql.slice(segment.start, segment.end) : ' ';
    }
  }
  return result.trim();
}

/** Trim the text and remove one optional trailing terminator. */
export function stripTerminator(sql: string): string {
  return sql.trim().replace(/;\s*$/, '').trimEnd();
}

/** Trim the text and remove every trailing terminator. */
export function stripTerminators(sql: string): string {
  return sql.trim().replace(/[\s;]+$/, '');
}

/**
 * Blank out the contents of string literals, quoted identifiers,
 * dollar-quoted bodies and comments. Length and delimiters are preserved,
 * so offsets into the masked text match the original.
 */
export function maskQuoted(sql: string): string {
  return segments(sql)
    .map(({ kind, start, end, open, close }) => {
      if (kind === 'code') return sql.slice(start, end);
      const inner = end - start - open - close;
      return sql.slice(start, start + open) + ' '.repeat(inner) + sql.slice(end - close, end);
    })
    .join('');
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
