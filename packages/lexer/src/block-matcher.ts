import type { BlockScanner } from './scanner';

export type BlockMatch =
  | {
      matched: true;
      /** Offset just past the close delimiter that balanced the block */
      end: number;
      /** Token value, with or without delimiters per the scanner */
      value: string;
    }
  | { matched: false };

/** UTF-16 length of the code point at index */
function codePointLength(input: string, index: number): number {
  const codePoint = input.codePointAt(index);
  return codePoint !== undefined && codePoint > 0xffff ? 2 : 1;
}

/**
 * Find the end of a block whose open delimiter starts at `start`.
 *
 * Scans forward with a depth counter instead of recursing, so nesting depth
 * is bounded only by the input. The close delimiter is tested before the
 * open delimiter, which lets blocks with identical delimiters terminate.
 * Fails when the input ends before the depth returns to zero.
 */
export function matchBlock(input: string, start: number, scanner: BlockScanner): BlockMatch {
  const { open, close, allowNesting, rawMode, escape } = scanner;
  // Raw blocks never interpret escapes
  const escapeChar = rawMode ? undefined : escape;

  let depth = 1;
  let cursor = start + open.length;

  while (cursor < input.length) {
    if (escapeChar !== undefined && input.startsWith(escapeChar, cursor)) {
      // The introducer and the escaped code point form one opaque unit
      cursor += escapeChar.length;
      if (cursor < input.length) {
        cursor += codePointLength(input, cursor);
      }
      continue;
    }

    if (input.startsWith(close, cursor)) {
      depth--;
      cursor += close.length;
      if (depth === 0) {
        const value = scanner.includeDelimiters
          ? input.slice(start, cursor)
          : input.slice(start + open.length, cursor - close.length);
        return { matched: true, end: cursor, value };
      }
      continue;
    }

    if (allowNesting && input.startsWith(open, cursor)) {
      depth++;
      cursor += open.length;
      continue;
    }

    cursor++;
  }

  return { matched: false };
}
