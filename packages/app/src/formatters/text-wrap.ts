import stringWidth from 'string-width';

const graphemes = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

function splitWord(word: string, limit: number): string[] {
  const pieces: string[] = [];
  let piece = '';
  let pieceWidth = 0;

  for (const { segment } of graphemes.segment(word)) {
    const width = stringWidth(segment);
    if (piece && pieceWidth + width > limit) {
      pieces.push(piece);
      piece = '';
      pieceWidth = 0;
    }
    piece += segment;
    pieceWidth += width;
  }

  pieces.push(piece);
  return pieces;
}

/**
 * Greedy word wrap for table cells.
 *
 * Widths are terminal columns as measured by `string-width`, so East Asian
 * wide characters count twice. Words wider than the limit are split between
 * grapheme clusters, and no returned line is ever wider than `width` unless a
 * single cluster is.
 *
 * @example
 * ```typescript
 * wrapText('the quick brown fox', 10)  // ['the quick', 'brown fox']
 * wrapText('abcdefghij', 4)            // ['abcd', 'efgh', 'ij']
 * wrapText('日本語の本', 4)             // ['日本', '語の', '本']
 * ```
 */
export function wrapText(text: string, width: number): string[] {
  const limit = Math.max(1, Math.floor(width));
  const words = text.split(/\s+/).filter((word) => word.length > 0);
  const lines: string[] = [];
  let current = '';

  for (const word of words) {
    if (stringWidth(word) > limit) {
      if (current) {
        lines.push(current);
      }
      const pieces = splitWord(word, limit);
      current = pieces.pop() ?? '';
      lines.push(...pieces);
      continue;
    }

    if (!current) {
      current = word;
    } else if (stringWidth(current) + 1 + stringWidth(word) <= limit) {
      current = `${current} ${word}`;
    } else {
      lines.push(current);
      current = word;
    }
  }

  if (current || lines.length === 0) {
    lines.push(current);
  }

  return lines;
}
