/**
 * Text clean-up shared by the extractors
 */

const RE_BLOCK_COMMENT = /\/\*[\s\S]*?\*\//g;
// SAS `* remark;` statements occupying a whole line
const RE_STAR_COMMENT = /^\s*\*.*?;\s*$/gm;

export function stripSasComments(text: string): string {
  return text.replace(RE_BLOCK_COMMENT, ' ').replace(RE_STAR_COMMENT, '');
}

/**
 * Blank out quoted literals, keeping offsets. A doubled quote inside a literal
 * is an escaped quote; an unterminated literal runs to the end of the text.
 */
export function blankStringLiterals(text: string): string {
  let result = '';
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    if (ch !== "'" && ch !== '"') {
      result += ch;
      i++;
      continue;
    }

    let end = i + 1;
    let closed = false;
    while (end < text.length) {
      if (text[end] === ch) {
        if (text[end + 1] === ch) {
          end += 2;
          continue;
        }
        end++;
        closed = true;
        break;
      }
      end++;
    }
    if (!closed) end = text.length;

    result += ' '.repeat(end - i);
    i = end;
  }

  return result;
}

/**
 * Remove a BOM and the invisible spaces editors leave in headers
 */
export function normalizeInvisibles(text: string): string {
  return text.replace(/\uFEFF/g, '').replace(/\u00A0/g, ' ').replace(/\u200B/g, '');
}
