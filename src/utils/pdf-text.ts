/**
 * Text for the built-in PDF fonts.
 *
 * Helvetica in pdfkit only encodes WinAnsi: Latin-1 plus a few extra glyphs.
 * Anything else is drawn as garbage, so other letters are reduced to their
 * base letter (ė → e, ą → a) and the rest is replaced with "?".
 */
const WIN_ANSI_EXTRAS = new Set('€‚ƒ„…†‡ˆ‰Š‹ŒŽ‘’“”•–—˜™š›œžŸ');

const BASE_LETTERS = new Map<string, string>([
  ['ł', 'l'],
  ['Ł', 'L'],
  ['đ', 'd'],
  ['Đ', 'D'],
  ['ħ', 'h'],
  ['Ħ', 'H'],
  ['ı', 'i'],
  ['ŧ', 't'],
  ['Ŧ', 'T'],
]);

const COMBINING_MARKS = /[\u0300-\u036f]/g;

function isEncodable(char: string): boolean {
  return (char.codePointAt(0) ?? 0) <= 0xff || WIN_ANSI_EXTRAS.has(char);
}

export function toPdfText(text: string): string {
  let result = '';
  for (const char of text) {
    if (isEncodable(char)) {
      result += char;
      continue;
    }
    const base = char.normalize('NFD').replace(COMBINING_MARKS, '');
    if (base.length > 0 && [...base].every(isEncodable)) {
      result += base;
    } else {
      result += BASE_LETTERS.get(char) ?? '?';
    }
  }
  return result;
}
