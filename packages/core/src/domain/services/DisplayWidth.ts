import type { AuxCounts } from '../model/FieldMetrics.js';

const LINE_FEED = 0x0a;

/** Characters that neither count as digits nor as "others" when tallying a numeric-looking cell. */
const NUMERIC_PUNCTUATION: ReadonlySet<number> = new Set([0x20, 0x2b, 0x2c, 0x2d, 0x2e]);

/** Result of measuring a string by rendered width. */
export interface DisplayMeasurement extends AuxCounts {
  readonly width: number;
  readonly isMultiline: boolean;
}

function isZeroWidth(code: number): boolean {
  return (
    code < 0x20 ||
    (code >= 0x7f && code <= 0x9f) ||
    code === 0x200b || // zero width space
    code === 0x200c ||
    code === 0x200d || // zero width joiner
    (code >= 0xfe00 && code <= 0xfe0f) || // variation selectors
    (code >= 0x0300 && code <= 0x036f) || // combining diacritical marks
    (code >= 0x1ab0 && code <= 0x1aff) ||
    (code >= 0x1dc0 && code <= 0x1dff) ||
    (code >= 0x20d0 && code <= 0x20ff) ||
    (code >= 0xfe20 && code <= 0xfe2f) ||
    (code >= 0xe0100 && code <= 0xe01ef)
  );
}

function isWide(code: number): boolean {
  return (
    (code >= 0x1100 && code <= 0x115f) || // Hangul Jamo
    (code >= 0x2600 && code <= 0x27bf) || // Misc Symbols, Dingbats
    (code >= 0x2e80 && code <= 0x303e) || // CJK Radicals
    (code >= 0x3041 && code <= 0x33bf) || // Hiragana, Katakana, CJK Compat
    (code >= 0x3400 && code <= 0x4dbf) || // CJK Extension A
    (code >= 0x4e00 && code <= 0x9fff) || // CJK Unified
    (code >= 0xa000 && code <= 0xa4cf) || // Yi
    (code >= 0xac00 && code <= 0xd7a3) || // Hangul Syllables
    (code >= 0xf900 && code <= 0xfaff) || // CJK Compatibility Ideographs
    (code >= 0xfe10 && code <= 0xfe19) || // Vertical forms
    (code >= 0xfe30 && code <= 0xfe6f) || // CJK Compatibility Forms
    (code >= 0xff01 && code <= 0xff60) || // Fullwidth Forms
    (code >= 0xffe0 && code <= 0xffe6) || // Fullwidth Signs
    (code >= 0x1f300 && code <= 0x1f64f) || // Misc Symbols and Pictographs, Emoticons
    (code >= 0x1f900 && code <= 0x1f9ff) || // Supplemental Symbols and Pictographs
    (code >= 0x1fa70 && code <= 0x1faff) || // Symbols and Pictographs Extended-A
    (code >= 0x20000 && code <= 0x2fffd) || // CJK Extension B+
    (code >= 0x30000 && code <= 0x3fffd) // CJK Extension G+
  );
}

/** Terminal columns occupied by one code point: 0, 1 or 2. */
export function codePointWidth(code: number): 0 | 1 | 2 {
  if (isZeroWidth(code)) return 0;
  return isWide(code) ? 2 : 1;
}

/**
 * Measure a possibly multi-line string by rendered width.
 *
 * Lines are split on `\n`; `width` is the widest line. `digits` counts ASCII digits and
 * `others` every other character except line feeds and numeric punctuation (space, `+`,
 * `,`, `-`, `.`).
 */
export function measureDisplay(text: string): DisplayMeasurement {
  let width = 0;
  let lineWidth = 0;
  let isMultiline = false;
  let digits = 0;
  let others = 0;

  for (const char of text) {
    const code = char.codePointAt(0) ?? 0;

    if (code === LINE_FEED) {
      isMultiline = true;
      if (lineWidth > width) width = lineWidth;
      lineWidth = 0;
      continue;
    }

    lineWidth += codePointWidth(code);

    if (code >= 0x30 && code <= 0x39) {
      digits++;
    } else if (!NUMERIC_PUNCTUATION.has(code)) {
      others++;
    }
  }

  if (lineWidth > width) width = lineWidth;

  return { width, isMultiline, digits, others };
}
