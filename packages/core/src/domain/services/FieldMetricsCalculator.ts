import type { FieldMetrics } from '../model/FieldMetrics.js';
import { EMPTY_AUX_COUNTS } from '../model/FieldMetrics.js';
import type { DisplayMode } from '../model/DisplayMode.js';
import { measureDisplay } from './DisplayWidth.js';

/** Measures one cell. Bound to a single `DisplayMode` for the whole transfer. */
export type FieldMeasurer = (text: string) => FieldMetrics;

const LINE_FEED = 0x0a;

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/** Every byte of the UTF-8 encoding is one column. No character tallies. */
export function measureRaw(text: string): FieldMetrics {
  let width = 0;
  let lineWidth = 0;
  let isMultiline = false;

  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code === LINE_FEED) {
      isMultiline = true;
      if (lineWidth > width) width = lineWidth;
      lineWidth = 0;
    } else if (code < 0x80) {
      lineWidth += 1;
    } else if (code < 0x800) {
      lineWidth += 2;
    } else if (isHighSurrogate(code) && isLowSurrogate(text.charCodeAt(i + 1))) {
      lineWidth += 4;
      i++;
    } else {
      // Unpaired surrogates are written as U+FFFD, three bytes.
      lineWidth += 3;
    }
  }

  if (lineWidth > width) width = lineWidth;

  return { width, isMultiline, aux: EMPTY_AUX_COUNTS };
}

export function measureDisplayField(text: string): FieldMetrics {
  const { width, isMultiline, digits, others } = measureDisplay(text);
  return { width, isMultiline, aux: { digits, others } };
}

/** Measure `text` in the given mode. */
export function measureField(text: string, mode: DisplayMode): FieldMetrics {
  return mode === 'raw' ? measureRaw(text) : measureDisplayField(text);
}

/** Pick the measuring function once, so the per-cell path does not branch on the mode. */
export function createFieldMeasurer(mode: DisplayMode): FieldMeasurer {
  return mode === 'raw' ? measureRaw : measureDisplayField;
}
