/**
 * Measurement mode for a whole transfer.
 *
 * - `raw`: every UTF-8 byte counts as one terminal column
 * - `display`: code points are measured by their rendered width (0, 1 or 2)
 */
export const DisplayMode = {
  RAW: 'raw',
  DISPLAY: 'display',
} as const;

export type DisplayMode = (typeof DisplayMode)[keyof typeof DisplayMode];

export function isDisplayMode(value: unknown): value is DisplayMode {
  return value === DisplayMode.RAW || value === DisplayMode.DISPLAY;
}
