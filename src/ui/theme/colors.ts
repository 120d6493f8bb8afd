/**
 * Color palette for the txdl progress view.
 *
 * Values are Ink color names.
 *
 * @module ui/theme/colors
 */

export const colors = {
  /** Filled part of the progress bar */
  primary: 'green',

  /** File names and labels */
  secondary: 'cyan',

  success: 'greenBright',
  warning: 'yellow',
  error: 'red',

  /** Secondary details such as ETA and connection counts */
  muted: 'gray',
} as const;

export type Color = (typeof colors)[keyof typeof colors];

/**
 * Color for a transfer speed: gray when stalled, yellow when slow.
 *
 * @param bytesPerSecond - Current speed
 */
export function getSpeedColor(bytesPerSecond: number): Color {
  if (bytesPerSecond <= 0) {
    return colors.muted;
  }
  if (bytesPerSecond < 100 * 1024) {
    return colors.warning;
  }
  return colors.primary;
}
