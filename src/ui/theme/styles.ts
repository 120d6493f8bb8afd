/**
 * Characters used to draw the progress view.
 *
 * @module ui/theme/styles
 */

export const progressChars = {
  /** Filled portion of progress bar */
  filled: '█',

  /** Empty portion of progress bar */
  empty: '░',

  /** Sweeping block for downloads of unknown size */
  indeterminate: '▒',
} as const;

export const symbols = {
  download: '↓',
  check: '✓',
  cross: '✗',
} as const;
