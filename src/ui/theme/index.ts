/**
 * Theme for the txdl progress view.
 *
 * @module ui/theme
 */

export { colors, getSpeedColor, type Color } from './colors.js';
export { progressChars, symbols } from './styles.js';
