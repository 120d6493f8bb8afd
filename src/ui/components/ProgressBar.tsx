import React from 'react';
import { Box, Text } from 'ink';
import { colors, progressChars } from '../theme/index.js';
import { formatProgress } from '../utils/format.js';

export interface ProgressBarProps {
  /** Progress between 0 and 1, or null when the total size is unknown */
  progress: number | null;
  /** Width of the bar in characters (default: 30) */
  width?: number;
  /** Whether to show percentage text after the bar (default: true) */
  showPercentage?: boolean;
}

/**
 * Download progress bar
 *
 * Filled (█) and empty (░) blocks with the percentage after them. An
 * unknown total draws a shaded bar (▒) and no percentage.
 *
 * @example
 * <ProgressBar progress={0.4} width={10} />
 * // Output: "████░░░░░░  40%"
 */
export const ProgressBar: React.FC<ProgressBarProps> = ({
  progress,
  width = 30,
  showPercentage = true,
}) => {
  if (progress === null) {
    return (
      <Box>
        <Text color={colors.muted}>{progressChars.indeterminate.repeat(width)}</Text>
      </Box>
    );
  }

  const clampedProgress = Math.max(0, Math.min(1, progress));
  const filledCount = Math.round(clampedProgress * width);
  const emptyCount = width - filledCount;

  return (
    <Box>
      <Text color={colors.primary}>{progressChars.filled.repeat(filledCount)}</Text>
      <Text color={colors.muted}>{progressChars.empty.repeat(emptyCount)}</Text>
      {showPercentage && (
        <Text color={colors.muted}> {formatProgress(clampedProgress).padStart(4)}</Text>
      )}
    </Box>
  );
};

export default ProgressBar;
