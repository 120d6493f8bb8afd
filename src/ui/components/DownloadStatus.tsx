import React from 'react';
import { Box, Text } from 'ink';
import type { DownloadProgress } from '../../engine/types.js';
import type { DownloadPhase } from '../hooks/useDownload.js';
import { colors, getSpeedColor, symbols } from '../theme/index.js';
import {
  formatBytes,
  formatEta,
  formatSpeed,
  truncateText,
} from '../utils/format.js';
import { ProgressBar } from './ProgressBar.js';

export interface DownloadStatusProps {
  phase: DownloadPhase;
  fileName: string;
  progress: DownloadProgress;
  message?: string | null;
  /** Progress bar width (default: 30) */
  barWidth?: number;
}

/**
 * Two-line status of a download: the file name, then the bar with
 * transferred bytes, speed, ETA and open connections.
 */
export const DownloadStatus: React.FC<DownloadStatusProps> = ({
  phase,
  fileName,
  progress,
  message = null,
  barWidth = 30,
}) => {
  const sizeText =
    progress.totalBytes === null
      ? formatBytes(progress.downloadedBytes)
      : `${formatBytes(progress.downloadedBytes)} / ${formatBytes(progress.totalBytes)}`;

  return (
    <Box flexDirection="column">
      <Box>
        <Text color={colors.secondary}>{symbols.download} </Text>
        <Text bold>{truncateText(fileName, 60)}</Text>
      </Box>

      {phase === 'probing' ? (
        <Text color={colors.muted}>Connecting...</Text>
      ) : (
        <Box>
          <ProgressBar progress={phase === 'complete' ? 1 : progress.progress} width={barWidth} />
          <Text> {sizeText}</Text>
          <Text color={getSpeedColor(progress.speed)}>  {formatSpeed(progress.speed)}</Text>
          <Text color={colors.muted}>
            {'  '}ETA {formatEta(progress.eta)}  {progress.activeConnections} conn
          </Text>
        </Box>
      )}

      {message !== null && phase === 'complete' && (
        <Text color={colors.success}>
          {symbols.check} {message}
        </Text>
      )}
      {message !== null && phase === 'failed' && (
        <Text color={colors.error}>
          {symbols.cross} {message}
        </Text>
      )}
      {message !== null && (phase === 'downloading' || phase === 'probing') && (
        <Text color={colors.warning}>{message}</Text>
      )}
    </Box>
  );
};

export default DownloadStatus;
