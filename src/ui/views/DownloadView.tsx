/**
 * Live view of a single download, rendered by the CLI on a terminal.
 *
 * @module ui/views/DownloadView
 */

import React from 'react';
import type { DownloadEvents, TypedEventEmitter } from '../../engine/events.js';
import { DownloadStatus } from '../components/DownloadStatus.js';
import { useDownload } from '../hooks/useDownload.js';

export interface DownloadViewProps {
  download: TypedEventEmitter<DownloadEvents>;

  /** Shown until the output file name is known (usually the URL) */
  label: string;
}

export const DownloadView: React.FC<DownloadViewProps> = ({ download, label }) => {
  const { phase, fileName, progress, message } = useDownload(download, label);
  return <DownloadStatus phase={phase} fileName={fileName} progress={progress} message={message} />;
};

export default DownloadView;
