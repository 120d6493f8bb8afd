/**
 * useDownload Hook - Connects the progress view to a running download.
 *
 * Subscribes to the download's events and mirrors them into React
 * state; listeners are removed on unmount.
 *
 * @module ui/hooks/useDownload
 */

import { useEffect, useState } from 'react';
import * as path from 'path';
import type { TypedEventEmitter, DownloadEvents } from '../../engine/events.js';
import type { DownloadProgress } from '../../engine/types.js';

export type DownloadPhase = 'probing' | 'downloading' | 'complete' | 'failed';

export interface UseDownloadResult {
  phase: DownloadPhase;

  /** Output file name once known, else the label passed in */
  fileName: string;

  progress: DownloadProgress;

  /** Completion, failure or latest retry/warning text */
  message: string | null;
}

export const EMPTY_PROGRESS: DownloadProgress = {
  totalBytes: null,
  downloadedBytes: 0,
  progress: null,
  speed: 0,
  eta: null,
  activeConnections: 0,
  remainingSegments: 0,
};

/**
 * React hook tracking one download.
 *
 * @param download - Event source of the download
 * @param label - Shown until the output file name is known
 *
 * @example
 * ```tsx
 * const { phase, fileName, progress } = useDownload(download, url);
 * ```
 */
export function useDownload(
  download: TypedEventEmitter<DownloadEvents>,
  label: string
): UseDownloadResult {
  const [phase, setPhase] = useState<DownloadPhase>('probing');
  const [fileName, setFileName] = useState(label);
  const [progress, setProgress] = useState<DownloadProgress>(EMPTY_PROGRESS);
  const [message, setMessage] = useState<string | null>(null);

  useEffect(() => {
    const handleStart = ({ outputPath, resource, resumed }: DownloadEvents['download:start']) => {
      setFileName(path.basename(outputPath));
      setPhase('downloading');
      setMessage(resumed ? 'Resuming partial download' : null);
      setProgress((current) => ({ ...current, totalBytes: resource.totalSize }));
    };
    const handleProgress = (snapshot: DownloadProgress) => {
      setProgress(snapshot);
    };
    const handleRetry = ({ segment, attempt, error }: DownloadEvents['segment:retry']) => {
      setMessage(`Segment ${segment.index} retry ${attempt}: ${error.message}`);
    };
    const handleWarning = ({ message: text }: DownloadEvents['download:warning']) => {
      setMessage(text);
    };
    const handleFallback = ({ reason }: DownloadEvents['download:fallback']) => {
      setMessage(reason);
    };
    const handleComplete = ({ outputPath }: DownloadEvents['download:complete']) => {
      setPhase('complete');
      setMessage(`Saved to ${outputPath}`);
    };
    const handleError = ({ error }: DownloadEvents['download:error']) => {
      setPhase('failed');
      setMessage(error.message);
    };

    download.on('download:start', handleStart);
    download.on('download:progress', handleProgress);
    download.on('segment:retry', handleRetry);
    download.on('download:warning', handleWarning);
    download.on('download:fallback', handleFallback);
    download.on('download:complete', handleComplete);
    download.on('download:error', handleError);

    return () => {
      download.off('download:start', handleStart);
      download.off('download:progress', handleProgress);
      download.off('segment:retry', handleRetry);
      download.off('download:warning', handleWarning);
      download.off('download:fallback', handleFallback);
      download.off('download:complete', handleComplete);
      download.off('download:error', handleError);
    };
  }, [download]);

  return { phase, fileName, progress, message };
}
