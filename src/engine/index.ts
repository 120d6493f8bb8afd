/**
 * txdl Download Engine
 *
 * Exports the segmented HTTP(S) download engine, the aria2c backend for
 * BitTorrent inputs, and their supporting types.
 *
 * @module engine
 */

export { VERSION as engineVersion } from '../shared/constants.js';

// Segmented downloads
export { SegmentedDownload, pickValidator } from './download.js';
export type { DownloadResult, SegmentedDownloadOptions } from './download.js';

// Type definitions and errors
export * from './types.js';

// Event system
export { TypedEventEmitter, type DownloadEvents } from './events.js';

// Configuration
export * from './config/index.js';

// Input classification
export * from './source.js';

// HTTP, segments, disk and control files
export * from './http/client.js';
export * from './segment/planner.js';
export * from './segment/speed.js';
export * from './disk/io.js';
export * from './control/control-file.js';

// aria2c backend
export * from './aria2/command.js';
