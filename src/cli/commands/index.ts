/**
 * CLI Commands Index
 *
 * @module cli/commands
 */

export {
  executeDownload,
  runEngineDownload,
  runAria2Download,
  formatSummary,
  type CommandContext,
} from './download.js';

export { executeResume, partialFileName } from './resume.js';

export { executeRecentTorrent } from './torrent.js';
