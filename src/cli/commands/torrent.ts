/**
 * Recent-torrent command for txdl CLI.
 *
 * Downloads the newest .torrent file found in the download directory.
 *
 * @module cli/commands/torrent
 */

import { runAria2Download, type CommandContext } from './download.js';

/**
 * Execute the recent-torrent command (`-t`).
 *
 * @param torrentFile - Newest .torrent file in the download directory
 */
export async function executeRecentTorrent(
  torrentFile: string,
  ctx: CommandContext
): Promise<void> {
  const { logger } = ctx;
  logger.info(`Using torrent file: ${torrentFile}`);
  logger.info(`Download directory: ${ctx.dir}`);
  await runAria2Download({ kind: 'torrent', value: torrentFile }, ctx);
}

export default executeRecentTorrent;
