/**
 * Help text for the txdl command line.
 *
 * @module cli/help
 */

import { APP_NAME, VERSION } from '../shared/constants.js';

export const HELP_TEXT = `
${APP_NAME} v${VERSION} - Download accelerator

Usage
  $ ${APP_NAME} -l <url|magnet|torrent-file> [-d <directory>]
  $ ${APP_NAME} -t [-d <directory>]
  $ ${APP_NAME} -r <file> [-d <directory>]
  $ ${APP_NAME} -h

Options
  --link, -l <input>     HTTP/HTTPS URL, magnet link, or .torrent file path
  --torrent, -t          Use the most recent .torrent file in the download directory
  --resume, -r <file>    Resume an interrupted download (the incomplete file name)
  --dir, -d <directory>  Download directory (default: ~/Downloads)
  --version, -v          Show version
  --help, -h             Show this help

  HTTP/HTTPS downloads use the built-in multi-connection engine.
  Magnet links and .torrent files require aria2c.

Examples
  $ ${APP_NAME} -l https://example.com/file.zip
  $ ${APP_NAME} -l "magnet:?xt=urn:btih:..."
  $ ${APP_NAME} -l ./file.torrent
  $ ${APP_NAME} -t
  $ ${APP_NAME} -r file.zip
  $ ${APP_NAME} -l https://example.com/file.zip -d /sdcard/MyDownloads

Configuration
  ARIA2_MAX_CONNECTIONS=16           Connections per server
  ARIA2_MIN_SPLIT_SIZE=1M            Minimum segment size
  ARIA2_MAX_CONCURRENT_DOWNLOADS=3   Parallel downloads (aria2c)
  ARIA2_TIMEOUT=60                   Seconds of inactivity before reconnecting
  ARIA2_RETRY_WAIT=3                 Seconds between retries
  ARIA2_MAX_TRIES=5                  Attempts per segment (0 = unlimited)
  ARIA2_SPLIT=16                     Maximum segments per file
  ARIA2_CHECK_CERTIFICATE=false      Certificate checks in aria2c
  TXDL_DOWNLOAD_DIR=~/Downloads      Default download directory
  TXDL_ARIA2C=aria2c                 aria2c executable
  TXDL_MIN_FREE_SPACE=100M           Required free space
  TXDL_FILE_ALLOCATION=falloc        none, trunc, prealloc or falloc
  TXDL_USER_AGENT=${APP_NAME}/${VERSION}         User-Agent header
  TXDL_LOG_FILE=                     Also append log lines to this file
  TXDL_LOG_LEVEL=info                debug, info, warn or error
`;
