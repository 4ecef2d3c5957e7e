/**
 * Shared constants: file layout and display markers.
 */

/** Environment variable overriding the data directory */
export const DATA_DIR_ENV = 'CLIPKEEP_DATA_DIR';

/** Database file name inside the data directory */
export const DB_FILE_NAME = 'clipkeep.db';

/** Directory of content-addressed image artifacts */
export const IMAGE_DIR_NAME = 'images';

/** Diagnostics log file */
export const LOG_FILE_NAME = 'clipkeep.log';

/** Persisted configuration */
export const CONFIG_FILE_NAME = 'config.json';

/** Replaces every masked span in a preview */
export const MASK = '••••••••';

/** Appended to truncated previews */
export const ELLIPSIS = '…';

/** Label for images whose header could not be parsed */
export const IMAGE_LABEL = '[Image]';

/** Label for image entries whose artifact file has disappeared */
export const MISSING_IMAGE_LABEL = '[Image unavailable]';

/** File extension per image format */
export const IMAGE_EXTENSIONS = {
  png: 'png',
  jpeg: 'jpg',
  gif: 'gif',
  tiff: 'tiff',
} as const;
