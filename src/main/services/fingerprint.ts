/**
 * Fingerprint engine: type-tagged SHA-256 content digests used as the
 * history dedup key and as artifact file names.
 *
 * The content type is hashed in front of the payload, so a text entry and an
 * image entry with identical bytes can never share a fingerprint.
 */

import { createHash } from 'crypto';
import * as fs from 'fs';
import type { ClassifiedCapture, ClipboardContentType } from '@shared/types';
import { ClipkeepError, ErrorCode } from '@shared/types/errors';

/** Hex length of a fingerprint */
export const FINGERPRINT_LENGTH = 64;

const FINGERPRINT_PATTERN = /^[0-9a-f]{64}$/;

export function fingerprint(contentType: ClipboardContentType, data: string | Uint8Array): string {
  return createHash('sha256').update(`${contentType}\0`, 'utf8').update(data).digest('hex');
}

/** Payload bytes of a file list, as hashed and stored */
export function joinFilePaths(paths: readonly string[]): string {
  return paths.join('\n');
}

export function fingerprintFile(contentType: ClipboardContentType, filePath: string): string {
  let data: Buffer;
  try {
    data = fs.readFileSync(filePath);
  } catch (err) {
    throw new ClipkeepError(`Cannot read ${filePath} for fingerprinting`, ErrorCode.FS_READ_ERROR, {
      context: { filePath },
      originalError: err instanceof Error ? err : undefined,
    });
  }
  return fingerprint(contentType, data);
}

export function isFingerprint(value: string): boolean {
  return FINGERPRINT_PATTERN.test(value);
}

/** Fingerprint of a classified capture's raw payload */
export function fingerprintCapture(capture: ClassifiedCapture): string {
  switch (capture.contentType) {
    case 'text':
      return fingerprint('text', capture.text);
    case 'image':
      return fingerprint('image', capture.data);
    case 'file':
      return fingerprint('file', joinFilePaths(capture.paths));
  }
}
