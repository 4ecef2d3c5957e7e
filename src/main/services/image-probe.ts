/**
 * Header-only image probing. Detects the encoding from its magic bytes and
 * reads pixel dimensions from the fixed header fields, without decoding.
 */

import type { ImageFormat } from '@shared/types';

export interface ImageDimensions {
  width: number;
  height: number;
}

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

const TIFF_TAG_IMAGE_WIDTH = 256;
const TIFF_TAG_IMAGE_LENGTH = 257;
const TIFF_TYPE_SHORT = 3;
const TIFF_TYPE_LONG = 4;

function startsWith(data: Uint8Array, bytes: readonly number[]): boolean {
  if (data.length < bytes.length) return false;
  return bytes.every((b, i) => data[i] === b);
}

function view(data: Uint8Array): DataView {
  return new DataView(data.buffer, data.byteOffset, data.byteLength);
}

export function sniffImageFormat(data: Uint8Array): ImageFormat | null {
  if (startsWith(data, PNG_SIGNATURE)) return 'png';
  if (startsWith(data, [0xff, 0xd8, 0xff])) return 'jpeg';
  // "GIF87a" / "GIF89a"
  if (startsWith(data, [0x47, 0x49, 0x46, 0x38]) && (data[4] === 0x37 || data[4] === 0x39) && data[5] === 0x61) {
    return 'gif';
  }
  if (startsWith(data, [0x49, 0x49, 0x2a, 0x00]) || startsWith(data, [0x4d, 0x4d, 0x00, 0x2a])) return 'tiff';
  return null;
}

function pngDimensions(data: Uint8Array): ImageDimensions | null {
  // Signature (8) + chunk length (4) + "IHDR" (4) + width (4) + height (4)
  if (data.length < 24) return null;
  const dv = view(data);
  if (dv.getUint32(12) !== 0x49484452) return null;
  return { width: dv.getUint32(16), height: dv.getUint32(20) };
}

function gifDimensions(data: Uint8Array): ImageDimensions | null {
  if (data.length < 10) return null;
  const dv = view(data);
  return { width: dv.getUint16(6, true), height: dv.getUint16(8, true) };
}

function isStartOfFrame(marker: number): boolean {
  return marker >= 0xc0 && marker <= 0xcf && marker !== 0xc4 && marker !== 0xc8 && marker !== 0xcc;
}

function jpegDimensions(data: Uint8Array): ImageDimensions | null {
  const dv = view(data);
  let offset = 2;

  while (offset + 4 <= data.length) {
    if (data[offset] !== 0xff) return null;
    const marker = data[offset + 1];

    // Fill bytes
    if (marker === 0xff) {
      offset += 1;
      continue;
    }
    // Standalone markers carry no length
    if (marker === 0x01 || (marker >= 0xd0 && marker <= 0xd8)) {
      offset += 2;
      continue;
    }
    // End of image / start of scan before any frame header
    if (marker === 0xd9 || marker === 0xda) return null;

    const segmentLength = dv.getUint16(offset + 2);
    if (segmentLength < 2) return null;

    if (isStartOfFrame(marker)) {
      if (offset + 9 > data.length) return null;
      return { height: dv.getUint16(offset + 5), width: dv.getUint16(offset + 7) };
    }
    offset += 2 + segmentLength;
  }
  return null;
}

function tiffDimensions(data: Uint8Array): ImageDimensions | null {
  if (data.length < 8) return null;
  const dv = view(data);
  const little = data[0] === 0x49;
  const ifdOffset = dv.getUint32(4, little);
  if (ifdOffset + 2 > data.length) return null;

  const entryCount = dv.getUint16(ifdOffset, little);
  let width: number | null = null;
  let height: number | null = null;

  for (let i = 0; i < entryCount; i++) {
    const entry = ifdOffset + 2 + i * 12;
    if (entry + 12 > data.length) return null;

    const tag = dv.getUint16(entry, little);
    if (tag !== TIFF_TAG_IMAGE_WIDTH && tag !== TIFF_TAG_IMAGE_LENGTH) continue;

    const type = dv.getUint16(entry + 2, little);
    let value: number;
    if (type === TIFF_TYPE_SHORT) value = dv.getUint16(entry + 8, little);
    else if (type === TIFF_TYPE_LONG) value = dv.getUint32(entry + 8, little);
    else return null;

    if (tag === TIFF_TAG_IMAGE_WIDTH) width = value;
    else height = value;
  }

  return width !== null && height !== null ? { width, height } : null;
}

/**
 * Pixel dimensions from the image header, or null when the header is
 * truncated, malformed, or of an unknown format.
 */
export function readImageDimensions(data: Uint8Array, format: ImageFormat): ImageDimensions | null {
  let dims: ImageDimensions | null = null;
  switch (format) {
    case 'png':
      dims = pngDimensions(data);
      break;
    case 'gif':
      dims = gifDimensions(data);
      break;
    case 'jpeg':
      dims = jpegDimensions(data);
      break;
    case 'tiff':
      dims = tiffDimensions(data);
      break;
  }
  if (!dims || dims.width === 0 || dims.height === 0) return null;
  return dims;
}
