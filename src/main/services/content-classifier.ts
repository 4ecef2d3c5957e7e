/**
 * Content classifier: turns a raw clipboard capture into a typed payload with
 * a human-readable display text.
 *
 * classify() never throws. A malformed image header gets a generic label;
 * any other failure falls back to a minimal representation.
 */

import * as path from 'path';
import { createLogger } from './logger';
import { readImageDimensions, sniffImageFormat } from './image-probe';
import { truncateText } from './preview-text';
import { joinFilePaths } from './fingerprint';
import { IMAGE_LABEL } from '@shared/constants';
import { ClipkeepError, ErrorCode } from '@shared/types/errors';
import type {
  ClassifiedCapture,
  ClassifiedFiles,
  ClassifiedImage,
  ClassifiedText,
  FilesCapture,
  ImageCapture,
  RawCapture,
  TextCapture,
} from '@shared/types';

const log = createLogger('Classifier');

export interface ClassifierOptions {
  previewLength: number;
  /** UTF-8 byte limit for text */
  maxTextSize: number;
  /** Byte limit for images */
  maxImageSize: number;
}

export class ContentClassifier {
  constructor(private options: ClassifierOptions) {}

  updateOptions(options: Partial<ClassifierOptions>): void {
    this.options = { ...this.options, ...options };
  }

  /**
   * Classify a capture, or return null when there is nothing worth keeping
   * (empty clipboard, whitespace-only text, oversized payloads).
   */
  classify(capture: RawCapture): ClassifiedCapture | null {
    try {
      switch (capture.kind) {
        case 'text':
          return this.classifyText(capture);
        case 'image':
          return this.classifyImage(capture);
        case 'files':
          return this.classifyFiles(capture);
      }
    } catch (err) {
      const degraded = ClipkeepError.from(err, ErrorCode.CLASSIFICATION_DEGRADED, { kind: capture.kind });
      log.warn('Classification degraded, using fallback representation:', degraded.message);
      try {
        return this.fallback(capture);
      } catch (fallbackErr) {
        log.error('Fallback classification failed, dropping capture:', fallbackErr);
        return null;
      }
    }
  }

  private classifyText(capture: TextCapture): ClassifiedText | null {
    const { text } = capture;
    if (!text || !text.trim()) return null;

    const byteSize = Buffer.byteLength(text, 'utf8');
    if (byteSize > this.options.maxTextSize) {
      log.warn(`Text too large (${byteSize} bytes), skipping`);
      return null;
    }

    return {
      contentType: 'text',
      text,
      displayText: truncateText(text, this.options.previewLength),
      byteSize,
      sourceApp: capture.sourceApp,
    };
  }

  private classifyImage(capture: ImageCapture): ClassifiedImage | null {
    const { data } = capture;
    if (data.length === 0) return null;

    if (data.length > this.options.maxImageSize) {
      log.warn(`Image too large (${data.length} bytes), skipping`);
      return null;
    }

    const sniffed = sniffImageFormat(data);
    const format = sniffed ?? capture.format ?? 'png';
    const dims = sniffed ? readImageDimensions(data, sniffed) : null;
    if (!dims) {
      log.debug(`Unreadable ${format} header, using generic label`);
    }

    return {
      contentType: 'image',
      data,
      format,
      width: dims?.width ?? null,
      height: dims?.height ?? null,
      displayText: dims ? `[Image: ${dims.width}x${dims.height}]` : IMAGE_LABEL,
      byteSize: data.length,
      sourceApp: capture.sourceApp,
    };
  }

  private classifyFiles(capture: FilesCapture): ClassifiedFiles | null {
    const paths = capture.paths.filter((p) => p.length > 0);
    if (paths.length === 0) return null;

    const first = path.basename(paths[0]);
    const summary = paths.length === 1 ? first : `${paths.length} files: ${first}, ...`;

    return {
      contentType: 'file',
      paths,
      displayText: truncateText(summary, this.options.previewLength),
      byteSize: Buffer.byteLength(joinFilePaths(paths), 'utf8'),
      sourceApp: capture.sourceApp,
    };
  }

  /** Minimal representation that avoids every parsing step */
  private fallback(capture: RawCapture): ClassifiedCapture | null {
    switch (capture.kind) {
      case 'text':
        return capture.text
          ? {
              contentType: 'text',
              text: capture.text,
              displayText: [...capture.text].slice(0, this.options.previewLength).join(''),
              byteSize: Buffer.byteLength(capture.text, 'utf8'),
              sourceApp: capture.sourceApp,
            }
          : null;
      case 'image':
        return capture.data.length > 0
          ? {
              contentType: 'image',
              data: capture.data,
              format: capture.format ?? 'png',
              width: null,
              height: null,
              displayText: IMAGE_LABEL,
              byteSize: capture.data.length,
              sourceApp: capture.sourceApp,
            }
          : null;
      case 'files':
        return capture.paths.length > 0
          ? {
              contentType: 'file',
              paths: capture.paths,
              displayText: `${capture.paths.length} files`,
              byteSize: joinFilePaths(capture.paths).length,
              sourceApp: capture.sourceApp,
            }
          : null;
    }
  }
}
