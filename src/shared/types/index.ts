/**
 * Shared types for the capture pipeline and its UI.
 *
 * Import from '@shared/types' everywhere.
 */

// Clipboard
export type {
  ClipboardContentType,
  ImageFormat,
  SensitiveKind,
  TextCapture,
  ImageCapture,
  FilesCapture,
  RawCapture,
  ClipboardSource,
  ClipboardSink,
  ClassifiedText,
  ClassifiedImage,
  ClassifiedFiles,
  ClassifiedCapture,
  Sensitivity,
  EntryCandidate,
  TextEntry,
  ImageEntry,
  FileEntry,
  ClipboardEntry,
  UpsertResult,
  TickOutcome,
  MonitorState,
  ClipboardStatus,
} from './clipboard';

// Configuration
export type { ClipkeepConfig, LogLevel } from './config';

// Errors
export { ClipkeepError, ErrorCode } from './errors';
export type { ErrorSeverity } from './errors';
