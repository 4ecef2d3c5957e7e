/**
 * Clipboard history types, shared between the capture pipeline and whatever
 * UI consumes the query surface.
 *
 * @module clipboard
 */

/** Content type of a history entry, fixed at creation */
export type ClipboardContentType = 'text' | 'image' | 'file';

/** Image encodings the header probe understands */
export type ImageFormat = 'png' | 'jpeg' | 'gif' | 'tiff';

/** Sensitive data categories detected by the redactor */
export type SensitiveKind =
  | 'api_key'
  | 'password'
  | 'ssn'
  | 'credit_card'
  | 'private_key'
  | 'certificate'
  | 'token';

// ─── Raw captures (what the OS clipboard hands over) ───

export interface TextCapture {
  kind: 'text';
  text: string;
  sourceApp?: string;
}

export interface ImageCapture {
  kind: 'image';
  data: Uint8Array;
  /** Format the clipboard advertised, used when the header cannot be sniffed */
  format?: ImageFormat;
  sourceApp?: string;
}

export interface FilesCapture {
  kind: 'files';
  paths: string[];
  sourceApp?: string;
}

export type RawCapture = TextCapture | ImageCapture | FilesCapture;

/** External clipboard, polled by the monitor */
export interface ClipboardSource {
  /** Monotonically increasing counter bumped by every clipboard write */
  changeCount(): number;
  /** Current payload, or null when the clipboard holds nothing we capture */
  read(): RawCapture | null;
}

/** Target of the restore action */
export interface ClipboardSink {
  write(capture: RawCapture): void;
}

// ─── Classified captures ───

export interface ClassifiedText {
  contentType: 'text';
  text: string;
  displayText: string;
  byteSize: number;
  sourceApp?: string;
}

export interface ClassifiedImage {
  contentType: 'image';
  data: Uint8Array;
  format: ImageFormat;
  width: number | null;
  height: number | null;
  displayText: string;
  byteSize: number;
  sourceApp?: string;
}

export interface ClassifiedFiles {
  contentType: 'file';
  paths: string[];
  displayText: string;
  byteSize: number;
  sourceApp?: string;
}

export type ClassifiedCapture = ClassifiedText | ClassifiedImage | ClassifiedFiles;

/** Redactor verdict for a piece of text */
export interface Sensitivity {
  isSensitive: boolean;
  /** Masked, truncated rendering; null when nothing sensitive was found */
  maskedPreview: string | null;
  kinds: SensitiveKind[];
}

/** Fully processed capture, ready for the history store */
export type EntryCandidate = ClassifiedCapture &
  Sensitivity & {
    contentHash: string;
    capturedAt: Date;
  };

// ─── History entries ───

interface EntryBase {
  /** Store-assigned, monotonic, never reused */
  id: number;
  displayText: string;
  isSensitive: boolean;
  maskedPreview: string | null;
  sensitiveKinds: SensitiveKind[];
  /** What a menu should show: the masked preview for sensitive entries */
  label: string;
  /** Pinned entries outlive unpinned ones at eviction */
  pinned: boolean;
  contentHash: string;
  byteSize: number;
  sourceApp?: string;
  /** ISO timestamp of first capture */
  createdAt: string;
  /** ISO timestamp of the latest capture or restore */
  lastSeenAt: string;
}

export interface TextEntry extends EntryBase {
  contentType: 'text';
  /** Raw text; null in listings of a sensitive entry, whose displayText is then masked */
  text: string | null;
}

export interface ImageEntry extends EntryBase {
  contentType: 'image';
  artifactPath: string;
  imageFormat: ImageFormat;
  width: number | null;
  height: number | null;
  /** Set when the artifact file is gone; displayText then holds a placeholder */
  artifactMissing: boolean;
}

export interface FileEntry extends EntryBase {
  contentType: 'file';
  paths: string[];
}

export type ClipboardEntry = TextEntry | ImageEntry | FileEntry;

/** Result of HistoryStore.upsert */
export interface UpsertResult {
  id: number;
  /** True when an existing entry was bumped instead of inserted */
  bumped: boolean;
  /** Entries removed by retention after an insert */
  evictedIds: number[];
}

/** Outcome of a single monitor tick */
export type TickOutcome = 'unchanged' | 'captured' | 'bumped' | 'skipped' | 'failed';

/** Monitor state machine */
export type MonitorState = 'idle' | 'captured';

/** Clipboard pipeline status */
export interface ClipboardStatus {
  /** Whether monitoring is currently active */
  monitoring: boolean;
  /** Total entries in history */
  totalEntries: number;
  /** Configured cap */
  maxEntries: number;
  /** Last change counter the monitor observed */
  lastChangeCount: number | null;
  /** Monitoring started at (ISO) */
  startedAt?: string;
}
