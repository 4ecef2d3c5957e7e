import type { ClipboardSink, ClipboardSource, RawCapture } from '../../src/shared/types';

/**
 * In-process clipboard: every copy or write bumps the change counter.
 */
export class FakeClipboard implements ClipboardSource, ClipboardSink {
  count = 0;
  current: RawCapture | null = null;
  readError: Error | null = null;
  counterError: Error | null = null;
  writeError: Error | null = null;
  readonly written: RawCapture[] = [];

  /** Simulate another application copying */
  copy(capture: RawCapture | null): void {
    this.current = capture;
    this.count++;
  }

  copyText(text: string): void {
    this.copy({ kind: 'text', text });
  }

  changeCount(): number {
    if (this.counterError) throw this.counterError;
    return this.count;
  }

  read(): RawCapture | null {
    if (this.readError) throw this.readError;
    return this.current;
  }

  write(capture: RawCapture): void {
    if (this.writeError) throw this.writeError;
    this.written.push(capture);
    this.copy(capture);
  }
}
