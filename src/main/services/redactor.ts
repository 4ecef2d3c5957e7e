/**
 * Redactor: detects credentials and personal identifiers in copied text and
 * renders a masked preview for the menu.
 *
 * The raw text is never touched; restoring an entry returns the original bytes.
 *
 * @module redactor
 */

import type { SensitiveKind, Sensitivity } from '@shared/types';
import { MASK } from '@shared/constants';
import { truncateText } from './preview-text';

export interface SensitiveMatch {
  kind: SensitiveKind;
  start: number;
  end: number;
  original: string;
  masked: string;
}

export interface RedactOptions {
  /** Length the masked preview is truncated to */
  previewLength: number;
}

export interface Redaction extends Sensitivity {
  matches: SensitiveMatch[];
}

// ─── Patterns ───

const API_KEY_PATTERNS: RegExp[] = [
  /sk-proj-[A-Za-z0-9_-]{20,}/g, // OpenAI project
  /sk-[A-Za-z0-9]{20,}/g, // OpenAI
  /AKIA[A-Z0-9]{16}/g, // AWS access key id
  /gh[po]_[A-Za-z0-9]{36}/g, // GitHub PAT / OAuth
  /github_pat_[A-Za-z0-9_]{22,}/g, // GitHub fine-grained PAT
  /xox[baprs]-[A-Za-z0-9-]{10,}/g, // Slack
  /AIza[A-Za-z0-9_-]{35}/g, // Google
  /sq0[a-z]{3}-[A-Za-z0-9_-]{22,}/g, // Square
  /(?:sk|rk|pk)_(?:live|test)_[A-Za-z0-9]{24,}/g, // Stripe
];

/** Candidate runs for the entropy check */
const HIGH_ENTROPY_CANDIDATE = /[A-Za-z0-9+/_=-]{32,}/g;
const MIN_SECRET_ENTROPY = 4.0;

const PASSWORD_PATTERN = /(password|passwd|pwd|pass|secret|token|api_key|apikey|auth)([=:\s]+['"]?)([^\s'"]{6,})/gi;

const SSN_PATTERNS: RegExp[] = [/\b\d{3}-\d{2}-\d{4}\b/g, /\b\d{9}\b/g];

const CARD_CANDIDATE = /\b\d(?:[ -]?\d){12,18}\b/g;
const MIN_CARD_DIGITS = 13;

const PRIVATE_KEY_PATTERN = /-----BEGIN ([A-Z0-9 ]*)PRIVATE KEY-----[\s\S]*?(?:-----END \1PRIVATE KEY-----|$)/g;

const CERTIFICATE_PATTERN = /-----BEGIN (?:X509 )?CERTIFICATE-----[\s\S]*?(?:-----END (?:X509 )?CERTIFICATE-----|$)/g;

const TOKEN_PATTERNS: RegExp[] = [
  /eyJ[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}/g, // JWT
  /Bearer\s+[A-Za-z0-9._~+/-]{20,}=*/g,
];

// ─── Helpers ───

/** Shannon entropy in bits per character */
export function shannonEntropy(text: string): number {
  if (!text) return 0;
  const freq = new Map<string, number>();
  for (const ch of text) {
    freq.set(ch, (freq.get(ch) ?? 0) + 1);
  }
  const len = [...text].length;
  let h = 0;
  for (const count of freq.values()) {
    const p = count / len;
    h -= p * Math.log2(p);
  }
  return h;
}

/** Luhn checksum over the digits of a card number candidate */
export function passesLuhn(candidate: string): boolean {
  const digits = candidate.replace(/\D/g, '');
  if (digits.length < 13 || digits.length > 19) return false;
  let sum = 0;
  for (let i = 0; i < digits.length; i++) {
    let d = digits.charCodeAt(digits.length - 1 - i) - 48;
    if (i % 2 === 1) {
      d *= 2;
      if (d > 9) d -= 9;
    }
    sum += d;
  }
  return sum % 10 === 0;
}

function looksRandom(run: string): boolean {
  return /[a-z]/.test(run) && /[A-Z]/.test(run) && /\d/.test(run) && shannonEntropy(run) >= MIN_SECRET_ENTROPY;
}

function maskValue(kind: SensitiveKind, value: string): string {
  switch (kind) {
    case 'private_key':
      return '[Private Key]';
    case 'certificate':
      return '[Certificate]';
    case 'token':
      return value.startsWith('Bearer') ? `Bearer ${MASK}` : MASK;
    case 'api_key':
    case 'password':
    case 'ssn':
    case 'credit_card':
      return MASK;
  }
}

function collect(
  text: string,
  kind: SensitiveKind,
  pattern: RegExp,
  accept: (value: string) => boolean = () => true,
): SensitiveMatch[] {
  const found: SensitiveMatch[] = [];
  for (const m of text.matchAll(pattern)) {
    const start = m.index ?? 0;
    const original = m[0];
    if (!accept(original)) continue;
    found.push({ kind, start, end: start + original.length, original, masked: maskValue(kind, original) });
  }
  return found;
}

function collectPasswords(text: string): SensitiveMatch[] {
  const found: SensitiveMatch[] = [];
  for (const m of text.matchAll(PASSWORD_PATTERN)) {
    const [, key, separator, value] = m;
    // Only the value is sensitive; the key stays readable
    const start = (m.index ?? 0) + key.length + separator.length;
    found.push({ kind: 'password', start, end: start + value.length, original: value, masked: MASK });
  }
  return found;
}

/**
 * A digit run may carry trailing digits (a CVV, an expiry), so the longest
 * prefix that passes Luhn is the card.
 */
function collectCards(text: string): SensitiveMatch[] {
  const found: SensitiveMatch[] = [];
  for (const m of text.matchAll(CARD_CANDIDATE)) {
    const start = m.index ?? 0;
    const run = m[0];
    const digitEnds: number[] = [];
    for (let i = 0; i < run.length; i++) {
      if (run[i] >= '0' && run[i] <= '9') digitEnds.push(i + 1);
    }
    for (let count = digitEnds.length; count >= MIN_CARD_DIGITS; count--) {
      const original = run.slice(0, digitEnds[count - 1]);
      if (passesLuhn(original)) {
        found.push({ kind: 'credit_card', start, end: start + original.length, original, masked: MASK });
        break;
      }
    }
  }
  return found;
}

/** Every hit of every category, overlaps included */
function scan(text: string): SensitiveMatch[] {
  return [
    ...API_KEY_PATTERNS.flatMap((p) => collect(text, 'api_key', p)),
    ...collect(text, 'api_key', HIGH_ENTROPY_CANDIDATE, looksRandom),
    ...collectPasswords(text),
    ...SSN_PATTERNS.flatMap((p) => collect(text, 'ssn', p)),
    ...collectCards(text),
    ...collect(text, 'private_key', PRIVATE_KEY_PATTERN),
    ...collect(text, 'certificate', CERTIFICATE_PATTERN),
    ...TOKEN_PATTERNS.flatMap((p) => collect(text, 'token', p)),
  ];
}

function resolveOverlaps(all: SensitiveMatch[]): SensitiveMatch[] {
  const sorted = [...all].sort((a, b) => a.start - b.start || (b.end - b.start) - (a.end - a.start));

  const kept: SensitiveMatch[] = [];
  let lastEnd = -1;
  for (const match of sorted) {
    if (match.start >= lastEnd) {
      kept.push(match);
      lastEnd = match.end;
    }
  }
  return kept;
}

// ─── Public API ───

/**
 * Find sensitive spans to mask. Every category is scanned independently;
 * overlapping hits are resolved by earliest start, then longest span, then
 * category order.
 */
export function detectSensitive(text: string): SensitiveMatch[] {
  return resolveOverlaps(scan(text));
}

/** Replace every detected span with its mask */
export function maskText(text: string, matches: SensitiveMatch[] = detectSensitive(text)): string {
  if (matches.length === 0) return text;

  let result = '';
  let lastPos = 0;
  for (const match of matches) {
    result += text.slice(lastPos, match.start) + match.masked;
    lastPos = match.end;
  }
  return result + text.slice(lastPos);
}

export function isSensitive(text: string): boolean {
  return detectSensitive(text).length > 0;
}

/**
 * Full verdict for one clipboard text: flag, detected kinds and the masked,
 * truncated preview (null when nothing was found).
 */
export function redact(text: string, options: RedactOptions): Redaction {
  const all = scan(text);
  if (all.length === 0) {
    return { isSensitive: false, maskedPreview: null, kinds: [], matches: [] };
  }

  // A category counts even when its span lost an overlap to another one
  const kinds = [...new Set(all.map((m) => m.kind))];
  const matches = resolveOverlaps(all);
  return {
    isSensitive: true,
    maskedPreview: truncateText(maskText(text, matches), options.previewLength),
    kinds,
    matches,
  };
}

/** Human-readable summary such as "Api Key, Password" */
export function describeSensitiveKinds(kinds: readonly SensitiveKind[]): string {
  const titles = new Set(
    kinds.map((k) =>
      k
        .split('_')
        .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
        .join(' '),
    ),
  );
  return [...titles].sort().join(', ');
}
