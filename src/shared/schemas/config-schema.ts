/**
 * Zod schema for clipkeep configuration.
 *
 * Single source of truth for config shape, defaults, and validation.
 * The ClipkeepConfig type is derived from this schema via z.infer<>.
 *
 * @module shared/schemas/config-schema
 */

import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const ClipkeepConfigSchema = z.object({
  /** Schema version for migrations */
  _version: z.number().default(2),

  // ── Capture ──
  /** Clipboard poll cadence (ms); sub-second so captures feel immediate */
  pollIntervalMs: z.number().int().min(100).max(5_000).default(500),
  /** Text payloads larger than this (UTF-8 bytes) are not captured */
  maxTextSize: z.number().int().positive().default(1_000_000),
  /** Image payloads larger than this (bytes) are not captured */
  maxImageSize: z.number().int().positive().default(10_000_000),
  /** Mask sensitive text in previews */
  redactSensitive: z.boolean().default(true),

  // ── History ──
  /** Active entry cap; the oldest entries are evicted beyond it */
  maxEntries: z.number().int().min(1).max(100_000).default(500),

  // ── Display ──
  /** Characters shown per menu item */
  previewLength: z.number().int().min(8).max(1_000).default(60),
  /** Items shown in the dropdown */
  menuDisplayCount: z.number().int().min(1).max(100).default(10),

  // ── Diagnostics ──
  logLevel: LogLevelSchema.default('info'),
});

export type ClipkeepConfigParsed = z.infer<typeof ClipkeepConfigSchema>;

/** Bump when the persisted shape changes and add a migration below */
export const CURRENT_CONFIG_VERSION = 2;

/**
 * Ordered migrations keyed by the version they upgrade from.
 */
export const CONFIG_MIGRATIONS: Record<number, (raw: Record<string, unknown>) => Record<string, unknown>> = {
  // v1 stored the poll interval in seconds
  1: (raw) => {
    const { pollInterval, ...rest } = raw;
    if (typeof pollInterval === 'number' && rest.pollIntervalMs === undefined) {
      return { ...rest, pollIntervalMs: Math.round(pollInterval * 1000) };
    }
    return rest;
  },
};
