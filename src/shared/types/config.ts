/**
 * Configuration types, derived from the zod schema.
 */

import type { z } from 'zod';
import type { LogLevelSchema } from '../schemas/config-schema';

export type { ClipkeepConfigParsed as ClipkeepConfig } from '../schemas/config-schema';

export type LogLevel = z.infer<typeof LogLevelSchema>;
