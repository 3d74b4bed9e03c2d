/**
 * Unified Configuration Schema
 *
 * Combines the Core configuration with per-provider sections. Each provider
 * section is kept as raw JSON here and validated by the provider that owns it.
 */

import { z } from 'zod';
import { CoreAuthConfigSchema } from './core.js';

export {
  ExecutionEnvironmentSchema,
  MasqueradeConfigSchema,
  AuditConfigSchema,
  CoreAuthConfigSchema,
  type MasqueradeConfig,
  type AuditConfig,
  type CoreAuthConfig,
  type CoreAuthConfigInput,
} from './core.js';

export const UnifiedConfigSchema = z.object({
  auth: CoreAuthConfigSchema,
  providers: z
    .record(z.string(), z.unknown())
    .optional()
    .default({})
    .describe('Provider configuration sections, keyed by provider name'),
});

export type UnifiedConfig = z.infer<typeof UnifiedConfigSchema>;
export type UnifiedConfigInput = z.input<typeof UnifiedConfigSchema>;
