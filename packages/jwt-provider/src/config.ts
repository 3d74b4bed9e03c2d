/**
 * JWT provider configuration schema
 */

import { z } from 'zod';
import { EXECUTION_ENVIRONMENTS } from 'auth-orchestrator/core';

export const DEFAULT_HMAC_ALGORITHMS = ['HS256'];
export const DEFAULT_ASYMMETRIC_ALGORITHMS = ['RS256', 'ES256'];

export const JwtProviderConfigSchema = z
  .object({
    name: z.string().min(1).optional().default('jwt').describe('Provider name'),
    issuer: z.string().min(1).describe('Expected iss claim'),
    secret: z
      .string()
      .min(16, 'HMAC secret must be at least 16 characters')
      .optional()
      .describe('Shared HMAC secret'),
    jwksUri: z.string().url().optional().describe('JSON Web Key Set URI for signature verification'),
    algorithms: z
      .array(z.string().min(1))
      .min(1)
      .optional()
      .describe('Allowed signature algorithms (default depends on the key kind)'),
    audiences: z
      .record(z.enum(EXECUTION_ENVIRONMENTS), z.string().min(1))
      .describe('Expected aud claim per environment; environments not listed are skipped'),
    usernameClaim: z
      .string()
      .min(1)
      .optional()
      .default('preferred_username')
      .describe('Claim holding the user name (falls back to sub)'),
    rolesClaim: z.string().min(1).optional().default('roles').describe('Claim holding user roles'),
    clockTolerance: z
      .number()
      .min(0)
      .max(300)
      .optional()
      .default(60)
      .describe('Maximum clock skew tolerance in seconds'),
    maxTokenAge: z
      .number()
      .min(60)
      .max(86400)
      .optional()
      .describe('Maximum token age in seconds (requires iat)'),
  })
  .refine((config) => (config.secret === undefined) !== (config.jwksUri === undefined), {
    message: 'Exactly one of secret or jwksUri must be configured',
  });

export type JwtProviderConfig = z.infer<typeof JwtProviderConfigSchema>;
export type JwtProviderConfigInput = z.input<typeof JwtProviderConfigSchema>;
