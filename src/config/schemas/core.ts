/**
 * Core Authentication Configuration Schema
 *
 * Defines configuration for the Core layer: default environment, masquerade
 * policy and audit logging. Provider settings live in their own sections and
 * are validated by the provider packages.
 */

import { z } from 'zod';
import {
  EXECUTION_ENVIRONMENTS,
  masqueradePermissionFromRoles,
  masqueradeRestrictionFromRoles,
} from '../../core/index.js';

// ============================================================================
// Shared Base Schemas
// ============================================================================

export const ExecutionEnvironmentSchema = z
  .enum(EXECUTION_ENVIRONMENTS)
  .describe('Environment credentials are verified against by default');

const RoleListSchema = z.array(z.string().min(1, 'Role names must not be empty'));

/**
 * Masquerade configuration
 *
 * Role lists keep the three states apart:
 * - roles: null/absent = masquerade disabled, [] = any principal, [...] = holders of a listed role
 * - restrictedRoles: null/absent = no restriction, [...] = roles a target may only have
 *   if the principal already holds them
 *
 * Parsed into MasqueradePermission / MasqueradeRestriction values.
 */
export const MasqueradeConfigSchema = z
  .object({
    roles: RoleListSchema.nullable()
      .optional()
      .describe('Roles permitted to initiate masquerade'),
    restrictedRoles: RoleListSchema.nullable()
      .optional()
      .describe('Roles a masquerade target must not gain over the principal'),
  })
  .strict()
  .default({})
  .transform((masquerade) => ({
    permission: masqueradePermissionFromRoles(masquerade.roles),
    restriction: masqueradeRestrictionFromRoles(masquerade.restrictedRoles),
  }));

/**
 * Audit logging configuration
 */
export const AuditConfigSchema = z.object({
  enabled: z.boolean().optional().default(true).describe('Enable audit logging'),
  logAllAttempts: z
    .boolean()
    .optional()
    .default(true)
    .describe('Log successful decisions too, not only failures'),
  maxEntries: z
    .number()
    .int()
    .min(1)
    .max(1000000)
    .optional()
    .default(10000)
    .describe('Capacity of the in-memory audit trail'),
});

// ============================================================================
// Core Authentication Configuration
// ============================================================================

export const CoreAuthConfigSchema = z.object({
  environment: ExecutionEnvironmentSchema,
  masquerade: MasqueradeConfigSchema,
  audit: AuditConfigSchema.optional().describe('Audit logging settings'),
});

// ============================================================================
// TypeScript Types
// ============================================================================

export type MasqueradeConfig = z.infer<typeof MasqueradeConfigSchema>;
export type AuditConfig = z.infer<typeof AuditConfigSchema>;
export type CoreAuthConfig = z.infer<typeof CoreAuthConfigSchema>;
export type CoreAuthConfigInput = z.input<typeof CoreAuthConfigSchema>;
