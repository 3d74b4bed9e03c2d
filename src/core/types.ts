/**
 * Core Authentication Types
 *
 * Type definitions shared by the aggregator, the service and the builder.
 * These types do NOT depend on the config or provider layers.
 *
 * Architectural Rule: Core → Providers → Config
 * Files in src/core/ MUST NOT import from src/providers/ or src/config/
 */

// ============================================================================
// Execution Environment
// ============================================================================

export const EXECUTION_ENVIRONMENTS = ['development', 'test', 'staging', 'production'] as const;

/**
 * Server environment a credential is verified against.
 *
 * Supplied by host configuration; providers may use it to pick the
 * audience, directory or realm they check credentials against.
 */
export type ExecutionEnvironment = (typeof EXECUTION_ENVIRONMENTS)[number];

export function isExecutionEnvironment(value: unknown): value is ExecutionEnvironment {
  return typeof value === 'string' && (EXECUTION_ENVIRONMENTS as readonly string[]).includes(value);
}

// ============================================================================
// Provider Families
// ============================================================================

export type ProviderFamily = 'authentication' | 'masquerade';

// ============================================================================
// Audit Types
// ============================================================================

/**
 * AuditEntry represents a single audit log entry.
 *
 * All audit entries MUST include a source field to track the origin of the
 * entry (e.g. 'auth:service', 'auth:builder').
 */
export interface AuditEntry {
  /** Timestamp when the event occurred */
  timestamp: Date;

  /** Origin of the audit entry */
  source: string;

  /** User the event concerns (user name or principal name) */
  userId?: string;

  /** Action that was performed */
  action: string;

  /** Whether the action succeeded */
  success: boolean;

  /** Human-readable reason for the result */
  reason?: string;

  /** Error message if a provider threw */
  error?: string;

  /** Additional metadata about the event */
  metadata?: Record<string, unknown>;
}
