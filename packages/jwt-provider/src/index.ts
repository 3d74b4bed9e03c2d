/**
 * @auth-orchestrator/jwt-provider - JWT bearer-credential authentication provider
 *
 * @module @auth-orchestrator/jwt-provider
 */

export {
  JwtAuthenticationProvider,
  INVALID_TOKEN_MESSAGE,
  TOKEN_USER_MISMATCH_MESSAGE,
} from './jwt-provider.js';

export {
  JwtProviderConfigSchema,
  DEFAULT_HMAC_ALGORITHMS,
  DEFAULT_ASYMMETRIC_ALGORITHMS,
  type JwtProviderConfig,
  type JwtProviderConfigInput,
} from './config.js';
