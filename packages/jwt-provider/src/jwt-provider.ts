/**
 * JWT Authentication Provider
 *
 * Accepts a signed JWT as the password (API tokens, app passwords issued by an
 * identity provider). The token must be issued by the configured issuer for
 * the audience of the requested environment and must name the user being
 * authenticated.
 *
 * Outcomes:
 * - password is not a compact JWS → Skip (a plain password, not ours)
 * - environment has no configured audience → Skip
 * - verification fails (signature, iss, aud, exp, nbf, alg) → failure
 * - token names another user → failure
 * - otherwise → success with the roles from the roles claim
 *
 * JWKS fetch errors and other unexpected errors are not caught.
 */

import { jwtVerify, createRemoteJWKSet, errors as joseErrors } from 'jose';
import type { JWTPayload, JWTVerifyOptions, JWTVerifyResult } from 'jose';
import {
  AuthErrors,
  AuthenticationResult,
  Identity,
  equalsIgnoreCase,
  type AuthenticationProvider,
  type ExecutionEnvironment,
} from 'auth-orchestrator/core';
import {
  JwtProviderConfigSchema,
  DEFAULT_ASYMMETRIC_ALGORITHMS,
  DEFAULT_HMAC_ALGORITHMS,
  type JwtProviderConfig,
  type JwtProviderConfigInput,
} from './config.js';

export const INVALID_TOKEN_MESSAGE = 'Invalid or expired token.';
export const TOKEN_USER_MISMATCH_MESSAGE = 'Token does not belong to user.';

const COMPACT_JWS = /^[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+$/;

/**
 * jose error codes meaning "this token is not acceptable" (as opposed to
 * "could not check the token")
 */
const TOKEN_REJECTION_CODES = new Set([
  'ERR_JWT_EXPIRED',
  'ERR_JWT_CLAIM_VALIDATION_FAILED',
  'ERR_JWT_INVALID',
  'ERR_JWS_INVALID',
  'ERR_JWS_SIGNATURE_VERIFICATION_FAILED',
  'ERR_JOSE_ALG_NOT_ALLOWED',
  'ERR_JOSE_NOT_SUPPORTED',
  'ERR_JWKS_NO_MATCHING_KEY',
  'ERR_JWKS_MULTIPLE_MATCHING_KEYS',
]);

type TokenVerifier = (token: string, options: JWTVerifyOptions) => Promise<JWTVerifyResult>;

function createVerifier(config: JwtProviderConfig): TokenVerifier {
  if (config.jwksUri) {
    const jwks = createRemoteJWKSet(new URL(config.jwksUri), {
      timeoutDuration: 5000,
      cooldownDuration: 30000,
      cacheMaxAge: 600000, // 10 minutes
    });
    return (token, options) => jwtVerify(token, jwks, options);
  }

  const secret = new TextEncoder().encode(config.secret);
  return (token, options) => jwtVerify(token, secret, options);
}

function readRoles(value: unknown): string[] {
  if (typeof value === 'string') {
    return [value];
  }
  if (Array.isArray(value)) {
    return value.filter((role): role is string => typeof role === 'string');
  }
  return [];
}

export class JwtAuthenticationProvider implements AuthenticationProvider {
  readonly name: string;
  private readonly config: JwtProviderConfig;
  private readonly algorithms: string[];
  private readonly verify: TokenVerifier;

  /**
   * @throws ZodError if the configuration is invalid
   */
  constructor(config: JwtProviderConfigInput) {
    this.config = JwtProviderConfigSchema.parse(config);
    this.name = this.config.name;
    this.algorithms =
      this.config.algorithms ??
      (this.config.secret ? DEFAULT_HMAC_ALGORITHMS : DEFAULT_ASYMMETRIC_ALGORITHMS);
    this.verify = createVerifier(this.config);
  }

  /**
   * Create a provider from a raw configuration section (e.g. providers.jwt)
   *
   * @throws AuthError (CONFIGURATION_ERROR) if the section is missing
   */
  static fromConfig(section: unknown): JwtAuthenticationProvider {
    if (section === undefined || section === null) {
      throw AuthErrors.CONFIGURATION_ERROR('JWT provider section is missing');
    }
    return new JwtAuthenticationProvider(JwtProviderConfigSchema.parse(section));
  }

  async resolve(
    userName: string,
    password: string,
    environment: ExecutionEnvironment
  ): Promise<AuthenticationResult> {
    if (!COMPACT_JWS.test(password)) {
      return AuthenticationResult.Skip;
    }

    const audience = this.config.audiences[environment];
    if (!audience) {
      return AuthenticationResult.Skip;
    }

    let payload: JWTPayload;
    try {
      ({ payload } = await this.verify(password, {
        issuer: this.config.issuer,
        audience,
        algorithms: this.algorithms,
        clockTolerance: this.config.clockTolerance,
        maxTokenAge: this.config.maxTokenAge,
      }));
    } catch (error) {
      if (error instanceof joseErrors.JOSEError && TOKEN_REJECTION_CODES.has(error.code)) {
        console.warn(`[JwtAuthenticationProvider:${this.name}] Token rejected:`, {
          userName,
          environment,
          code: error.code,
        });
        return AuthenticationResult.failure(INVALID_TOKEN_MESSAGE);
      }
      throw error;
    }

    const claimedName = payload[this.config.usernameClaim] ?? payload.sub;
    if (typeof claimedName !== 'string' || !equalsIgnoreCase(claimedName, userName)) {
      console.warn(`[JwtAuthenticationProvider:${this.name}] Token user mismatch:`, {
        userName,
        environment,
      });
      return AuthenticationResult.failure(TOKEN_USER_MISMATCH_MESSAGE);
    }

    return AuthenticationResult.success(
      new Identity(claimedName, {
        roles: readRoles(payload[this.config.rolesClaim]),
        authenticationType: 'jwt',
        claims: { ...payload },
      })
    );
  }
}
