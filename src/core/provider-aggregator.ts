/**
 * Provider Aggregator - First success wins, failures are merged
 *
 * Runs a list of providers through a resolver function and turns their
 * answers into a single AuthenticationResult:
 *
 * 1. Providers are called one at a time, in registration order. Order decides
 *    which success wins, and side-effecting providers must not race.
 * 2. The first successful result is returned immediately; later providers are
 *    never called.
 * 3. Skipped (and null) results are ignored.
 * 4. Failures are collected without duplicates. One failure is returned as the
 *    original instance; several are merged into one failure carrying the
 *    distinct error messages of all of them.
 *
 * Provider exceptions are not caught here.
 */

import { AuthenticationResult } from './authentication-result.js';
import type { ProviderResolution } from './providers.js';
import type { ProviderFamily } from './types.js';

export type ProviderResolver<TProvider> = (provider: TProvider) => Promise<ProviderResolution>;

/**
 * Key identifying a failure by value. Failures never carry an identity, so the
 * sorted error list is enough.
 */
function failureKey(result: AuthenticationResult): string {
  return JSON.stringify([...result.errors].sort());
}

export class ProviderAggregator {
  private readonly logPrefix: string;

  constructor(readonly family: ProviderFamily) {
    this.logPrefix = `[ProviderAggregator:${family}]`;
  }

  /**
   * Resolve the first successful result from an ordered list of providers
   *
   * @param providers - Providers in the order they must be tried
   * @param resolver - Asks one provider for its result
   * @returns The first success, the (merged) failure, or Skip
   */
  async resolve<TProvider extends { readonly name: string }>(
    providers: readonly TProvider[] | null | undefined,
    resolver: ProviderResolver<TProvider>
  ): Promise<AuthenticationResult> {
    if (!providers || providers.length === 0) {
      return AuthenticationResult.Skip;
    }

    const failures = new Map<string, AuthenticationResult>();

    for (const provider of providers) {
      const result = await resolver(provider);

      if (result === null || result === undefined) {
        console.warn(`${this.logPrefix} Provider ${provider.name} returned no result; treating as skipped`);
        continue;
      }

      if (result.skipped) {
        continue;
      }

      if (result.successful) {
        console.log(`${this.logPrefix} Provider ${provider.name} succeeded`);
        return result;
      }

      // Keep the first instance of equal failures
      const key = failureKey(result);
      if (!failures.has(key)) {
        failures.set(key, result);
      }
    }

    switch (failures.size) {
      case 0:
        return AuthenticationResult.Skip;
      case 1:
        return failures.values().next().value ?? AuthenticationResult.Skip;
      default: {
        const errors = new Set<string>();
        for (const failure of failures.values()) {
          for (const error of failure.errors) {
            errors.add(error);
          }
        }
        return errors.size === 0 ? AuthenticationResult.Skip : AuthenticationResult.failure(errors);
      }
    }
  }
}
