/**
 * Standalone Integration Test
 *
 * Wires the sample configuration, the JWT provider and the directory
 * masquerade provider together through the public entry points.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SignJWT } from 'jose';
import {
  AuthenticationResult,
  ConfigManager,
  DirectoryMasqueradeProvider,
  InMemoryUserDirectory,
  Principal,
} from '../../../src/index.js';
import { JwtAuthenticationProvider } from '../../../packages/jwt-provider/src/index.js';

const CONFIG_PATH = './config/auth.json';

async function devToken(userName: string, roles: string[]): Promise<string> {
  return new SignJWT({ preferred_username: userName, roles })
    .setProtectedHeader({ alg: 'HS256' })
    .setIssuer('https://idp.example.com')
    .setAudience('intranet-dev')
    .setIssuedAt()
    .setExpirationTime('5m')
    .sign(new TextEncoder().encode('change-me-dev-secret-0000'));
}

describe('Standalone Integration', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  async function createService() {
    const manager = new ConfigManager({ env: {} });
    await manager.loadConfig(CONFIG_PATH);

    const directory = new InMemoryUserDirectory([
      { name: 'bob', roles: ['user'] },
      { name: 'carol', roles: ['user', 'admin'] },
    ]);

    return manager
      .createBuilder()
      .addAuthenticationProvider(
        JwtAuthenticationProvider.fromConfig(manager.getProviderConfig('jwt'))
      )
      .addMasqueradeProvider(new DirectoryMasqueradeProvider(directory))
      .build();
  }

  it('should load the sample configuration', async () => {
    const service = await createService();

    expect(service.describe()).toEqual({
      environment: 'development',
      authenticationProviders: ['jwt'],
      masqueradeProviders: ['directory'],
      masqueradePermission: { kind: 'restricted', roles: ['support'] },
      masqueradeRestriction: { kind: 'restricted', roles: ['admin'] },
    });
  });

  it('should authenticate and then masquerade', async () => {
    const service = await createService();

    const login = await service.authenticate('operator', await devToken('operator', ['support']));
    expect(login.successful).toBe(true);
    if (!login.identity) {
      throw new Error('expected an identity');
    }
    const operator = Principal.of(login.identity);

    const asBob = await service.masquerade(operator, 'bob');
    expect(asBob.identity?.name).toBe('bob');
    expect(asBob.identity?.claims.masqueradedBy).toBe('operator');

    const asCarol = await service.masquerade(operator, 'carol');
    expect([...asCarol.errors]).toEqual(['Insufficient privileges to masquerade as target user.']);
  });

  it('should deny masquerade to users without the support role', async () => {
    const service = await createService();

    const login = await service.authenticate('bob', await devToken('bob', ['user']));
    if (!login.identity) {
      throw new Error('expected an identity');
    }

    const result = await service.masquerade(Principal.of(login.identity), 'carol');

    expect(result).toBe(AuthenticationResult.AccessDenied);
  });

  it('should skip plain passwords no provider understands', async () => {
    const service = await createService();

    expect(await service.authenticate('bob', 'plain-password')).toBe(AuthenticationResult.Skip);
  });

  it('should skip tokens in environments without an audience', async () => {
    const service = await createService();

    const result = await service.authenticate('bob', await devToken('bob', []), 'production');

    expect(result).toBe(AuthenticationResult.Skip);
  });
});
