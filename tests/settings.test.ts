import { afterEach, describe, it, expect, vi } from 'vitest';
import { loadSettings } from '../src/config/settings';

describe('loadSettings', () => {
  it('applies defaults', () => {
    const settings = loadSettings({ NODE_ENV: 'development' });

    expect(settings).toMatchObject({
      env: 'development',
      port: 3000,
      databasePath: 'freelance-board.db',
      sessionSecret: 'development-session-secret',
      sessionTtlSeconds: 604800,
      bcryptRounds: 10,
      corsOrigins: '*',
    });
  });

  it('splits a list of CORS origins', () => {
    const settings = loadSettings({ CORS_ORIGIN: 'http://a.test, http://b.test' });

    expect(settings.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
  });

  it('refuses to run in production without a session secret', () => {
    expect(() => loadSettings({ NODE_ENV: 'production' })).toThrow(
      'Invalid environment configuration: SESSION_SECRET: SESSION_SECRET is required in production'
    );
  });

  it('refuses a non-numeric port', () => {
    expect(() => loadSettings({ PORT: 'eighty' })).toThrow(/PORT/);
  });
});

describe('getSettings', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it('defers validation until asked, so a bad environment can be reported', async () => {
    vi.stubEnv('PORT', 'eighty');
    vi.resetModules();

    const module = await import('../src/config/settings');

    expect(() => module.getSettings()).toThrow(/PORT/);
  });
});
