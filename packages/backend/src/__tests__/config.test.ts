import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../config';

const base = {
  DATABASE_URL: 'postgres://localhost:5432/pressdesk_test',
  JWT_SECRET: 'test-secret',
};

describe('config.ts', () => {
  it('applies defaults and leaves email off without SMTP settings', () => {
    const config = loadConfig(base);

    expect(config).toEqual({
      databaseUrl: base.DATABASE_URL,
      jwtSecret: 'test-secret',
      port: 3001,
      corsOrigins: ['http://localhost:5173', 'https://localhost:3000'],
      email: null,
      dashboardUrl: 'http://localhost:5173',
    });
  });

  it('enables email once host, user and password are set', () => {
    const config = loadConfig({
      ...base,
      SMTP_HOST: 'smtp.example.test',
      SMTP_USER: 'mailer',
      SMTP_PASS: 'test-password',
      SMTP_SECURE: 'true',
      SMTP_PORT: '465',
    });

    expect(config.email).toEqual({
      host: 'smtp.example.test',
      port: 465,
      secure: true,
      user: 'mailer',
      pass: 'test-password',
      from: 'mailer',
    });
  });

  it('treats blank values as unset and trims the dashboard URL', () => {
    const config = loadConfig({
      ...base,
      SMTP_HOST: '',
      CORS_ORIGINS: 'https://a.example.test, https://b.example.test',
      DASHBOARD_URL: 'https://press.example.test/',
    });

    expect(config.email).toBeNull();
    expect(config.corsOrigins).toEqual(['https://a.example.test', 'https://b.example.test']);
    expect(config.dashboardUrl).toBe('https://press.example.test');
  });

  it('names every missing variable', () => {
    try {
      loadConfig({ PORT: 'abc' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (!(err instanceof ConfigError)) return;
      expect(err.problems).toHaveLength(3);
      expect(err.problems.filter((p) => p.startsWith('DATABASE_URL:') || p.startsWith('JWT_SECRET:'))).toHaveLength(2);
      expect(err.problems.some((p) => p.startsWith('PORT:'))).toBe(true);
    }
  });
});
