import 'reflect-metadata';
import { validate } from './env.validation';

describe('validate (environment)', () => {
  it('fills defaults and converts types', () => {
    const config = validate({
      DATABASE_URL: 'postgres://localhost/test',
      PORT: '8080',
      DEV_SEED_ENABLED: 'TRUE',
      TELEGRAM_BOT_USERNAME: '@quiz_bot',
    });

    expect(config.PORT).toBe(8080);
    expect(config.DEV_SEED_ENABLED).toBe(true);
    expect(config.DATABASE_SSL).toBe(false);
    expect(config.OPENAI_TIMEOUT_MS).toBe(60000);
    expect(config.TELEGRAM_BOT_USERNAME).toBe('quiz_bot');
    expect(config.APP_DEEP_LINK_REDIRECT).toBe('bestias://auth/telegram');
  });

  it('treats blank secrets as absent', () => {
    const config = validate({ DATABASE_URL: 'postgres://localhost/test', OPENAI_API_KEY: '   ' });
    expect(config.OPENAI_API_KEY).toBeUndefined();
  });

  it('rejects a missing database url', () => {
    expect(() => validate({})).toThrow(/DATABASE_URL/);
  });
});
