import { InternalServerErrorException, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as crypto from 'crypto';
import { TelegramService } from './telegram.service';
import { TelegramAuthDto } from './auth.dto';

const BOT_TOKEN = 'test-bot-token';
const NOW_MS = 1_700_000_000_000;

function payload(overrides: Partial<TelegramAuthDto> = {}): TelegramAuthDto {
  return Object.assign(new TelegramAuthDto(), {
    id: 42,
    first_name: 'Anna',
    username: 'anna_tg',
    auth_date: NOW_MS / 1000 - 60,
    hash: '',
    ...overrides,
  });
}

function signed(data: TelegramAuthDto): TelegramAuthDto {
  const checkString = `auth_date=${data.auth_date}\nfirst_name=${data.first_name}\nid=${data.id}\nusername=${data.username}`;
  const secret = crypto.createHash('sha256').update(BOT_TOKEN).digest();
  data.hash = crypto.createHmac('sha256', secret).update(checkString).digest('hex');
  return data;
}

describe('TelegramService', () => {
  const service = new TelegramService(
    new ConfigService({
      TELEGRAM_BOT_TOKEN: BOT_TOKEN,
      TELEGRAM_AUTH_MAX_AGE_SECONDS: 3600,
      TELEGRAM_BOT_USERNAME: 'bestias_bot',
    }),
  );

  it('builds the data-check string from the present fields in key order', () => {
    expect(service.buildCheckString(payload())).toBe(
      `auth_date=${NOW_MS / 1000 - 60}\nfirst_name=Anna\nid=42\nusername=anna_tg`,
    );
  });

  it('accepts a correctly signed payload', () => {
    expect(() => service.verify(signed(payload()), NOW_MS)).not.toThrow();
  });

  it('rejects a tampered payload', () => {
    const data = signed(payload());
    data.username = 'someone_else';

    expect(() => service.verify(data, NOW_MS)).toThrow(new UnauthorizedException('Invalid Telegram hash'));
  });

  it('rejects stale logins', () => {
    const data = signed(payload({ auth_date: NOW_MS / 1000 - 7200 }));

    expect(() => service.verify(data, NOW_MS)).toThrow(new UnauthorizedException('Telegram auth expired'));
  });

  it('fails when no bot token is configured', () => {
    const unconfigured = new TelegramService(new ConfigService({}));

    expect(() => unconfigured.verify(signed(payload()), NOW_MS)).toThrow(InternalServerErrorException);
  });

  it('builds start urls and the app deep link', () => {
    expect(service.buildStartUrls()).toEqual({
      authUrl: 'https://oauth.telegram.org/auth?bot_id=@bestias_bot&origin=/auth/telegram/callback',
      callbackUrl: '/auth/telegram/callback',
    });
    expect(service.buildDeepLink({ token: 'abc', userId: 7, compatCredits: 2, hasFull: false })).toBe(
      'bestias://auth/telegram?token=abc&userId=7&compatCredits=2&hasFull=false',
    );
  });
});
