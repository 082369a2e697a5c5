import { Injectable, InternalServerErrorException, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as crypto from 'crypto';
import { Buffer } from 'buffer';
import { TelegramAuthDto } from './auth.dto';

/**
 * Telegram Login Widget verification: HMAC-SHA256 over the sorted
 * `key=value` lines of the signed fields, keyed with SHA-256(bot token).
 */
@Injectable()
export class TelegramService {
  constructor(private readonly configService: ConfigService) {}

  buildCheckString(payload: TelegramAuthDto): string {
    const entries: Array<[string, string | number | undefined]> = [
      ['id', payload.id],
      ['first_name', payload.first_name],
      ['last_name', payload.last_name],
      ['username', payload.username],
      ['photo_url', payload.photo_url],
      ['auth_date', payload.auth_date],
    ];
    return entries
      .filter((entry): entry is [string, string | number] => entry[1] !== undefined && entry[1] !== null)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, value]) => `${key}=${value}`)
      .join('\n');
  }

  sign(payload: TelegramAuthDto, botToken: string): string {
    const secretKey = crypto.createHash('sha256').update(botToken).digest();
    return crypto.createHmac('sha256', secretKey).update(this.buildCheckString(payload)).digest('hex');
  }

  verify(payload: TelegramAuthDto, nowMs: number = Date.now()): void {
    const botToken = this.configService.get<string>('TELEGRAM_BOT_TOKEN');
    if (!botToken) {
      throw new InternalServerErrorException('Telegram auth not configured');
    }

    const maxAge = this.configService.get<number>('TELEGRAM_AUTH_MAX_AGE_SECONDS') ?? 86400;
    if (Math.floor(nowMs / 1000) - payload.auth_date > maxAge) {
      throw new UnauthorizedException('Telegram auth expired');
    }

    const expected = Buffer.from(this.sign(payload, botToken));
    const received = Buffer.from(payload.hash);
    if (expected.length !== received.length || !crypto.timingSafeEqual(expected, received)) {
      throw new UnauthorizedException('Invalid Telegram hash');
    }
  }

  buildStartUrls(): { authUrl: string; callbackUrl: string } {
    const botUsername = this.configService.get<string>('TELEGRAM_BOT_USERNAME');
    if (!botUsername) {
      throw new InternalServerErrorException('Telegram bot username not configured');
    }
    const callbackUrl = this.configService.get<string>('TELEGRAM_REDIRECT_URI') || '/auth/telegram/callback';
    return {
      authUrl: `https://oauth.telegram.org/auth?bot_id=@${botUsername}&origin=${callbackUrl}`,
      callbackUrl,
    };
  }

  buildDeepLink(params: { token: string; userId: number; compatCredits: number; hasFull: boolean }): string {
    const base = this.configService.get<string>('APP_DEEP_LINK_REDIRECT') || 'bestias://auth/telegram';
    const separator = base.includes('?') ? '&' : '?';
    return (
      `${base}${separator}token=${params.token}` +
      `&userId=${params.userId}&compatCredits=${params.compatCredits}&hasFull=${params.hasFull}`
    );
  }
}
