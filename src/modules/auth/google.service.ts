import { Injectable, InternalServerErrorException, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';

export interface GoogleIdentity {
  sub: string;
  email: string | null;
  name: string | null;
}

interface GoogleTokenInfo {
  aud?: string;
  iss?: string;
  sub?: string;
  exp?: string;
  email?: string;
  name?: string;
}

const TOKEN_INFO_URL = 'https://oauth2.googleapis.com/tokeninfo';
const GOOGLE_ISSUERS = ['accounts.google.com', 'https://accounts.google.com'];

/**
 * Verifies Google ID tokens through Google's tokeninfo endpoint, which checks
 * the signature; audience, issuer and expiry are checked here.
 */
@Injectable()
export class GoogleService {
  private readonly logger = new Logger(GoogleService.name);

  constructor(private readonly configService: ConfigService) {}

  async verifyIdToken(idToken: string): Promise<GoogleIdentity> {
    const clientId = this.configService.get<string>('GOOGLE_WEB_CLIENT_ID');
    if (!clientId) {
      throw new InternalServerErrorException('Google auth not configured');
    }

    const tokenTail = idToken.slice(-6);
    let info: GoogleTokenInfo;

    try {
      const response = await axios.get<GoogleTokenInfo>(TOKEN_INFO_URL, {
        params: { id_token: idToken },
        timeout: 10000,
      });
      info = response.data;
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      if (status !== undefined && status < 500) {
        this.logger.warn(`auth.google.invalid status=${status} token_tail=${tokenTail}`);
        throw new UnauthorizedException('Invalid Google token');
      }
      this.logger.error(`auth.google.unexpected_verify_error token_tail=${tokenTail}`);
      throw new InternalServerErrorException('Google auth failed');
    }

    const expiresAt = Number(info.exp) * 1000;
    const reason =
      info.aud !== clientId ? 'audience'
      : !info.iss || !GOOGLE_ISSUERS.includes(info.iss) ? 'issuer'
      : !Number.isFinite(expiresAt) || expiresAt <= Date.now() ? 'expired'
      : !info.sub ? 'missing_sub'
      : null;

    if (reason || !info.sub) {
      this.logger.warn(`auth.google.invalid reason=${reason} token_tail=${tokenTail}`);
      throw new UnauthorizedException('Invalid Google token');
    }

    return { sub: info.sub, email: info.email ?? null, name: info.name ?? null };
  }
}
