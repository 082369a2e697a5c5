import { InternalServerErrorException, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosError, AxiosHeaders } from 'axios';
import { GoogleService } from './google.service';

const CLIENT_ID = 'test-client.apps.googleusercontent.com';

function tokenInfo(overrides: Record<string, string> = {}) {
  return {
    aud: CLIENT_ID,
    iss: 'https://accounts.google.com',
    sub: 'google-sub-1',
    exp: String(Math.floor(Date.now() / 1000) + 600),
    email: 'anna@example.com',
    name: 'Anna',
    ...overrides,
  };
}

function httpError(status: number): AxiosError {
  const headers = new AxiosHeaders();
  return new AxiosError('Request failed', 'ERR_BAD_REQUEST', { headers }, undefined, {
    status,
    statusText: 'Bad Request',
    headers: {},
    config: { headers },
    data: {},
  });
}

describe('GoogleService', () => {
  const service = new GoogleService(new ConfigService({ GOOGLE_WEB_CLIENT_ID: CLIENT_ID }));
  let get: jest.SpyInstance;

  beforeEach(() => {
    get = jest.spyOn(axios, 'get');
  });

  afterEach(() => jest.restoreAllMocks());

  it('returns the identity of a valid token', async () => {
    get.mockResolvedValue({ data: tokenInfo() });

    await expect(service.verifyIdToken('id-token')).resolves.toEqual({
      sub: 'google-sub-1',
      email: 'anna@example.com',
      name: 'Anna',
    });
    expect(get).toHaveBeenCalledWith('https://oauth2.googleapis.com/tokeninfo', {
      params: { id_token: 'id-token' },
      timeout: 10000,
    });
  });

  it('rejects tokens issued for another client', async () => {
    get.mockResolvedValue({ data: tokenInfo({ aud: 'other-client' }) });

    await expect(service.verifyIdToken('id-token')).rejects.toThrow(new UnauthorizedException('Invalid Google token'));
  });

  it('rejects expired tokens', async () => {
    get.mockResolvedValue({ data: tokenInfo({ exp: '1000' }) });

    await expect(service.verifyIdToken('id-token')).rejects.toBeInstanceOf(UnauthorizedException);
  });

  it('maps a 400 from Google to 401', async () => {
    get.mockRejectedValue(httpError(400));

    await expect(service.verifyIdToken('id-token')).rejects.toBeInstanceOf(UnauthorizedException);
  });

  it('maps transport failures to 500', async () => {
    get.mockRejectedValue(new Error('ECONNRESET'));

    await expect(service.verifyIdToken('id-token')).rejects.toThrow(
      new InternalServerErrorException('Google auth failed'),
    );
  });

  it('fails when no client id is configured', async () => {
    const unconfigured = new GoogleService(new ConfigService({}));

    await expect(unconfigured.verifyIdToken('id-token')).rejects.toThrow('Google auth not configured');
    expect(get).not.toHaveBeenCalled();
  });
});
