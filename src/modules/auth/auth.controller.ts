import { Body, Controller, Get, HttpCode, NotFoundException, Post } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { AuthService } from './auth.service';
import { TelegramService } from './telegram.service';
import { DevSeedUserDto, GoogleAuthDto, RegisterDto, TelegramAuthDto } from './auth.dto';
import { presentSession } from '../users/user.presenter';

@ApiTags('Auth')
@Controller('auth')
export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly telegramService: TelegramService,
  ) {}

  @Post('register')
  @HttpCode(200)
  @ApiOperation({ summary: 'Register or update a user by email or telegram handle' })
  async register(@Body() dto: RegisterDto) {
    const { user, token } = await this.authService.register(dto);
    return presentSession(user, token);
  }

  @Post('google')
  @HttpCode(200)
  @ApiOperation({ summary: 'Sign in with a Google ID token' })
  async google(@Body() dto: GoogleAuthDto) {
    const { user, token } = await this.authService.loginWithGoogle(dto);
    return presentSession(user, token);
  }

  @Post('telegram')
  @HttpCode(200)
  @ApiOperation({ summary: 'Sign in with Telegram Login Widget data' })
  async telegram(@Body() dto: TelegramAuthDto) {
    const { user, token } = await this.authService.loginWithTelegram(dto);
    return presentSession(user, token);
  }

  @Get('telegram/start')
  @ApiOperation({ summary: 'Telegram login URL for the app' })
  telegramStart() {
    return this.telegramService.buildStartUrls();
  }

  @Post('telegram/callback')
  @HttpCode(200)
  @ApiOperation({ summary: 'Telegram login callback, answers with an app deep link' })
  async telegramCallback(@Body() dto: TelegramAuthDto) {
    const { user, token } = await this.authService.loginWithTelegram(dto);
    return {
      redirectTo: this.telegramService.buildDeepLink({
        token,
        userId: user.id,
        compatCredits: user.compatCredits,
        hasFull: user.hasFull,
      }),
    };
  }
}

@ApiTags('Dev')
@Controller('dev')
export class DevController {
  constructor(
    private readonly authService: AuthService,
    private readonly configService: ConfigService,
  ) {}

  @Post('seed_user')
  @HttpCode(200)
  @ApiOperation({ summary: 'Create a user with a stored result (development only)' })
  async seedUser(@Body() dto: DevSeedUserDto) {
    if (!this.configService.get<boolean>('DEV_SEED_ENABLED')) {
      throw new NotFoundException();
    }
    return this.authService.seedUser(dto);
  }
}
