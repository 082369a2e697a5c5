import { Module } from '@nestjs/common';
import { AuthController, DevController } from './auth.controller';
import { AuthService } from './auth.service';
import { GoogleService } from './google.service';
import { TelegramService } from './telegram.service';
import { UsersModule } from '../users/users.module';

@Module({
  imports: [UsersModule],
  controllers: [AuthController, DevController],
  providers: [AuthService, GoogleService, TelegramService],
})
export class AuthModule {}
