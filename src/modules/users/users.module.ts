import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { User } from '../../database/entities/user.entity';
import { UserResult } from '../../database/entities/user-result.entity';
import { UsersService } from './users.service';
import { CreditsService } from './credits.service';
import { UsersController } from './users.controller';
import { AuthGuard } from '../../common/guards/auth.guard';

@Module({
  imports: [TypeOrmModule.forFeature([User, UserResult])],
  controllers: [UsersController],
  providers: [UsersService, CreditsService, AuthGuard],
  exports: [UsersService, CreditsService, AuthGuard],
})
export class UsersModule {}
