import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CompatReport } from '../../database/entities/compat-report.entity';
import { Invite } from '../../database/entities/invite.entity';
import { UsersModule } from '../users/users.module';
import { CompatibilityController } from './compatibility.controller';
import { CompatibilityService } from './compatibility.service';
import { InvitesService } from './invites.service';

@Module({
  imports: [TypeOrmModule.forFeature([CompatReport, Invite]), UsersModule],
  controllers: [CompatibilityController],
  providers: [CompatibilityService, InvitesService],
})
export class CompatibilityModule {}
