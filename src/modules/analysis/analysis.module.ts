import { Module } from '@nestjs/common';
import { ArchetypesModule } from '../archetypes/archetypes.module';
import { ProfilesModule } from '../profiles/profiles.module';
import { UsersModule } from '../users/users.module';
import { AnalysisController } from './analysis.controller';
import { AnalysisService } from './analysis.service';
import { RunsService } from './runs.service';

@Module({
  imports: [ArchetypesModule, ProfilesModule, UsersModule],
  controllers: [AnalysisController],
  providers: [AnalysisService, RunsService],
  exports: [RunsService],
})
export class AnalysisModule {}
