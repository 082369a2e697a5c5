import { Module } from '@nestjs/common';
import { ProfileGeneratorService } from './profile-generator.service';

@Module({
  providers: [ProfileGeneratorService],
  exports: [ProfileGeneratorService],
})
export class ProfilesModule {}
