import { Module } from '@nestjs/common';
import { ArchetypeResolverService } from './archetype-resolver.service';

@Module({
  providers: [ArchetypeResolverService],
  exports: [ArchetypeResolverService],
})
export class ArchetypesModule {}
