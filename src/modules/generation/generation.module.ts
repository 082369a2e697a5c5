import { Global, Module } from '@nestjs/common';
import { TextGenerator } from './text-generator';
import { OpenAiTextGenerator } from './openai-text-generator.service';

@Global()
@Module({
  providers: [{ provide: TextGenerator, useClass: OpenAiTextGenerator }],
  exports: [TextGenerator],
})
export class GenerationModule {}
