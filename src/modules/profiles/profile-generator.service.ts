import { Injectable, InternalServerErrorException, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TextGenerator, GenerationRequest } from '../generation/text-generator';
import { GenerationFailedError } from '../generation/generation.errors';
import { Archetype, Language, animalLabel, elementLabel } from '../archetypes/archetype.constants';
import {
  buildFullPrompt,
  buildFullSystemPrompt,
  buildShortPrompt,
  buildShortSystemPrompt,
  ProfilePromptInput,
} from './profile.prompts';

export interface ProfileRequest {
  name: string;
  lang: Language;
  gender: string;
  archetype: Archetype;
  answersText: string;
}

const SHORT_MAX_OUTPUT_TOKENS = 520;
const FULL_MAX_OUTPUT_TOKENS = 1200;

/**
 * Best-effort prose generation. The returned text is only trimmed, never
 * parsed.
 */
@Injectable()
export class ProfileGeneratorService {
  private readonly logger = new Logger(ProfileGeneratorService.name);

  constructor(
    private readonly textGenerator: TextGenerator,
    private readonly configService: ConfigService,
  ) {}

  async generateShort(request: ProfileRequest): Promise<string> {
    const input = this.toPromptInput(request);
    return this.run('short', {
      system: buildShortSystemPrompt(request.lang),
      input: buildShortPrompt(input),
      maxOutputTokens: SHORT_MAX_OUTPUT_TOKENS,
      model: this.configService.get<string>('OPENAI_SHORT_MODEL'),
    });
  }

  async generateFull(request: ProfileRequest): Promise<string> {
    const input = this.toPromptInput(request);
    return this.run('full', {
      system: buildFullSystemPrompt(request.lang),
      input: buildFullPrompt(input),
      maxOutputTokens: FULL_MAX_OUTPUT_TOKENS,
      model: this.configService.get<string>('OPENAI_FULL_MODEL'),
    });
  }

  private toPromptInput(request: ProfileRequest): ProfilePromptInput {
    const { archetype, lang } = request;
    return {
      name: request.name,
      lang,
      gender: request.gender,
      animalDisplay: animalLabel(archetype.animal, lang, archetype.genderForm),
      elementDisplay: elementLabel(archetype.element, lang),
      answersText: request.answersText,
    };
  }

  private async run(kind: 'short' | 'full', request: GenerationRequest): Promise<string> {
    try {
      const text = await this.textGenerator.generate(request);
      return text.trim();
    } catch (error) {
      if (error instanceof GenerationFailedError) {
        this.logger.error(`❌ ${kind} profile generation failed: ${error.message}`);
        throw new InternalServerErrorException(error.message);
      }
      throw error;
    }
  }
}
