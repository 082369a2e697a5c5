import { BadRequestException, Injectable, InternalServerErrorException, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TextGenerator } from '../generation/text-generator';
import { GenerationFailedError, MalformedGenerationOutputError } from '../generation/generation.errors';
import { parseGenerationJson } from '../generation/generation-json.util';
import {
  ARCHETYPE_VALIDATION_POLICY,
  Archetype,
  Language,
  isAnimal,
  isGenderForm,
  normalizeElement,
} from './archetype.constants';
import { buildResolverInput, buildResolverSystemPrompt } from './archetype.prompts';

export interface QuizAnswer {
  questionId: number;
  answer: string;
}

export interface LockedArchetype {
  animal?: string | null;
  element?: string | null;
  genderForm?: string | null;
}

export interface ResolveArchetypeInput {
  name: string;
  lang: Language;
  gender: string;
  answers: QuizAnswer[];
  locked?: LockedArchetype;
}

const RESOLVER_MAX_OUTPUT_TOKENS = 120;

export function buildAnswersText(answers: QuizAnswer[]): string {
  return answers
    .filter((a) => a.answer)
    .map((a) => `Q${a.questionId}: ${a.answer}`)
    .join('\n');
}

@Injectable()
export class ArchetypeResolverService {
  private readonly logger = new Logger(ArchetypeResolverService.name);

  constructor(
    private readonly textGenerator: TextGenerator,
    private readonly configService: ConfigService,
  ) {}

  async resolve(input: ResolveArchetypeInput): Promise<Archetype> {
    const locked = this.resolveLocked(input.locked);
    if (locked) {
      this.logger.log(`🔒 Using locked archetype ${locked.animal}/${locked.element}/${locked.genderForm}`);
      return locked;
    }
    return this.resolveWithModel(input);
  }

  /**
   * Validates a client-supplied triple. Returns null unless all three fields
   * are present; any invalid field is a client error.
   */
  resolveLocked(locked: LockedArchetype | undefined): Archetype | null {
    if (!locked?.animal || !locked.element || !locked.genderForm) return null;

    if (!isAnimal(locked.animal)) {
      throw new BadRequestException('Invalid lockedAnimal');
    }
    const element = normalizeElement(locked.element);
    if (!element) {
      throw new BadRequestException('Invalid lockedElement');
    }
    if (!isGenderForm(locked.genderForm)) {
      throw new BadRequestException('Invalid lockedGenderForm');
    }
    return { animal: locked.animal, element, genderForm: locked.genderForm };
  }

  private async resolveWithModel(input: ResolveArchetypeInput): Promise<Archetype> {
    let raw: string;
    try {
      raw = await this.textGenerator.generate({
        system: buildResolverSystemPrompt(input.lang),
        input: buildResolverInput({
          name: input.name,
          lang: input.lang,
          gender: input.gender,
          answersText: buildAnswersText(input.answers),
        }),
        maxOutputTokens: RESOLVER_MAX_OUTPUT_TOKENS,
        model: this.configService.get<string>('OPENAI_RESOLVER_MODEL'),
      });
    } catch (error) {
      if (error instanceof GenerationFailedError) throw new InternalServerErrorException(error.message);
      throw error;
    }

    let data: Record<string, unknown>;
    try {
      data = parseGenerationJson(raw);
    } catch (error) {
      if (error instanceof MalformedGenerationOutputError) {
        this.logger.error(`❌ Malformed resolver output: ${raw.slice(0, 200)}`);
        throw new InternalServerErrorException(error.message);
      }
      throw error;
    }

    return this.validateGenerated(data);
  }

  private validateGenerated(data: Record<string, unknown>): Archetype {
    const { animal, element, genderForm } = data;

    if (!isAnimal(animal)) {
      throw new InternalServerErrorException(`Invalid animal: ${String(animal)}`);
    }
    const normalized = typeof element === 'string' ? normalizeElement(element) : null;
    if (!normalized) {
      throw new InternalServerErrorException(`Invalid element: ${String(element)}`);
    }

    const lenientGender = ARCHETYPE_VALIDATION_POLICY.lenientDefaults.genderForm;
    return {
      animal,
      element: normalized,
      genderForm: isGenderForm(genderForm) ? genderForm : lenientGender,
    };
  }
}
