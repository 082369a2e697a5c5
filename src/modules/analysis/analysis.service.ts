import {
  BadRequestException,
  ForbiddenException,
  HttpStatus,
  Injectable,
  InternalServerErrorException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { v4 as uuidv4, validate as isUuid } from 'uuid';
import { User } from '../../database/entities/user.entity';
import { ShortResult } from '../../database/entities/short-result.entity';
import { ArchetypeResolverService, LockedArchetype, QuizAnswer, buildAnswersText } from '../archetypes/archetype-resolver.service';
import { Archetype, Language, isAnimal, isGenderForm, normalizeElement, toLanguage } from '../archetypes/archetype.constants';
import { ProfileGeneratorService } from '../profiles/profile-generator.service';
import { UsersService } from '../users/users.service';
import { isFullUnlocked } from '../users/user.presenter';
import { RunsService } from './runs.service';

export interface AnalyzeShortInput {
  name: string;
  lang: Language;
  gender: string;
  answers: QuizAnswer[];
  locked?: LockedArchetype;
  runId?: string;
}

export interface AnalysisResult {
  type: 'short' | 'full';
  result_id: string;
  result: Archetype & { text: string };
}

@Injectable()
export class AnalysisService {
  private readonly logger = new Logger(AnalysisService.name);

  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly resolver: ArchetypeResolverService,
    private readonly profiles: ProfileGeneratorService,
    private readonly runs: RunsService,
    private readonly usersService: UsersService,
  ) {}

  /**
   * Resolves the archetype and writes the short profile. When the caller is
   * signed in, the result also becomes that user's stored archetype.
   */
  async analyzeShort(input: AnalyzeShortInput, authToken: string | null): Promise<AnalysisResult> {
    if (input.runId !== undefined && !isUuid(input.runId)) {
      throw new BadRequestException('Invalid runId format');
    }
    const runId = input.runId ?? uuidv4();
    this.logger.log(`📥 Short analysis run=${runId} lang=${input.lang} answers=${input.answers.length}`);

    const archetype = await this.resolver.resolve(input);
    const text = await this.profiles.generateShort({
      name: input.name,
      lang: input.lang,
      gender: input.gender,
      archetype,
      answersText: buildAnswersText(input.answers),
    });

    const user = authToken ? await this.usersService.findByToken(authToken) : null;

    await this.dataSource.transaction(async (manager) => {
      await this.runs.ensureRunAndAnswers(
        runId,
        { name: input.name, lang: input.lang, gender: input.gender },
        input.answers,
        manager,
      );
      await this.runs.upsertShortResult(runId, archetype, text, manager);
      if (user) {
        await this.usersService.upsertResult(user.id, { archetype, shortText: text }, manager);
      }
    });

    this.logger.log(`✅ Short result stored run=${runId} ${archetype.animal}/${archetype.element}`);
    return { type: 'short', result_id: runId, result: { ...archetype, text } };
  }

  async getShort(runId: string): Promise<AnalysisResult> {
    const short = isUuid(runId) ? await this.runs.getShortResult(runId) : null;
    if (!short) throw new NotFoundException('Short result not found');

    return { type: 'short', result_id: short.runId, result: { ...this.toArchetype(short), text: short.text } };
  }

  /**
   * Full profile for an unlocked user. An already generated text is reused;
   * either way the user's stored result is refreshed with both texts.
   */
  async analyzeFull(user: User, resultId: string): Promise<AnalysisResult> {
    if (!isUuid(resultId)) throw new BadRequestException('Invalid result_id format');
    this.assertUnlocked(user, resultId);

    const run = await this.runs.getRun(resultId);
    if (!run) throw new NotFoundException('Run not found');
    const short = await this.runs.getShortResult(resultId);
    if (!short) throw new InternalServerErrorException('short_result missing for existing run');

    const archetype = this.toArchetype(short);
    const existing = await this.runs.getFullResult(resultId);
    let text: string;

    if (existing) {
      text = existing.text;
      this.logger.log(`♻️ Reusing full result run=${resultId}`);
    } else {
      const answers = await this.runs.getAnswers(resultId);
      text = await this.profiles.generateFull({
        name: run.name,
        lang: toLanguage(run.lang),
        gender: short.genderForm,
        archetype,
        answersText: buildAnswersText(answers),
      });
    }

    await this.dataSource.transaction(async (manager) => {
      if (!existing) await this.runs.upsertFullResult(resultId, text, manager);
      await this.usersService.upsertResult(user.id, { archetype, shortText: short.text, fullText: text }, manager);
    });

    return { type: 'full', result_id: resultId, result: { ...archetype, text } };
  }

  async getFull(user: User, runId: string): Promise<AnalysisResult> {
    if (!isUuid(runId)) throw new NotFoundException('Full result not found');
    this.assertUnlocked(user, runId);

    const [full, short] = await Promise.all([this.runs.getFullResult(runId), this.runs.getShortResult(runId)]);
    if (!full || !short) throw new NotFoundException('Full result not found');

    return { type: 'full', result_id: runId, result: { ...this.toArchetype(short), text: full.text } };
  }

  private assertUnlocked(user: User, resultId: string): void {
    this.logger.log(`🔐 Full requested run=${resultId} user=${user.id} unlocked=${isFullUnlocked(user)}`);
    if (!isFullUnlocked(user)) {
      throw new ForbiddenException({ statusCode: HttpStatus.FORBIDDEN, message: 'FULL_LOCKED', result_id: resultId });
    }
  }

  private toArchetype(short: ShortResult): Archetype {
    const element = normalizeElement(short.element);
    if (!isAnimal(short.animal) || !element || !isGenderForm(short.genderForm)) {
      throw new InternalServerErrorException(`Stored result for run ${short.runId} is invalid`);
    }
    return { animal: short.animal, element, genderForm: short.genderForm };
  }
}
