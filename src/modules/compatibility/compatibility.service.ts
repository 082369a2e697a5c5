import {
  BadRequestException,
  ConflictException,
  HttpException,
  HttpStatus,
  Injectable,
  InternalServerErrorException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { CompatReport, ReportStatus } from '../../database/entities/compat-report.entity';
import { User } from '../../database/entities/user.entity';
import { isUniqueViolation } from '../../common/utils/db-errors.util';
import { TextGenerator } from '../generation/text-generator';
import { GenerationFailedError } from '../generation/generation.errors';
import { Language, toLanguage } from '../archetypes/archetype.constants';
import { UsersService } from '../users/users.service';
import { CreditsService } from '../users/credits.service';
import {
  COMPAT_MAX_OUTPUT_TOKENS,
  COMPAT_PROMPT_VERSION,
  COMPATIBILITY_SYSTEM_PROMPT,
  CompatibilityPerson,
  buildCompatibilityPayload,
  stripPromptEcho,
} from './compatibility.prompts';
import { SerializedReport, otherUserId, serializeReport } from './report.presenter';

/** Identity of a cached report: unordered pair, prompt version and language. */
export interface ReportKey {
  userLowId: number;
  userHighId: number;
  promptVersion: string;
  language: string;
}

export function reportKey(a: number, b: number, language: string, promptVersion = COMPAT_PROMPT_VERSION): ReportKey {
  return { userLowId: Math.min(a, b), userHighId: Math.max(a, b), promptVersion, language };
}

export interface CheckCompatibilityParams {
  targetUserId: number;
  lang?: Language;
  requestId?: string;
}

@Injectable()
export class CompatibilityService {
  private readonly logger = new Logger(CompatibilityService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly textGenerator: TextGenerator,
    private readonly configService: ConfigService,
    private readonly usersService: UsersService,
    private readonly creditsService: CreditsService,
    @InjectRepository(CompatReport)
    private readonly reportRepository: Repository<CompatReport>,
  ) {}

  /**
   * Returns the report for the requester and the target, generating it when
   * no ready report exists for the key. The unique constraints on
   * compat_reports decide concurrent writers; the cache lookup before
   * generation only avoids paying for a generation that would be thrown away.
   */
  async check(requester: User, params: CheckCompatibilityParams): Promise<SerializedReport> {
    const { targetUserId, requestId } = params;

    if (requestId) {
      const replay = await this.findByRequestId(requestId, requester.id);
      if (replay) {
        this.logger.log(`🔁 Replay of check ${requestId} -> report ${replay.id}`);
        return this.present(replay, requester.id);
      }
    }

    const target = await this.usersService.findById(targetUserId);
    if (!target) throw new NotFoundException('Target user not found');
    if (target.id === requester.id) throw new BadRequestException('Cannot compare same user');

    const requesterResult = await this.usersService.getResult(requester.id);
    if (!requesterResult) throw new BadRequestException('Complete test first');
    const targetResult = await this.usersService.getResult(target.id);

    const language = params.lang ?? toLanguage(requester.lang);
    const key = reportKey(requester.id, target.id, language);

    const cached = await this.reportRepository.findOne({ where: { ...key, status: ReportStatus.READY } });
    if (cached) {
      this.logger.log(`📦 Cache hit for pair ${key.userLowId}/${key.userHighId} (${language})`);
      return serializeReport(cached, requester.id, target);
    }

    if (requester.compatCredits < 1) {
      throw new HttpException('NO_COMPAT_CREDITS', HttpStatus.PAYMENT_REQUIRED);
    }

    const text = await this.generateReportText(
      language,
      { name: requester.name, result: requesterResult },
      { name: target.name, result: targetResult },
    );

    try {
      const report = await this.dataSource.transaction(async (manager) => {
        const written = await this.writeReady(manager, key, text, requestId ?? null);
        if (!(await this.creditsService.debit(manager, requester.id))) {
          throw new HttpException('NO_COMPAT_CREDITS', HttpStatus.PAYMENT_REQUIRED);
        }
        return written;
      });
      this.logger.log(`✅ Report ${report.id} ready for pair ${key.userLowId}/${key.userHighId}, 1 credit debited`);
      return serializeReport(report, requester.id, target);
    } catch (error) {
      if (!isUniqueViolation(error)) throw error;

      const winner =
        (await this.reportRepository.findOne({ where: { ...key } })) ??
        (requestId ? await this.findByRequestId(requestId, requester.id) : null);
      if (!winner) throw new ConflictException('Compatibility already exists');

      this.logger.warn(`⚠️ Concurrent check for pair ${key.userLowId}/${key.userHighId}, returning report ${winner.id}`);
      return this.present(winner, requester.id);
    }
  }

  /** Ready reports with text that involve the user, newest first. */
  async list(user: User): Promise<SerializedReport[]> {
    const reports = await this.reportRepository.find({
      where: [
        { userLowId: user.id, status: ReportStatus.READY },
        { userHighId: user.id, status: ReportStatus.READY },
      ],
      order: { createdAt: 'DESC', id: 'DESC' },
    });
    const visible = reports.filter((report) => report.text.trim().length > 0);
    const counterparts = await this.usersService.findManyByIds([
      ...new Set(visible.map((report) => otherUserId(report, user.id))),
    ]);
    return visible.map((report) => serializeReport(report, user.id, counterparts.get(otherUserId(report, user.id))));
  }

  /** Builds the payload, calls the model and strips echoed framing. */
  async generateReportText(language: Language, a: CompatibilityPerson, b: CompatibilityPerson): Promise<string> {
    const payload = buildCompatibilityPayload(language, a, b);
    try {
      const raw = await this.textGenerator.generate({
        system: COMPATIBILITY_SYSTEM_PROMPT,
        input: payload.text,
        maxOutputTokens: COMPAT_MAX_OUTPUT_TOKENS,
        model: this.configService.get<string>('OPENAI_COMPAT_MODEL'),
      });
      return stripPromptEcho(raw, payload.lineA);
    } catch (error) {
      if (error instanceof GenerationFailedError) {
        this.logger.error(`❌ Compatibility generation failed: ${error.message}`);
        throw new InternalServerErrorException(error.message);
      }
      throw error;
    }
  }

  /**
   * Promotes a pending or failed row for the key to ready, or inserts a new
   * ready row. A promoted row keeps its request id, or takes the caller's. The insert fails on the pair constraint when another writer
   * already stored a ready report.
   */
  async writeReady(manager: EntityManager, key: ReportKey, text: string, requestId: string | null): Promise<CompatReport> {
    const promoted = await manager
      .createQueryBuilder()
      .update(CompatReport)
      .set({ status: ReportStatus.READY, text, requestId: () => 'COALESCE(request_id, :requestId)' })
      .where(
        'user_low_id = :userLowId AND user_high_id = :userHighId AND prompt_version = :promptVersion ' +
          'AND language = :language AND status <> :ready',
        { ...key, ready: ReportStatus.READY, requestId },
      )
      .execute();

    if ((promoted.affected ?? 0) > 0) {
      return manager.findOneOrFail(CompatReport, { where: { ...key } });
    }
    return manager.save(
      manager.create(CompatReport, { ...key, status: ReportStatus.READY, text, requestId }),
    );
  }

  async findByRequestId(requestId: string, userId: number): Promise<CompatReport | null> {
    return this.reportRepository.findOne({
      where: [
        { requestId, userLowId: userId },
        { requestId, userHighId: userId },
      ],
    });
  }

  private async present(report: CompatReport, currentUserId: number): Promise<SerializedReport> {
    const counterpart = await this.usersService.findById(otherUserId(report, currentUserId));
    return serializeReport(report, currentUserId, counterpart);
  }
}
