import {
  BadRequestException,
  ConflictException,
  HttpException,
  HttpStatus,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, FindOptionsWhere, Repository } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { Invite, InviteStatus } from '../../database/entities/invite.entity';
import { CompatReport, ReportStatus } from '../../database/entities/compat-report.entity';
import { User } from '../../database/entities/user.entity';
import { isUniqueViolation } from '../../common/utils/db-errors.util';
import { toLanguage } from '../archetypes/archetype.constants';
import { UsersService } from '../users/users.service';
import { CreditsService } from '../users/credits.service';
import { CompatibilityService, ReportKey, reportKey } from './compatibility.service';
import { COMPAT_PROMPT_VERSION } from './compatibility.prompts';
import { SerializedReport, serializeInvite, serializeReport } from './report.presenter';

export interface InviteContact {
  email?: string;
  telegram?: string;
}

export type SerializedInvite = ReturnType<typeof serializeInvite>;

/**
 * Invites let a user pay for a comparison with someone who has no account
 * yet. The credit spent on the invite is returned to paying inviters once
 * the invite is accepted.
 */
@Injectable()
export class InvitesService {
  private readonly logger = new Logger(InvitesService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly usersService: UsersService,
    private readonly creditsService: CreditsService,
    private readonly compatibilityService: CompatibilityService,
    @InjectRepository(Invite)
    private readonly inviteRepository: Repository<Invite>,
    @InjectRepository(CompatReport)
    private readonly reportRepository: Repository<CompatReport>,
  ) {}

  async invite(inviter: User, contact: InviteContact, requestId?: string): Promise<SerializedInvite> {
    if (!contact.email && !contact.telegram) {
      throw new BadRequestException('Email or telegram required');
    }

    if (requestId) {
      const replay = await this.inviteRepository.findOne({ where: { requestId, inviterId: inviter.id } });
      if (replay) return serializeInvite(replay);
    }

    const where: FindOptionsWhere<User>[] = [];
    if (contact.email) where.push({ email: contact.email });
    if (contact.telegram) where.push({ telegram: contact.telegram });
    if (await this.dataSource.getRepository(User).findOne({ where })) {
      throw new ConflictException('Target user already exists');
    }

    if (inviter.compatCredits < 1) {
      throw new HttpException('Not enough credits', HttpStatus.PAYMENT_REQUIRED);
    }

    try {
      const invite = await this.dataSource.transaction(async (manager) => {
        if (!(await this.creditsService.debit(manager, inviter.id))) {
          throw new HttpException('Not enough credits', HttpStatus.PAYMENT_REQUIRED);
        }
        return manager.save(
          manager.create(Invite, {
            token: uuidv4().replace(/-/g, ''),
            inviterId: inviter.id,
            inviteeId: null,
            contactEmail: contact.email ?? null,
            contactTelegram: contact.telegram ?? null,
            promptVersion: COMPAT_PROMPT_VERSION,
            creditSpent: true,
            creditRefunded: false,
            status: InviteStatus.SENT,
            requestId: requestId ?? null,
          }),
        );
      });
      this.logger.log(`✉️ Invite ${invite.id} sent by user ${inviter.id}`);
      return serializeInvite(invite);
    } catch (error) {
      if (!isUniqueViolation(error)) throw error;

      const winner = requestId
        ? await this.inviteRepository.findOne({ where: { requestId, inviterId: inviter.id } })
        : null;
      if (!winner) throw new ConflictException('Invite already exists');
      return serializeInvite(winner);
    }
  }

  async acceptInvite(invitee: User, token: string): Promise<SerializedReport> {
    const invite = await this.inviteRepository.findOne({ where: { token } });
    if (!invite) throw new NotFoundException('Invite not found');
    if (invite.inviterId === invitee.id) throw new BadRequestException('Cannot accept own invite');

    if (invite.status === InviteStatus.COMPLETED) {
      if (invite.inviteeId !== invitee.id) throw new ConflictException('Invite already used');
      return this.replayAccepted(invite, invitee);
    }
    if (invite.inviteeId && invite.inviteeId !== invitee.id) {
      throw new ConflictException('Invite already used');
    }

    const inviter = await this.usersService.findById(invite.inviterId);
    if (!inviter) throw new NotFoundException('Inviter not found');

    const inviteeResult = await this.usersService.getResult(invitee.id);
    if (!inviteeResult) throw new BadRequestException('Complete test first');
    const inviterResult = await this.usersService.getResult(inviter.id);
    if (!inviterResult) throw new BadRequestException('Inviter must complete test first');

    const language = toLanguage(invitee.lang);
    const key = reportKey(inviter.id, invitee.id, language, invite.promptVersion);

    const report = await this.dataSource.transaction(async (manager) => {
      await this.complete(manager, invite, invitee.id);
      if (inviter.hasFull || inviter.packsBought > 0) {
        await this.refundInviter(manager, invite);
      }
      return this.ensureReport(manager, key);
    });

    if (report.status === ReportStatus.READY) {
      return serializeReport(report, invitee.id, inviter);
    }

    let text: string;
    try {
      text = await this.compatibilityService.generateReportText(
        language,
        { name: inviter.name, result: inviterResult },
        { name: invitee.name, result: inviteeResult },
      );
    } catch (error) {
      await this.reportRepository
        .createQueryBuilder()
        .update(CompatReport)
        .set({ status: ReportStatus.FAILED, text: '' })
        .where('id = :id AND status <> :ready', { id: report.id, ready: ReportStatus.READY })
        .execute();
      this.logger.error(`❌ Report ${report.id} failed for invite ${invite.id}`);
      throw error;
    }

    try {
      const ready = await this.dataSource.transaction((manager) =>
        this.compatibilityService.writeReady(manager, key, text, null),
      );
      this.logger.log(`✅ Report ${ready.id} ready for invite ${invite.id}`);
      return serializeReport(ready, invitee.id, inviter);
    } catch (error) {
      if (!isUniqueViolation(error)) throw error;
      const winner = await this.reportRepository.findOneOrFail({ where: { ...key } });
      return serializeReport(winner, invitee.id, inviter);
    }
  }

  private async replayAccepted(invite: Invite, invitee: User): Promise<SerializedReport> {
    const key = reportKey(invite.inviterId, invitee.id, toLanguage(invitee.lang), invite.promptVersion);
    const report = await this.reportRepository.findOne({ where: { ...key } });
    if (!report) throw new NotFoundException('Report missing');

    const inviter = await this.usersService.findById(invite.inviterId);
    return serializeReport(report, invitee.id, inviter);
  }

  /** Links the invitee; a concurrent accept by someone else loses here. */
  private async complete(manager: EntityManager, invite: Invite, inviteeId: number): Promise<void> {
    const result = await manager
      .createQueryBuilder()
      .update(Invite)
      .set({ inviteeId, status: InviteStatus.COMPLETED })
      .where('id = :id AND status = :sent', { id: invite.id, sent: InviteStatus.SENT })
      .execute();
    if ((result.affected ?? 0) === 0) {
      throw new ConflictException('Invite already used');
    }
  }

  private async refundInviter(manager: EntityManager, invite: Invite): Promise<void> {
    const flagged = await manager
      .createQueryBuilder()
      .update(Invite)
      .set({ creditRefunded: true })
      .where('id = :id AND credit_spent = :spent AND credit_refunded = :refunded', {
        id: invite.id,
        spent: true,
        refunded: false,
      })
      .execute();

    if ((flagged.affected ?? 0) > 0) {
      await this.creditsService.credit(manager, invite.inviterId, 1);
      this.logger.log(`↩️ Refunded invite credit to user ${invite.inviterId}`);
    }
  }

  /** The report row for the key, inserted as pending when none exists. */
  private async ensureReport(manager: EntityManager, key: ReportKey): Promise<CompatReport> {
    await manager
      .createQueryBuilder()
      .insert()
      .into(CompatReport)
      .values({ ...key, status: ReportStatus.PENDING, text: '' })
      .orIgnore()
      .execute();
    return manager.findOneOrFail(CompatReport, { where: { ...key } });
  }
}
