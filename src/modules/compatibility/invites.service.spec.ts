import { BadRequestException, ConflictException, NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { CompatibilityModule } from './compatibility.module';
import { CompatibilityService } from './compatibility.service';
import { InvitesService } from './invites.service';
import { CompatReport, ReportStatus } from '../../database/entities/compat-report.entity';
import { Invite, InviteStatus } from '../../database/entities/invite.entity';
import { GenerationModule } from '../generation/generation.module';
import { TextGenerator } from '../generation/text-generator';
import { FakeTextGenerator } from '../../testing/fake-text-generator';
import { creditsOf, seedUser, testDatabaseImports } from '../../testing/test-database';

describe('InvitesService', () => {
  let moduleRef: TestingModule;
  let dataSource: DataSource;
  let generator: FakeTextGenerator;
  let invites: InvitesService;
  let compatibility: CompatibilityService;

  const findInvite = (token: string) => dataSource.getRepository(Invite).findOneByOrFail({ token });

  beforeEach(async () => {
    generator = new FakeTextGenerator('invite report');
    moduleRef = await Test.createTestingModule({
      imports: [...testDatabaseImports(), GenerationModule, CompatibilityModule],
    })
      .overrideProvider(TextGenerator)
      .useValue(generator)
      .compile();
    dataSource = moduleRef.get(DataSource);
    invites = moduleRef.get(InvitesService);
    compatibility = moduleRef.get(CompatibilityService);
  });

  afterEach(() => moduleRef.close());

  describe('invite', () => {
    it('spends a credit and creates a sent invite', async () => {
      const inviter = await seedUser(dataSource, { credits: 1 });

      const invite = await invites.invite(inviter, { email: 'friend@example.com' });

      expect(invite).toMatchObject({ status: 'sent', prompt_version: 'v3' });
      expect(invite.token).toMatch(/^[0-9a-f]{32}$/);
      expect(await creditsOf(dataSource, inviter.id)).toBe(0);
      expect(await findInvite(invite.token)).toMatchObject({
        inviterId: inviter.id,
        contactEmail: 'friend@example.com',
        creditSpent: true,
        creditRefunded: false,
      });
    });

    it('replays a request id without charging again', async () => {
      const inviter = await seedUser(dataSource, { credits: 2 });

      const first = await invites.invite(inviter, { telegram: 'friend_tg' }, 'inv-1');
      const replay = await invites.invite(inviter, { telegram: 'friend_tg' }, 'inv-1');

      expect(replay.token).toBe(first.token);
      expect(await creditsOf(dataSource, inviter.id)).toBe(1);
    });

    it('rejects contacts that already have an account', async () => {
      const inviter = await seedUser(dataSource, { credits: 1 });
      await seedUser(dataSource, { email: 'taken@example.com' });

      await expect(invites.invite(inviter, { email: 'taken@example.com' })).rejects.toThrow(
        new ConflictException('Target user already exists'),
      );
      expect(await creditsOf(dataSource, inviter.id)).toBe(1);
    });

    it('requires a contact and a credit', async () => {
      const broke = await seedUser(dataSource, { credits: 0 });

      await expect(invites.invite(broke, {})).rejects.toBeInstanceOf(BadRequestException);
      await expect(invites.invite(broke, { email: 'friend@example.com' })).rejects.toThrow('Not enough credits');
    });
  });

  describe('acceptInvite', () => {
    it('completes the invite, refunds a paying inviter and generates the report', async () => {
      const inviter = await seedUser(dataSource, { name: 'Anna', credits: 1, hasFull: true });
      const { token } = await invites.invite(inviter, { email: 'friend@example.com' });
      const invitee = await seedUser(dataSource, { name: 'Boris', email: 'friend@example.com', lang: 'es' });

      const report = await invites.acceptInvite(invitee, token);

      expect(report).toMatchObject({
        status: 'ready',
        text: 'invite report',
        lang: 'es',
        other_user_id: inviter.id,
        counterpart: { name: 'Anna' },
      });
      expect(await findInvite(token)).toMatchObject({
        status: InviteStatus.COMPLETED,
        inviteeId: invitee.id,
        creditRefunded: true,
      });
      expect(await creditsOf(dataSource, inviter.id)).toBe(1);
      expect(generator.requests[0].input).toContain('LINE_A: 🟢 Anna');
    });

    it('keeps the credit of an inviter who never paid', async () => {
      const inviter = await seedUser(dataSource, { credits: 1 });
      const { token } = await invites.invite(inviter, { email: 'friend@example.com' });
      const invitee = await seedUser(dataSource, { email: 'friend@example.com' });

      await invites.acceptInvite(invitee, token);

      expect(await creditsOf(dataSource, inviter.id)).toBe(0);
      expect((await findInvite(token)).creditRefunded).toBe(false);
    });

    it('returns the same report when the invitee accepts again', async () => {
      const inviter = await seedUser(dataSource, { credits: 1, packsBought: 1 });
      const { token } = await invites.invite(inviter, { email: 'friend@example.com' });
      const invitee = await seedUser(dataSource, { email: 'friend@example.com' });

      const first = await invites.acceptInvite(invitee, token);
      const again = await invites.acceptInvite(invitee, token);

      expect(again.id).toBe(first.id);
      expect(generator.requests).toHaveLength(1);
      expect(await creditsOf(dataSource, inviter.id)).toBe(1);
    });

    it('replays the report in the language the invite was accepted in', async () => {
      const inviter = await seedUser(dataSource, { credits: 1 });
      const { token } = await invites.invite(inviter, { email: 'friend@example.com' });
      const invitee = await seedUser(dataSource, { email: 'friend@example.com', lang: 'es', credits: 1 });

      const accepted = await invites.acceptInvite(invitee, token);
      const english = await compatibility.check(invitee, { targetUserId: inviter.id, lang: 'en' });
      const again = await invites.acceptInvite(invitee, token);

      expect(english.id).not.toBe(accepted.id);
      expect(again.id).toBe(accepted.id);
      expect(again.lang).toBe('es');
    });

    it('reuses a ready report that a check already produced', async () => {
      const inviter = await seedUser(dataSource, { credits: 2 });
      const { token } = await invites.invite(inviter, { email: 'friend@example.com' });
      const invitee = await seedUser(dataSource, { email: 'friend@example.com' });
      const checked = await compatibility.check({ ...inviter, compatCredits: 1 }, { targetUserId: invitee.id });

      const accepted = await invites.acceptInvite(invitee, token);

      expect(accepted.id).toBe(checked.id);
      expect(generator.requests).toHaveLength(1);
    });

    it('refuses an invite used by someone else', async () => {
      const inviter = await seedUser(dataSource, { credits: 1 });
      const { token } = await invites.invite(inviter, { email: 'friend@example.com' });
      const first = await seedUser(dataSource);
      const second = await seedUser(dataSource);
      await invites.acceptInvite(first, token);

      await expect(invites.acceptInvite(second, token)).rejects.toThrow(new ConflictException('Invite already used'));
    });

    it('validates the token, the owner and both results', async () => {
      const inviter = await seedUser(dataSource, { credits: 1 });
      const { token } = await invites.invite(inviter, { email: 'friend@example.com' });
      const noResult = await seedUser(dataSource, { result: null });

      await expect(invites.acceptInvite(noResult, 'missing')).rejects.toThrow(new NotFoundException('Invite not found'));
      await expect(invites.acceptInvite(inviter, token)).rejects.toThrow('Cannot accept own invite');
      await expect(invites.acceptInvite(noResult, token)).rejects.toThrow(new BadRequestException('Complete test first'));
    });

    it('requires the inviter to have a result', async () => {
      const inviter = await seedUser(dataSource, { credits: 1, result: null });
      const { token } = await invites.invite(inviter, { email: 'friend@example.com' });
      const invitee = await seedUser(dataSource);

      await expect(invites.acceptInvite(invitee, token)).rejects.toThrow('Inviter must complete test first');
      expect((await findInvite(token)).status).toBe(InviteStatus.SENT);
    });

    it('marks the report failed when generation fails', async () => {
      const inviter = await seedUser(dataSource, { credits: 1 });
      const { token } = await invites.invite(inviter, { email: 'friend@example.com' });
      const invitee = await seedUser(dataSource);
      generator.failWith('upstream down');

      await expect(invites.acceptInvite(invitee, token)).rejects.toThrow('upstream down');

      const reports = await dataSource.getRepository(CompatReport).find();
      expect(reports.map((report) => report.status)).toEqual([ReportStatus.FAILED]);
      expect((await findInvite(token)).status).toBe(InviteStatus.COMPLETED);
    });
  });
});
