import { BadRequestException, HttpException, NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { CompatibilityModule } from './compatibility.module';
import { CompatibilityService } from './compatibility.service';
import { CompatReport, ReportStatus } from '../../database/entities/compat-report.entity';
import { GenerationModule } from '../generation/generation.module';
import { TextGenerator } from '../generation/text-generator';
import { FakeTextGenerator, deferred, waitUntil } from '../../testing/fake-text-generator';
import { creditsOf, seedUser, testDatabaseImports } from '../../testing/test-database';

describe('CompatibilityService', () => {
  let moduleRef: TestingModule;
  let dataSource: DataSource;
  let generator: FakeTextGenerator;
  let compatibility: CompatibilityService;

  const reportCount = () => dataSource.getRepository(CompatReport).count();

  beforeEach(async () => {
    generator = new FakeTextGenerator('compatibility report');
    moduleRef = await Test.createTestingModule({
      imports: [...testDatabaseImports({ OPENAI_COMPAT_MODEL: 'compat-model' }), GenerationModule, CompatibilityModule],
    })
      .overrideProvider(TextGenerator)
      .useValue(generator)
      .compile();
    dataSource = moduleRef.get(DataSource);
    compatibility = moduleRef.get(CompatibilityService);
  });

  afterEach(() => moduleRef.close());

  describe('check', () => {
    it('generates a ready report and debits one credit', async () => {
      const anna = await seedUser(dataSource, { name: 'Anna', credits: 1 });
      const boris = await seedUser(dataSource, { name: 'Boris' });

      const report = await compatibility.check(anna, { targetUserId: boris.id });

      expect(report).toMatchObject({
        other_user_id: boris.id,
        lang: 'en',
        prompt_version: 'v3',
        status: 'ready',
        text: 'compatibility report',
        counterpart: { id: boris.id, name: 'Boris' },
      });
      expect(report.reportId).toBe(report.id);
      expect(await creditsOf(dataSource, anna.id)).toBe(0);
      expect(generator.requests[0]).toMatchObject({ maxOutputTokens: 1200, model: 'compat-model' });
    });

    it('serves the cached report for either direction without charging again', async () => {
      const anna = await seedUser(dataSource, { credits: 1 });
      const boris = await seedUser(dataSource, { credits: 0 });

      const first = await compatibility.check(anna, { targetUserId: boris.id });
      const again = await compatibility.check({ ...anna, compatCredits: 0 }, { targetUserId: boris.id });
      const reversed = await compatibility.check(boris, { targetUserId: anna.id });

      expect(again.id).toBe(first.id);
      expect(reversed.id).toBe(first.id);
      expect(reversed.other_user_id).toBe(anna.id);
      expect(generator.requests).toHaveLength(1);
      expect(await creditsOf(dataSource, anna.id)).toBe(0);
      expect(await creditsOf(dataSource, boris.id)).toBe(0);
    });

    it('replays a request id before touching credits', async () => {
      const anna = await seedUser(dataSource, { credits: 2 });
      const boris = await seedUser(dataSource);

      const first = await compatibility.check(anna, { targetUserId: boris.id, requestId: 'req-1' });
      const replay = await compatibility.check(anna, { targetUserId: 424242, requestId: 'req-1' });

      expect(replay).toEqual(first);
      expect(await creditsOf(dataSource, anna.id)).toBe(1);
    });

    it('keeps separate reports per language', async () => {
      const anna = await seedUser(dataSource, { credits: 2 });
      const boris = await seedUser(dataSource);

      const english = await compatibility.check(anna, { targetUserId: boris.id });
      const spanish = await compatibility.check(anna, { targetUserId: boris.id, lang: 'es' });

      expect(spanish.id).not.toBe(english.id);
      expect(spanish.lang).toBe('es');
      expect(generator.requests[1].input.startsWith('LANGUAGE: ES')).toBe(true);
    });

    it('refuses without credits and writes nothing', async () => {
      const anna = await seedUser(dataSource, { credits: 0 });
      const boris = await seedUser(dataSource);

      const error = await compatibility.check(anna, { targetUserId: boris.id }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(HttpException);
      expect(error instanceof HttpException && [error.getStatus(), error.message]).toEqual([402, 'NO_COMPAT_CREDITS']);
      expect(await reportCount()).toBe(0);
      expect(generator.requests).toHaveLength(0);
    });

    it('validates the target and the requester result', async () => {
      const anna = await seedUser(dataSource);
      const noResult = await seedUser(dataSource, { result: null });

      await expect(compatibility.check(anna, { targetUserId: 9999 })).rejects.toThrow(
        new NotFoundException('Target user not found'),
      );
      await expect(compatibility.check(anna, { targetUserId: anna.id })).rejects.toThrow(
        new BadRequestException('Cannot compare same user'),
      );
      await expect(compatibility.check(noResult, { targetUserId: anna.id })).rejects.toThrow(
        new BadRequestException('Complete test first'),
      );
    });

    it('compares against a target without a result using placeholders', async () => {
      const anna = await seedUser(dataSource, { name: 'Anna' });
      const guest = await seedUser(dataSource, { name: 'Guest', result: null });

      await compatibility.check(anna, { targetUserId: guest.id });

      expect(generator.requests[0].input).toContain('LINE_B: 🔴 Guest — UNKNOWN unknown');
    });

    it('writes no row and no debit when generation fails', async () => {
      const anna = await seedUser(dataSource, { credits: 1 });
      const boris = await seedUser(dataSource);
      generator.failWith('upstream timeout');

      await expect(compatibility.check(anna, { targetUserId: boris.id })).rejects.toThrow('upstream timeout');

      expect(await reportCount()).toBe(0);
      expect(await creditsOf(dataSource, anna.id)).toBe(1);
    });

    it('promotes a failed report for the key instead of inserting a second one', async () => {
      const anna = await seedUser(dataSource, { credits: 1 });
      const boris = await seedUser(dataSource);
      const failed = await dataSource.getRepository(CompatReport).save({
        userLowId: anna.id,
        userHighId: boris.id,
        language: 'en',
        promptVersion: 'v3',
        status: ReportStatus.FAILED,
        text: '',
      });

      const report = await compatibility.check(anna, { targetUserId: boris.id });

      expect(report.id).toBe(failed.id);
      expect(report.status).toBe('ready');
      expect(await reportCount()).toBe(1);
      expect(await creditsOf(dataSource, anna.id)).toBe(0);
    });

    it('stores the request id on a promoted report so a retry replays it', async () => {
      const anna = await seedUser(dataSource, { credits: 2 });
      const boris = await seedUser(dataSource);
      const pending = await dataSource.getRepository(CompatReport).save({
        userLowId: anna.id,
        userHighId: boris.id,
        language: 'en',
        promptVersion: 'v3',
        status: ReportStatus.PENDING,
        text: '',
      });

      const report = await compatibility.check(anna, { targetUserId: boris.id, requestId: 'req-promote' });
      const replay = await compatibility.check(anna, { targetUserId: 424242, requestId: 'req-promote' });

      expect(report.id).toBe(pending.id);
      expect(replay.id).toBe(pending.id);
      expect((await dataSource.getRepository(CompatReport).findOneByOrFail({ id: pending.id })).requestId).toBe(
        'req-promote',
      );
      expect(await creditsOf(dataSource, anna.id)).toBe(1);
    });

    it('lets the unique constraint settle two checks that both missed the cache', async () => {
      const anna = await seedUser(dataSource, { credits: 1 });
      const boris = await seedUser(dataSource);
      const first = deferred<string>();
      const second = deferred<string>();
      generator.reply(() => first.promise, () => second.promise);

      const winnerCall = compatibility.check(anna, { targetUserId: boris.id });
      const loserCall = compatibility.check(anna, { targetUserId: boris.id });
      await waitUntil(() => generator.requests.length === 2);

      first.resolve('winning text');
      const winner = await winnerCall;
      second.resolve('losing text');
      const loser = await loserCall;

      expect(loser.id).toBe(winner.id);
      expect(loser.text).toBe('winning text');
      expect(await reportCount()).toBe(1);
      expect(await creditsOf(dataSource, anna.id)).toBe(0);
    });

    it('rolls back the losing debit when two requesters race on the same pair', async () => {
      const anna = await seedUser(dataSource, { credits: 1 });
      const boris = await seedUser(dataSource, { credits: 1 });
      const first = deferred<string>();
      const second = deferred<string>();
      generator.reply(() => first.promise, () => second.promise);

      const annaCall = compatibility.check(anna, { targetUserId: boris.id });
      const borisCall = compatibility.check(boris, { targetUserId: anna.id });
      await waitUntil(() => generator.requests.length === 2);

      first.resolve('anna text');
      const annaReport = await annaCall;
      second.resolve('boris text');
      const borisReport = await borisCall;

      expect(borisReport.id).toBe(annaReport.id);
      expect(await reportCount()).toBe(1);
      expect(await creditsOf(dataSource, anna.id)).toBe(0);
      expect(await creditsOf(dataSource, boris.id)).toBe(1);
    });
  });

  describe('list', () => {
    it('returns ready reports with text, newest first, with counterparts', async () => {
      const anna = await seedUser(dataSource, { credits: 5 });
      const boris = await seedUser(dataSource, { name: 'Boris' });
      const clara = await seedUser(dataSource, { name: 'Clara' });
      const dima = await seedUser(dataSource, { name: 'Dima' });
      await compatibility.check(anna, { targetUserId: boris.id });
      await compatibility.check(anna, { targetUserId: clara.id });
      await dataSource.getRepository(CompatReport).save({
        userLowId: anna.id,
        userHighId: dima.id,
        language: 'en',
        promptVersion: 'v3',
        status: ReportStatus.PENDING,
        text: '',
      });

      const items = await compatibility.list(anna);

      expect(items.map((item) => item.counterpart.name)).toEqual(['Clara', 'Boris']);
      expect(await compatibility.list(dima)).toEqual([]);
    });
  });
});
