import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, EntityManager } from 'typeorm';
import { Run } from '../../database/entities/run.entity';
import { RunAnswer } from '../../database/entities/run-answer.entity';
import { ShortResult } from '../../database/entities/short-result.entity';
import { FullResult } from '../../database/entities/full-result.entity';
import { Archetype } from '../archetypes/archetype.constants';
import { QuizAnswer } from '../archetypes/archetype-resolver.service';

export interface RunInfo {
  name: string;
  lang: string;
  gender: string;
}

/**
 * Persistence of quiz runs and the short/full results produced for them.
 * Every method takes an optional manager so callers can group writes in one
 * transaction.
 */
@Injectable()
export class RunsService {
  private readonly logger = new Logger(RunsService.name);

  constructor(@InjectDataSource() private readonly dataSource: DataSource) {}

  /** Creates the run when absent and replaces its answers. */
  async ensureRunAndAnswers(runId: string, info: RunInfo, answers: QuizAnswer[], manager?: EntityManager): Promise<void> {
    const em = manager ?? this.dataSource.manager;

    const existing = await em.findOne(Run, { where: { id: runId } });
    if (existing) {
      this.logger.debug(`🔁 Reusing run ${runId}`);
    } else {
      await em
        .createQueryBuilder()
        .insert()
        .into(Run)
        .values({ id: runId, name: info.name, lang: info.lang, gender: info.gender })
        .orIgnore()
        .execute();
      this.logger.debug(`🆕 Created run ${runId}`);
    }

    await em.delete(RunAnswer, { runId });
    if (answers.length > 0) {
      await em.insert(
        RunAnswer,
        answers.map((a) => ({ runId, questionId: a.questionId, answer: a.answer })),
      );
    }
    this.logger.log(`💾 Saved ${answers.length} answers for run ${runId}`);
  }

  async upsertShortResult(runId: string, archetype: Archetype, text: string, manager?: EntityManager): Promise<void> {
    const em = manager ?? this.dataSource.manager;
    await em.upsert(
      ShortResult,
      { runId, animal: archetype.animal, element: archetype.element, genderForm: archetype.genderForm, text },
      ['runId'],
    );
  }

  async upsertFullResult(runId: string, text: string, manager?: EntityManager): Promise<void> {
    const em = manager ?? this.dataSource.manager;
    await em.upsert(FullResult, { runId, text }, ['runId']);
  }

  async getRun(runId: string, manager?: EntityManager): Promise<Run | null> {
    return (manager ?? this.dataSource.manager).findOne(Run, { where: { id: runId } });
  }

  async getShortResult(runId: string, manager?: EntityManager): Promise<ShortResult | null> {
    return (manager ?? this.dataSource.manager).findOne(ShortResult, { where: { runId } });
  }

  async getFullResult(runId: string, manager?: EntityManager): Promise<FullResult | null> {
    return (manager ?? this.dataSource.manager).findOne(FullResult, { where: { runId } });
  }

  async getAnswers(runId: string, manager?: EntityManager): Promise<QuizAnswer[]> {
    const rows = await (manager ?? this.dataSource.manager).find(RunAnswer, {
      where: { runId },
      order: { questionId: 'ASC' },
    });
    return rows.map((row) => ({ questionId: row.questionId, answer: row.answer }));
  }
}
