import { Entity, Column, PrimaryGeneratedColumn, ManyToOne, JoinColumn, Index } from 'typeorm';
import { Run } from './run.entity';

@Entity('run_answers')
@Index('idx_run_answers_run', ['runId'])
export class RunAnswer {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 36, name: 'run_id' })
  runId!: string;

  @ManyToOne(() => Run, (run) => run.answers, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'run_id' })
  run?: Run;

  @Column({ type: 'integer', name: 'question_id' })
  questionId!: number;

  @Column({ type: 'varchar', length: 50 })
  answer!: string;
}
