import { Entity, Column, PrimaryColumn, OneToOne, JoinColumn } from 'typeorm';
import { Run } from './run.entity';

@Entity('short_results')
export class ShortResult {
  @PrimaryColumn({ type: 'varchar', length: 36, name: 'run_id' })
  runId!: string;

  @OneToOne(() => Run, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'run_id' })
  run?: Run;

  @Column({ type: 'varchar', length: 30 })
  animal!: string;

  @Column({ type: 'varchar', length: 20 })
  element!: string;

  @Column({ type: 'varchar', length: 20, name: 'gender_form' })
  genderForm!: string;

  @Column({ type: 'text' })
  text!: string;
}
