import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn, Index, Unique } from 'typeorm';

export enum ReportStatus {
  PENDING = 'pending',
  READY = 'ready',
  FAILED = 'failed',
}

/**
 * Compatibility report for an unordered pair of users.
 *
 * The two unique constraints are the real serialization point for concurrent
 * checks: a losing writer gets a unique violation and re-reads the winner.
 */
@Entity('compat_reports')
@Unique('uq_compat_reports_pair', ['userLowId', 'userHighId', 'promptVersion', 'language'])
@Unique('uq_compat_reports_request', ['requestId'])
@Index('idx_compat_reports_high', ['userHighId'])
export class CompatReport {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer', name: 'user_low_id' })
  userLowId!: number;

  @Column({ type: 'integer', name: 'user_high_id' })
  userHighId!: number;

  @Column({ type: 'varchar', length: 5, default: 'ru' })
  language!: string;

  @Column({ type: 'varchar', length: 120, name: 'prompt_version' })
  promptVersion!: string;

  @Column({ type: 'varchar', length: 20, default: ReportStatus.PENDING })
  status!: ReportStatus;

  @Column({ type: 'text', default: '' })
  text!: string;

  @Column({ type: 'varchar', length: 64, name: 'request_id', nullable: true })
  requestId!: string | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
