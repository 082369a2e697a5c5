import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn, Index, Unique } from 'typeorm';

export enum InviteStatus {
  SENT = 'sent',
  COMPLETED = 'completed',
}

@Entity('invites')
@Unique('uq_invites_request', ['requestId'])
@Index('idx_invites_inviter', ['inviterId'])
export class Invite {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 64, unique: true })
  token!: string;

  @Column({ type: 'integer', name: 'inviter_id' })
  inviterId!: number;

  @Column({ type: 'integer', name: 'invitee_id', nullable: true })
  inviteeId!: number | null;

  @Column({ type: 'varchar', length: 255, name: 'contact_email', nullable: true })
  contactEmail!: string | null;

  @Column({ type: 'varchar', length: 255, name: 'contact_telegram', nullable: true })
  contactTelegram!: string | null;

  @Column({ type: 'varchar', length: 120, name: 'prompt_version' })
  promptVersion!: string;

  @Column({ type: 'boolean', name: 'credit_spent', default: false })
  creditSpent!: boolean;

  @Column({ type: 'boolean', name: 'credit_refunded', default: false })
  creditRefunded!: boolean;

  @Column({ type: 'varchar', length: 20, default: InviteStatus.SENT })
  status!: InviteStatus;

  @Column({ type: 'varchar', length: 64, name: 'request_id', nullable: true })
  requestId!: string | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
