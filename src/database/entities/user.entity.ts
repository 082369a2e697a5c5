import { Entity, Column, PrimaryGeneratedColumn, OneToOne, CreateDateColumn, Index } from 'typeorm';
import { UserResult } from './user-result.entity';

@Entity('users')
export class User {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 255, unique: true, nullable: true })
  email!: string | null;

  @Column({ type: 'varchar', length: 255, unique: true, nullable: true })
  telegram!: string | null;

  @Column({ type: 'varchar', length: 255, unique: true, nullable: true, name: 'google_sub' })
  googleSub!: string | null;

  @Column({ type: 'varchar', length: 120 })
  name!: string;

  @Column({ type: 'varchar', length: 5 })
  lang!: string;

  // Bearer credential. Never selected by default so it cannot leak through relations.
  @Column({ type: 'varchar', length: 64, name: 'auth_token', nullable: true, select: false })
  @Index('idx_users_auth_token', { unique: true })
  authToken!: string | null;

  @Column({ type: 'boolean', name: 'has_full', default: false })
  hasFull!: boolean;

  @Column({ type: 'boolean', name: 'full_bonus_awarded', default: false })
  fullBonusAwarded!: boolean;

  @Column({ type: 'integer', name: 'packs_bought', default: 0 })
  packsBought!: number;

  @Column({ type: 'integer', name: 'compat_credits', default: 1 })
  compatCredits!: number;

  @OneToOne(() => UserResult, (result) => result.user)
  result?: UserResult;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
