import { Entity, Column, PrimaryColumn, OneToOne, JoinColumn, UpdateDateColumn } from 'typeorm';
import { User } from './user.entity';

/**
 * Latest resolved archetype of a user. Overwritten every time a short or
 * full analysis completes for that user.
 */
@Entity('user_results')
export class UserResult {
  @PrimaryColumn({ type: 'integer', name: 'user_id' })
  userId!: number;

  @OneToOne(() => User, (user) => user.result, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'user_id' })
  user?: User;

  @Column({ type: 'varchar', length: 30, name: 'animal_code' })
  animalCode!: string;

  @Column({ type: 'varchar', length: 20, name: 'element_code' })
  elementCode!: string;

  @Column({ type: 'varchar', length: 20, name: 'gender_form' })
  genderForm!: string;

  @Column({ type: 'text', name: 'short_text' })
  shortText!: string;

  @Column({ type: 'text', name: 'full_text', nullable: true })
  fullText!: string | null;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
