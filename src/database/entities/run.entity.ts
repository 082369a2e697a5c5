import { Entity, Column, PrimaryColumn, OneToMany, CreateDateColumn } from 'typeorm';
import { RunAnswer } from './run-answer.entity';

@Entity('runs')
export class Run {
  // UUID chosen by the client or the server
  @PrimaryColumn({ type: 'varchar', length: 36 })
  id!: string;

  @Column({ type: 'varchar', length: 80 })
  name!: string;

  @Column({ type: 'varchar', length: 5 })
  lang!: string;

  @Column({ type: 'varchar', length: 20, default: 'unspecified' })
  gender!: string;

  @OneToMany(() => RunAnswer, (answer) => answer.run)
  answers?: RunAnswer[];

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
