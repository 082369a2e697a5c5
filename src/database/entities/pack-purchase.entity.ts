import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn } from 'typeorm';

// Idempotency record for a credit pack purchase
@Entity('pack_purchases')
export class PackPurchase {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer', name: 'user_id' })
  userId!: number;

  @Column({ type: 'integer', name: 'pack_size' })
  packSize!: number;

  @Column({ type: 'varchar', length: 64, name: 'request_id', unique: true })
  requestId!: string;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
