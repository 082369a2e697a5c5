import { Injectable } from '@nestjs/common';
import { EntityManager } from 'typeorm';
import { User } from '../../database/entities/user.entity';

/**
 * Balance mutations. Always called with the EntityManager of the caller's
 * transaction so the balance change commits or rolls back with it.
 */
@Injectable()
export class CreditsService {
  /**
   * Conditional decrement: the row is only touched while the balance covers
   * the amount, so concurrent debits can never push it below zero.
   */
  async debit(manager: EntityManager, userId: number, amount = 1): Promise<boolean> {
    const result = await manager
      .createQueryBuilder()
      .update(User)
      .set({ compatCredits: () => `compat_credits - ${Number(amount)}` })
      .where('id = :userId AND compat_credits >= :amount', { userId, amount })
      .execute();
    return (result.affected ?? 0) > 0;
  }

  async credit(manager: EntityManager, userId: number, amount: number): Promise<void> {
    if (amount <= 0) return;
    await manager.increment(User, { id: userId }, 'compatCredits', amount);
  }
}
