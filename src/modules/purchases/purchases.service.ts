import { ConflictException, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { User } from '../../database/entities/user.entity';
import { PackPurchase } from '../../database/entities/pack-purchase.entity';
import { CreditsService } from '../users/credits.service';
import { isUniqueViolation } from '../../common/utils/db-errors.util';

export const FULL_UNLOCK_BONUS_CREDITS = 3;
export const PACK_SIZES = [3, 10] as const;
export type PackSize = (typeof PACK_SIZES)[number];

@Injectable()
export class PurchasesService {
  private readonly logger = new Logger(PurchasesService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly creditsService: CreditsService,
    @InjectRepository(PackPurchase)
    private readonly purchaseRepository: Repository<PackPurchase>,
  ) {}

  /** Unlocks the full profile. The bonus credits are granted on the first unlock only. */
  async purchaseFull(userId: number): Promise<User> {
    return this.dataSource.transaction(async (manager) => {
      const awarded = await manager
        .createQueryBuilder()
        .update(User)
        .set({
          hasFull: true,
          fullBonusAwarded: true,
          compatCredits: () => `compat_credits + ${FULL_UNLOCK_BONUS_CREDITS}`,
        })
        .where('id = :userId AND full_bonus_awarded = :awarded', { userId, awarded: false })
        .execute();

      if ((awarded.affected ?? 0) > 0) {
        this.logger.log(`💎 Full unlocked for user ${userId}, +${FULL_UNLOCK_BONUS_CREDITS} credits`);
      } else {
        await manager.update(User, { id: userId }, { hasFull: true });
      }
      return manager.findOneByOrFail(User, { id: userId });
    });
  }

  /**
   * Adds a credit pack. A repeated requestId from the same user returns the
   * current balance without crediting again.
   */
  async purchasePack(userId: number, packSize: PackSize, requestId?: string): Promise<User> {
    try {
      return await this.dataSource.transaction(async (manager) => {
        if (requestId) {
          const existing = await manager.findOne(PackPurchase, { where: { requestId } });
          if (existing) return this.replay(existing, userId, manager);
          await manager.insert(PackPurchase, { userId, packSize, requestId });
        }

        await manager.increment(User, { id: userId }, 'packsBought', 1);
        await this.creditsService.credit(manager, userId, packSize);
        this.logger.log(`🛒 Pack of ${packSize} credits for user ${userId}`);
        return manager.findOneByOrFail(User, { id: userId });
      });
    } catch (error) {
      if (!requestId || !isUniqueViolation(error)) throw error;

      const winner = await this.purchaseRepository.findOne({ where: { requestId } });
      if (!winner) throw error;
      this.logger.warn(`⚠️ Concurrent pack purchase ${requestId}, returning the stored one`);
      return this.replay(winner, userId, this.dataSource.manager);
    }
  }

  private async replay(purchase: PackPurchase, userId: number, manager: EntityManager): Promise<User> {
    if (purchase.userId !== userId) {
      throw new ConflictException('Request ID already used');
    }
    return manager.findOneByOrFail(User, { id: userId });
  }
}
