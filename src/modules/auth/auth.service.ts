import { BadRequestException, ConflictException, Injectable, Logger } from '@nestjs/common';
import { DataSource, EntityManager, FindOptionsWhere, In } from 'typeorm';
import { User } from '../../database/entities/user.entity';
import { generateAuthToken } from '../../common/utils/auth-token.util';
import { clampCredits } from '../../common/utils/credits.util';
import { isUniqueViolation } from '../../common/utils/db-errors.util';
import { UsersService, UserResultSnapshot } from '../users/users.service';
import { Archetype, DEFAULT_LANGUAGE, Language, isAnimal, isGenderForm, normalizeElement } from '../archetypes/archetype.constants';
import { GoogleService } from './google.service';
import { TelegramService } from './telegram.service';
import { DevSeedUserDto, GoogleAuthDto, RegisterDto, ShortResultDto, TelegramAuthDto } from './auth.dto';

export const INITIAL_COMPAT_CREDITS = 1;

export interface AuthSession {
  user: User;
  token: string;
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly usersService: UsersService,
    private readonly googleService: GoogleService,
    private readonly telegramService: TelegramService,
  ) {}

  async register(dto: RegisterDto): Promise<AuthSession> {
    if (!dto.email && !dto.telegram) {
      throw new BadRequestException('Email or telegram required');
    }
    const snapshot = dto.shortResult ? this.toSnapshot(dto.shortResult) : null;

    const session = await this.withUniqueRetry(`register ${dto.email ?? dto.telegram}`, (manager) =>
      this.registerInTransaction(manager, dto, snapshot),
    );
    this.logger.log(`✅ Registered user ${session.user.id}`);
    return session;
  }

  async loginWithGoogle(dto: GoogleAuthDto): Promise<AuthSession> {
    const identity = await this.googleService.verifyIdToken(dto.idToken);

    const session = await this.withUniqueRetry(`google ${identity.sub}`, async (manager) => {
      const users = manager.getRepository(User);
      let user = await users.findOne({ where: { googleSub: identity.sub } });
      if (!user && identity.email) {
        user = await users.findOne({ where: { email: identity.email } });
      }

      if (user) {
        if (!user.googleSub) user.googleSub = identity.sub;
        if (identity.email && !user.email) user.email = identity.email;
        if (dto.name) user.name = dto.name;
        else if (identity.name && !user.name) user.name = identity.name;
        if (dto.lang) user.lang = dto.lang;
        user = await users.save(user);
      } else {
        const fallbackName = identity.email ? identity.email.split('@')[0] : 'User';
        user = await this.createUser(manager, {
          email: identity.email,
          googleSub: identity.sub,
          name: dto.name || identity.name || fallbackName,
          lang: dto.lang ?? DEFAULT_LANGUAGE,
        });
      }

      return { user, token: await this.usersService.ensureAuthToken(user.id, manager) };
    });

    this.logger.log(`🔐 Google login for user ${session.user.id} (email: ${Boolean(session.user.email)})`);
    return session;
  }

  async loginWithTelegram(payload: TelegramAuthDto): Promise<AuthSession> {
    this.telegramService.verify(payload);

    const telegramId = String(payload.id);
    const handle = payload.username || telegramId;
    const displayName =
      [payload.first_name, payload.last_name].filter(Boolean).join(' ') || payload.username || 'User';

    const session = await this.withUniqueRetry(`telegram ${telegramId}`, async (manager) => {
      const users = manager.getRepository(User);
      let user = await users.findOne({ where: { telegram: In([handle, telegramId]) } });

      if (user) {
        if (user.telegram !== handle) user.telegram = handle;
        if (!user.name || user.name === 'User') user.name = displayName;
        user = await users.save(user);
      } else {
        user = await this.createUser(manager, { telegram: handle, name: displayName, lang: DEFAULT_LANGUAGE });
      }

      return { user, token: await this.usersService.ensureAuthToken(user.id, manager) };
    });

    this.logger.log(`🔐 Telegram login for user ${session.user.id}`);
    return session;
  }

  /** Development helper: creates a user with a stored result, or returns the existing one untouched. */
  async seedUser(dto: DevSeedUserDto): Promise<{ userId: number; token: string }> {
    if (!dto.email && !dto.telegram) {
      throw new BadRequestException('Email or telegram required');
    }
    const snapshot = this.toSnapshot({
      animal: dto.animal,
      element: dto.element,
      genderForm: dto.genderForm,
      text: dto.short_text,
    });

    return this.dataSource.transaction(async (manager) => {
      const existing = await this.findByIdentity(manager, dto.email, dto.telegram);
      if (existing) {
        return { userId: existing.id, token: await this.usersService.ensureAuthToken(existing.id, manager) };
      }

      const user = await this.createUser(manager, {
        email: dto.email ?? null,
        telegram: dto.telegram ?? null,
        name: dto.name,
        lang: dto.lang,
      });
      await this.usersService.upsertResult(user.id, snapshot, manager);
      this.logger.log(`🌱 Seeded user ${user.id}`);
      return { userId: user.id, token: await this.usersService.ensureAuthToken(user.id, manager) };
    });
  }

  private async registerInTransaction(
    manager: EntityManager,
    dto: RegisterDto,
    snapshot: UserResultSnapshot | null,
  ): Promise<AuthSession> {
    const users = manager.getRepository(User);
    let user = await this.findByIdentity(manager, dto.email, dto.telegram);

    if (user) {
      if (dto.name) user.name = dto.name;
      if (dto.lang) user.lang = dto.lang;
      user = await users.save(user);
    } else {
      if (!dto.name || !dto.lang) {
        throw new BadRequestException('Name and lang required');
      }
      user = await this.createUser(manager, {
        email: dto.email ?? null,
        telegram: dto.telegram ?? null,
        name: dto.name,
        lang: dto.lang,
      });
    }

    if (snapshot) {
      await this.usersService.upsertResult(user.id, snapshot, manager);
    }
    return { user, token: await this.usersService.ensureAuthToken(user.id, manager) };
  }

  private async findByIdentity(
    manager: EntityManager,
    email: string | undefined,
    telegram: string | undefined,
  ): Promise<User | null> {
    const where: FindOptionsWhere<User>[] = [];
    if (email) where.push({ email });
    if (telegram) where.push({ telegram });

    const matches = await manager.getRepository(User).find({ where });
    if (matches.length > 1) {
      throw new ConflictException('Email and telegram belong to different users');
    }
    return matches[0] ?? null;
  }

  private async createUser(
    manager: EntityManager,
    fields: { email?: string | null; telegram?: string | null; googleSub?: string; name: string; lang: Language },
  ): Promise<User> {
    const users = manager.getRepository(User);
    return users.save(
      users.create({
        email: fields.email ?? null,
        telegram: fields.telegram ?? null,
        googleSub: fields.googleSub ?? null,
        name: fields.name,
        lang: fields.lang,
        authToken: generateAuthToken(),
        hasFull: false,
        fullBonusAwarded: false,
        packsBought: 0,
        compatCredits: clampCredits(INITIAL_COMPAT_CREDITS),
      }),
    );
  }

  private toSnapshot(result: ShortResultDto): UserResultSnapshot {
    const element = normalizeElement(result.element);
    if (!isAnimal(result.animal)) throw new BadRequestException(`Invalid animal: ${result.animal}`);
    if (!element) throw new BadRequestException(`Invalid element: ${result.element}`);
    if (!isGenderForm(result.genderForm)) throw new BadRequestException(`Invalid genderForm: ${result.genderForm}`);

    const archetype: Archetype = { animal: result.animal, element, genderForm: result.genderForm };
    return { archetype, shortText: result.text };
  }

  /**
   * Runs the work in a transaction; when a concurrent request inserted the same
   * identity first, the unique violation rolls it back and the second attempt
   * finds the winner's row.
   */
  private async withUniqueRetry<T>(label: string, work: (manager: EntityManager) => Promise<T>): Promise<T> {
    try {
      return await this.dataSource.transaction(work);
    } catch (error) {
      if (!isUniqueViolation(error)) throw error;
      this.logger.warn(`⚠️ Concurrent ${label}, retrying against the stored row`);
      return this.dataSource.transaction(work);
    }
  }
}
