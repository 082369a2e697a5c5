import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, In, Repository } from 'typeorm';
import { User } from '../../database/entities/user.entity';
import { UserResult } from '../../database/entities/user-result.entity';
import { Archetype } from '../archetypes/archetype.constants';
import { generateAuthToken } from '../../common/utils/auth-token.util';

export interface UserResultSnapshot {
  archetype: Archetype;
  shortText: string;
  // undefined keeps the stored full text
  fullText?: string | null;
}

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
    @InjectRepository(UserResult)
    private readonly resultRepository: Repository<UserResult>,
  ) {}

  async findByToken(token: string): Promise<User | null> {
    return this.userRepository.findOne({ where: { authToken: token } });
  }

  async findById(id: number): Promise<User | null> {
    return this.userRepository.findOne({ where: { id } });
  }

  async findManyByIds(ids: number[]): Promise<Map<number, User>> {
    if (ids.length === 0) return new Map();
    const users = await this.userRepository.find({ where: { id: In(ids) } });
    return new Map(users.map((user) => [user.id, user]));
  }

  /** Lookup by email or telegram handle. */
  async findByContact(query: string): Promise<User | null> {
    return this.userRepository.findOne({ where: [{ email: query }, { telegram: query }] });
  }

  async getResult(userId: number, manager?: EntityManager): Promise<UserResult | null> {
    const repository = manager ? manager.getRepository(UserResult) : this.resultRepository;
    return repository.findOne({ where: { userId } });
  }

  /** The stored bearer token (not selected by default). */
  async getAuthToken(userId: number, manager?: EntityManager): Promise<string | null> {
    const repository = manager ? manager.getRepository(User) : this.userRepository;
    const row = await repository
      .createQueryBuilder('user')
      .addSelect('user.authToken')
      .where('user.id = :userId', { userId })
      .getOne();
    return row?.authToken ?? null;
  }

  /** Issues a fresh token when the user has none and returns the current one. */
  async ensureAuthToken(userId: number, manager?: EntityManager): Promise<string> {
    const existing = await this.getAuthToken(userId, manager);
    if (existing) return existing;

    const repository = manager ? manager.getRepository(User) : this.userRepository;
    const token = generateAuthToken();
    await repository.update({ id: userId }, { authToken: token });
    this.logger.log(`🔑 Issued auth token for user ${userId}`);
    return token;
  }

  async upsertResult(userId: number, snapshot: UserResultSnapshot, manager?: EntityManager): Promise<UserResult> {
    const repository = manager ? manager.getRepository(UserResult) : this.resultRepository;
    const existing = await repository.findOne({ where: { userId } });
    const result = existing ?? repository.create({ userId, fullText: null });

    result.animalCode = snapshot.archetype.animal;
    result.elementCode = snapshot.archetype.element;
    result.genderForm = snapshot.archetype.genderForm;
    result.shortText = snapshot.shortText;
    if (snapshot.fullText !== undefined) result.fullText = snapshot.fullText;

    return repository.save(result);
  }
}
