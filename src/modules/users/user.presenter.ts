import { User } from '../../database/entities/user.entity';

export function isFullUnlocked(user: User): boolean {
  return Boolean(user.hasFull);
}

export function presentUser(user: User) {
  const fullUnlocked = isFullUnlocked(user);
  return {
    id: user.id,
    email: user.email,
    telegram: user.telegram,
    name: user.name,
    lang: user.lang,
    hasFull: fullUnlocked,
    fullUnlocked,
    packsBought: user.packsBought,
    compatCredits: user.compatCredits,
    created_at: user.createdAt,
  };
}

export function presentSession(user: User, token: string) {
  const fullUnlocked = isFullUnlocked(user);
  return {
    userId: user.id,
    token,
    credits: user.compatCredits,
    hasFull: fullUnlocked,
    fullUnlocked,
    packsBought: user.packsBought,
    compatCredits: user.compatCredits,
    user: presentUser(user),
  };
}

export function presentMe(user: User) {
  const fullUnlocked = isFullUnlocked(user);
  return {
    userId: user.id,
    lang: user.lang,
    credits: user.compatCredits,
    compatCredits: user.compatCredits,
    hasFull: fullUnlocked,
    fullUnlocked,
  };
}

// Public fields of another user, shown next to a shared report.
export function presentCounterpart(user: User | undefined, fallbackId: number) {
  if (!user) {
    return { id: fallbackId, name: '', email: null, telegram: null, lang: '' };
  }
  return { id: user.id, name: user.name, email: user.email, telegram: user.telegram, lang: user.lang };
}
