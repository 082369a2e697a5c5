import labels from './data/labels.json';

export const ANIMALS = [
  'Wolf', 'Lion', 'Tiger', 'Lynx', 'Panther', 'Bear',
  'Fox', 'Wolverine', 'Deer', 'Monkey', 'Rabbit', 'Buffalo',
  'Ram', 'Capybara', 'Elephant', 'Horse', 'Eagle', 'Owl',
  'Raven', 'Parrot', 'Snake', 'Crocodile', 'Turtle', 'Lizard',
] as const;

export const ELEMENTS = ['Fire', 'Water', 'Air', 'Earth'] as const;

export const GENDER_FORMS = ['male', 'female', 'unspecified'] as const;

export const LANGUAGES = ['ru', 'en', 'es', 'pt'] as const;

export type Animal = (typeof ANIMALS)[number];
export type Element = (typeof ELEMENTS)[number];
export type GenderForm = (typeof GENDER_FORMS)[number];
export type Language = (typeof LANGUAGES)[number];

export interface Archetype {
  animal: Animal;
  element: Element;
  genderForm: GenderForm;
}

/**
 * Trust policy for archetype fields. Strict fields fail the whole resolution;
 * lenient fields coming from the model are coerced to a default instead.
 */
export const ARCHETYPE_VALIDATION_POLICY = {
  strictFields: ['animal', 'element'],
  lenientFields: ['genderForm'],
  lenientDefaults: { genderForm: 'unspecified' },
} as const;

export const DEFAULT_LANGUAGE: Language = 'ru';

export function isAnimal(value: unknown): value is Animal {
  return typeof value === 'string' && (ANIMALS as readonly string[]).includes(value);
}

export function isElement(value: unknown): value is Element {
  return typeof value === 'string' && (ELEMENTS as readonly string[]).includes(value);
}

export function isGenderForm(value: unknown): value is GenderForm {
  return typeof value === 'string' && (GENDER_FORMS as readonly string[]).includes(value);
}

export function isLanguage(value: unknown): value is Language {
  return typeof value === 'string' && (LANGUAGES as readonly string[]).includes(value);
}

export function toLanguage(value: string | null | undefined): Language {
  return isLanguage(value) ? value : DEFAULT_LANGUAGE;
}

/**
 * Canonical element code for a code or a display label in any supported
 * language, or null when nothing matches.
 */
export function normalizeElement(value: string): Element | null {
  const needle = value.trim().toLowerCase();
  if (!needle) return null;
  for (const code of ELEMENTS) {
    if (code.toLowerCase() === needle) return code;
    const names: Record<string, string> = labels.elements[code];
    if (Object.values(names).some((label) => label.toLowerCase() === needle)) return code;
  }
  return null;
}

export function elementLabel(element: Element, lang: Language): string {
  return labels.elements[element][lang];
}

export function animalLabel(animal: Animal, lang: Language, genderForm: GenderForm): string {
  if (lang !== 'ru') return animal;
  const forms = labels.animalsRu[animal];
  return genderForm === 'female' ? forms.female : forms.male;
}
