import { Language, animalLabel, elementLabel, isAnimal, isGenderForm, normalizeElement } from '../archetypes/archetype.constants';

export const COMPAT_PROMPT_VERSION = 'v3';

export const COMPAT_MAX_OUTPUT_TOKENS = 1200;

export const COMPATIBILITY_SYSTEM_PROMPT = [
  'You are generating a compatibility report for the "24 animals × 4 elements" system.',
  '',
  'STRICT RULES:',
  '1) Output ONLY the final report text. No JSON, no preface, no analysis, no prompt echoing.',
  '2) Use the language specified by the `LANGUAGE:` tag in the user payload (ru/en/es/pt).',
  '3) Use the names, animals and elements exactly as provided in the payload.',
  '4) The first two lines must repeat LINE_A and LINE_B of the payload without their prefixes.',
  '5) Then output these numbered sections in the selected language:',
  '   1) Key similarities 2) Key differences 3) Strengths 4) Potential challenges 5) Recommendations 6) Summary',
  '',
  'Keep each section concise and focused on the provided data.',
].join('\n');

/** The stored part of a user's result the report is built from. */
export interface CompatibilityProfile {
  animalCode: string;
  elementCode: string;
  genderForm: string;
  shortText: string;
  fullText: string | null;
}

export interface CompatibilityPerson {
  name: string;
  result: CompatibilityProfile | null;
}

export interface CompatibilityPayload {
  text: string;
  lineA: string;
  lineB: string;
}

const PLACEHOLDER = { animal: 'UNKNOWN', element: 'unknown', profile: '(no data)' };

function describeParty(result: CompatibilityProfile | null, lang: Language) {
  if (!result) return { ...PLACEHOLDER };

  const element = normalizeElement(result.elementCode);
  const genderForm = isGenderForm(result.genderForm) ? result.genderForm : 'unspecified';
  return {
    animal: isAnimal(result.animalCode) ? animalLabel(result.animalCode, lang, genderForm) : result.animalCode,
    element: element ? elementLabel(element, lang) : result.elementCode,
    profile: result.fullText || result.shortText || 'NOT_PROVIDED',
  };
}

export function buildCompatibilityPayload(lang: Language, a: CompatibilityPerson, b: CompatibilityPerson): CompatibilityPayload {
  const first = describeParty(a.result, lang);
  const second = describeParty(b.result, lang);
  const lineA = `🟢 ${a.name} — ${first.animal} ${first.element}`;
  const lineB = `🔴 ${b.name} — ${second.animal} ${second.element}`;

  const text = [
    `LANGUAGE: ${lang.toUpperCase()}`,
    `LINE_A: ${lineA}`,
    `LINE_B: ${lineB}`,
    '',
    'Person A:',
    `Name: ${a.name}`,
    `Archetype: ${first.animal} ${first.element}`,
    'Profile:',
    first.profile,
    '',
    'Person B:',
    `Name: ${b.name}`,
    `Archetype: ${second.animal} ${second.element}`,
    'Profile:',
    second.profile,
  ].join('\n');

  return { text, lineA, lineB };
}

/**
 * Removes payload framing the model repeated: anything before the first
 * occurrence of lineA and the LINE_A/LINE_B prefixes of the first two lines.
 */
export function stripPromptEcho(text: string, lineA: string): string {
  let stripped = text.trim();
  if (!stripped) return stripped;

  const start = stripped.indexOf(lineA);
  if (start > 0) stripped = stripped.slice(start);

  const lines = stripped.split(/\r?\n/);
  if (lines[0]?.startsWith('LINE_A: ')) lines[0] = lines[0].slice('LINE_A: '.length);
  if (lines[1]?.startsWith('LINE_B: ')) lines[1] = lines[1].slice('LINE_B: '.length);
  return lines.join('\n');
}
