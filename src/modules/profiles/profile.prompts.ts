import { Language } from '../archetypes/archetype.constants';
import { LANGUAGE_RULES } from '../archetypes/archetype.prompts';

const SHORT_LABELS: Record<Language, { values: string; conclusion: string; point1: string; point2: string }> = {
  ru: { values: 'Ценности', conclusion: 'Заключение', point1: 'Пункт 1', point2: 'Пункт 2' },
  en: { values: 'Values', conclusion: 'Conclusion', point1: 'Point 1', point2: 'Point 2' },
  es: { values: 'Valores', conclusion: 'Conclusión', point1: 'Punto 1', point2: 'Punto 2' },
  pt: { values: 'Valores', conclusion: 'Conclusão', point1: 'Ponto 1', point2: 'Ponto 2' },
};

const FULL_SECTIONS: Record<Language, string[]> = {
  ru: [
    'Общий психопрофиль', 'Энергетический профиль', 'Стиль мышления', 'Социальное взаимодействие',
    'Конфликтность и поведение в напряжённых ситуациях', 'Ценности', 'Профессиональный стиль',
    'Сильные стороны', 'Потенциальные слабые стороны', 'Жизненный путь', 'Итог',
  ],
  en: [
    'General psychological profile', 'Energetic profile', 'Thinking style', 'Social interaction',
    'Conflict and behavior under tension', 'Values', 'Professional style',
    'Strengths', 'Potential weaknesses', 'Life path', 'Conclusion',
  ],
  es: [
    'Perfil psicológico general', 'Perfil energético', 'Estilo de pensamiento', 'Interacción social',
    'Conflicto y comportamiento bajo tensión', 'Valores', 'Estilo profesional',
    'Fortalezas', 'Debilidades potenciales', 'Camino de vida', 'Conclusión',
  ],
  pt: [
    'Perfil psicológico geral', 'Perfil energético', 'Estilo de pensamento', 'Interação social',
    'Conflito e comportamento sob tensão', 'Valores', 'Estilo profissional',
    'Pontos fortes', 'Fraquezas potenciais', 'Caminho de vida', 'Conclusão',
  ],
};

export interface ProfilePromptInput {
  name: string;
  lang: Language;
  gender: string;
  animalDisplay: string;
  elementDisplay: string;
  answersText: string;
}

export function buildShortSystemPrompt(lang: Language): string {
  return [
    LANGUAGE_RULES[lang],
    '',
    'You write the SHORT result of the "24 animals × 4 elements" system.',
    'Follow the structure from the user prompt exactly. Do not add extra blocks.',
  ].join('\n');
}

export function buildShortPrompt(input: ProfilePromptInput): string {
  const labels = SHORT_LABELS[input.lang];
  return [
    `Use ONLY this animal: ${input.animalDisplay}. Do not replace it or introduce other animals.`,
    `Write the whole text in the language: ${input.lang}. Never mix languages.`,
    'Gender only changes the form of the archetype name, never the analysis.',
    `Gender: ${input.gender}`,
    '',
    'Structure:',
    `${input.name} — ${input.animalDisplay} ${input.elementDisplay}`,
    '{one-line image, 3–7 words}',
    '{short description, 1–2 paragraphs}',
    `${labels.values} — «{3–4 keywords}»`,
    `${labels.point1} — {most vivid trait}`,
    `${labels.point2} — {second trait}`,
    labels.conclusion,
    '',
    'Tone: adult, calm, confident. Forbidden: "maybe", "it seems", esotericism, explaining the analysis.',
    '',
    `Name: ${input.name}`,
    `Language: ${input.lang}`,
    'Answers:',
    input.answersText,
  ].join('\n');
}

export function buildFullSystemPrompt(lang: Language): string {
  return [
    LANGUAGE_RULES[lang],
    '',
    'You write the FULL psychological profile of the "24 animals × 4 elements" system.',
    'The archetype and the element are ALREADY SET. Do not change them and do not add other animals.',
    'Follow the full-profile structure strictly.',
  ].join('\n');
}

export function buildFullPrompt(input: ProfilePromptInput): string {
  const sections = FULL_SECTIONS[input.lang];
  const numbered = sections.slice(0, -1).map((title, i) => `${i + 1}. ${title}`);
  return [
    `Use ONLY this animal: ${input.animalDisplay}`,
    `Use ONLY this element: ${input.elementDisplay}`,
    `Gender: ${input.gender}`,
    '',
    'Mirror the rhythm and tone of the answers: careful answers get a softer voice, direct answers a direct one.',
    'Forbidden: "maybe", "it seems", "probably", esotericism, diagnoses, explaining how the model works.',
    '',
    'STRICT OUTPUT STRUCTURE:',
    `${input.name} — ${input.animalDisplay} ${input.elementDisplay}`,
    '(short description of the archetype in parentheses)',
    ...numbered,
    sections[sections.length - 1],
    '',
    `Language: ${input.lang}`,
    'Answers:',
    input.answersText,
  ].join('\n');
}
