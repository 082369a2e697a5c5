import { ANIMALS, ELEMENTS, GENDER_FORMS, Language } from './archetype.constants';

export const LANGUAGE_RULES: Record<Language, string> = {
  ru: 'Пиши весь текст СТРОГО на русском языке.',
  en: 'Write the entire response STRICTLY in English.',
  es: 'Escribe todo el texto ESTRICTAMENTE en español.',
  pt: 'Escreva todo o texto ESTRITAMENTE em português.',
};

export function buildResolverSystemPrompt(lang: Language): string {
  return [
    LANGUAGE_RULES[lang],
    '',
    'You are the classification model of the "24 animals × 4 elements" system.',
    'Return STRICTLY one JSON object and nothing else. No extra fields, no prose.',
    '',
    `animal: one of ${ANIMALS.join(', ')}`,
    `element: one of ${ELEMENTS.join(' | ')}`,
    `genderForm: one of ${GENDER_FORMS.join(' | ')}`,
    '',
    'Format:',
    '{"animal": "Wolf", "element": "Fire", "genderForm": "male"}',
  ].join('\n');
}

export function buildResolverInput(params: { name: string; lang: Language; gender: string; answersText: string }): string {
  return [
    `Name: ${params.name}`,
    `Language: ${params.lang}`,
    `Gender: ${params.gender}`,
    '',
    'Answers:',
    params.answersText,
  ].join('\n');
}
