import { ANIMALS, animalLabel, elementLabel, normalizeElement, toLanguage } from './archetype.constants';

describe('archetype constants', () => {
  it('knows all 24 animals', () => {
    expect(ANIMALS).toHaveLength(24);
    expect(new Set(ANIMALS).size).toBe(24);
  });

  it.each([
    ['Fire', 'Fire'],
    ['  water ', 'Water'],
    ['Воздух', 'Air'],
    ['tierra', 'Earth'],
    ['Água', 'Water'],
  ])('normalizes element %p to %p', (input, expected) => {
    expect(normalizeElement(input)).toBe(expected);
  });

  it('rejects unknown elements', () => {
    expect(normalizeElement('Metal')).toBeNull();
    expect(normalizeElement('   ')).toBeNull();
  });

  it('labels elements per language', () => {
    expect(elementLabel('Earth', 'ru')).toBe('Земля');
    expect(elementLabel('Fire', 'es')).toBe('Fuego');
  });

  it('uses gendered russian animal names and codes elsewhere', () => {
    expect(animalLabel('Wolf', 'ru', 'female')).toBe('Волчица');
    expect(animalLabel('Wolf', 'ru', 'unspecified')).toBe('Волк');
    expect(animalLabel('Wolf', 'en', 'female')).toBe('Wolf');
  });

  it('falls back to russian for unknown languages', () => {
    expect(toLanguage('de')).toBe('ru');
    expect(toLanguage(null)).toBe('ru');
    expect(toLanguage('pt')).toBe('pt');
  });
});
