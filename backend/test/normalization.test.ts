import { describe, expect, it } from 'vitest';
import { foldForLookup, NormalizationTable } from '../src/utils/normalization';
import { loadNormalization } from './helpers';

describe('foldForLookup', () => {
  it('drops case, diacritics and separators', () => {
    expect(foldForLookup('Алма-Ата')).toBe('алмаата');
    expect(foldForLookup('Türkistan')).toBe('turkistan');
    expect(foldForLookup('  Nur Sultan ')).toBe('nursultan');
  });

  it('treats ё and е alike', () => {
    expect(foldForLookup('Ёлка')).toBe(foldForLookup('елка'));
  });
});

describe('NormalizationTable', () => {
  const table = loadNormalization();

  describe('cities', () => {
    it('resolves Latin and native-script variants to one token', () => {
      for (const raw of ['Almaty', 'Almata', 'алма-ата', 'Алма Ата', 'ALMATY']) {
        expect(table.canonicalize(raw, 'city')).toEqual({ value: 'Алматы', category: 'city', normalized: true });
      }
    });

    it('matches native spellings through transliteration', () => {
      expect(table.canonicalize('Орал', 'city').value).toBe('Уральск');
      expect(table.canonicalize('Шымкент', 'city').value).toBe('Шымкент');
    });

    it('returns unknown input unchanged and unnormalized', () => {
      expect(table.canonicalize('Almatyy', 'city')).toEqual({ value: 'Almatyy', category: 'city', normalized: false });
    });

    it('does not match cities by substring', () => {
      expect(table.canonicalize('near Almaty', 'city').normalized).toBe(false);
    });
  });

  describe('colors', () => {
    it('maps Russian and English synonyms to the English canonical', () => {
      expect(table.canonicalize('Серебристый металлик', 'color').value).toBe('silver');
      expect(table.canonicalize('grey', 'color').value).toBe('gray');
      expect(table.canonicalize('белый', 'color').value).toBe('white');
    });

    it('falls back to the longest contained variant', () => {
      expect(table.canonicalize('dark red', 'color').value).toBe('red');
      expect(table.canonicalize('темно-красный', 'color').value).toBe('red');
    });

    it('leaves unknown colors unnormalized', () => {
      expect(table.canonicalize('chartreuse', 'color')).toEqual({
        value: 'chartreuse',
        category: 'color',
        normalized: false,
      });
    });
  });

  it('is idempotent on canonical values', () => {
    for (const raw of ['almata', 'кустанай', 'Орал', 'графит']) {
      const category = raw === 'графит' ? 'color' : 'city';
      const once = table.canonicalize(raw, category);
      expect(table.canonicalize(once.value, category)).toEqual(once);
    }
  });

  it('rejects a variant claimed by two canonicals', () => {
    expect(
      () =>
        new NormalizationTable({
          colors: { red: ['bordo'], brown: ['Bordo'] },
          cities: {},
          transliteration: {},
        })
    ).toThrow('Normalization table conflict for color variant "Bordo": "red" and "brown"');
  });

  it('picks up new synonyms from data alone', () => {
    const custom = new NormalizationTable({
      colors: {},
      cities: { Конаев: ['kapchagay', 'капчагай'] },
      transliteration: {},
    });
    expect(custom.canonicalize('Kapchagay', 'city').value).toBe('Конаев');
    expect(custom.size('city')).toBe(3);
  });
});
