import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { CanonicalToken, TokenCategory } from '../types';

export const DEFAULT_NORMALIZATION_TABLE_PATH = path.resolve(process.cwd(), 'backend/data/normalization.json');

const variantMapSchema = z.record(z.string().min(1), z.array(z.string().min(1)));

const normalizationDataSchema = z.object({
  colors: variantMapSchema,
  cities: variantMapSchema,
  transliteration: z.record(z.string().length(1), z.string()).default({}),
});

export type NormalizationData = z.infer<typeof normalizationDataSchema>;

interface CategoryIndex {
  // folded variant -> canonical
  direct: Map<string, string>;
  // transliterated folded variant -> canonical; ambiguous keys removed
  transliterated: Map<string, string>;
  // folded variants, longest first, for partial matching
  partialKeys: Array<[string, string]> | null;
}

/**
 * Folds a surface form for lookup: lower case, diacritics stripped
 * (so ё/е and й/и compare equal), every separator and punctuation removed.
 */
export function foldForLookup(value: string): string {
  return value
    .normalize('NFD')
    .replace(/\p{M}/gu, '')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, '');
}

/**
 * Read-only mapping of locale, synonym and typo variants of colors and cities
 * to one canonical spelling. Built once from JSON; never mutated afterwards.
 */
export class NormalizationTable {
  private readonly indexes: Record<TokenCategory, CategoryIndex>;
  private readonly transliteration: Map<string, string>;

  constructor(data: NormalizationData) {
    this.transliteration = new Map(
      Object.entries(data.transliteration).map(([from, to]) => [foldForLookup(from) || from, to])
    );
    this.indexes = {
      color: this.buildIndex('color', data.colors, true),
      city: this.buildIndex('city', data.cities, false),
    };
  }

  static fromFile(filePath: string = DEFAULT_NORMALIZATION_TABLE_PATH): NormalizationTable {
    const raw = fs.readFileSync(filePath, 'utf8');
    const parsed = normalizationDataSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Invalid normalization table at ${filePath}: ${parsed.error.message}`);
    }
    const table = new NormalizationTable(parsed.data);
    console.log(
      `Normalization table loaded from ${filePath}: ${table.size('color')} color variants, ${table.size('city')} city variants`
    );
    return table;
  }

  size(category: TokenCategory): number {
    return this.indexes[category].direct.size;
  }

  canonicalize(raw: string, category: TokenCategory): CanonicalToken {
    const index = this.indexes[category];
    const folded = foldForLookup(raw);

    if (folded.length > 0) {
      const direct = index.direct.get(folded);
      if (direct !== undefined) {
        return { value: direct, category, normalized: true };
      }

      const transliterated = index.transliterated.get(this.transliterate(folded));
      if (transliterated !== undefined) {
        return { value: transliterated, category, normalized: true };
      }

      if (index.partialKeys) {
        const partial = index.partialKeys.find(([variant]) => folded.includes(variant));
        if (partial) {
          return { value: partial[1], category, normalized: true };
        }
      }
    }

    return { value: raw, category, normalized: false };
  }

  private transliterate(folded: string): string {
    let result = '';
    for (const char of folded) {
      result += this.transliteration.get(char) ?? char;
    }
    return result;
  }

  private buildIndex(
    category: TokenCategory,
    entries: Record<string, string[]>,
    allowPartial: boolean
  ): CategoryIndex {
    const direct = new Map<string, string>();
    const transliterated = new Map<string, string>();
    const ambiguous = new Set<string>();

    for (const [canonical, variants] of Object.entries(entries)) {
      for (const variant of [canonical, ...variants]) {
        const key = foldForLookup(variant);
        if (!key) continue;

        const existing = direct.get(key);
        if (existing !== undefined && existing !== canonical) {
          throw new Error(
            `Normalization table conflict for ${category} variant "${variant}": "${existing}" and "${canonical}"`
          );
        }
        direct.set(key, canonical);

        const translitKey = this.transliterate(key);
        const translitExisting = transliterated.get(translitKey);
        if (translitExisting !== undefined && translitExisting !== canonical) {
          ambiguous.add(translitKey);
        }
        transliterated.set(translitKey, canonical);
      }
    }

    for (const key of ambiguous) {
      transliterated.delete(key);
    }

    const partialKeys = allowPartial
      ? Array.from(direct.entries()).sort((a, b) => b[0].length - a[0].length || (a[0] < b[0] ? -1 : 1))
      : null;

    return { direct, transliterated, partialKeys };
  }
}
