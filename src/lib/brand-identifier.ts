import brandData from "./data/brands.json";

/**
 * Immutable identifier that resolves the vehicle brands named in a dealership
 * name. All derived properties are lazy-computed and cached.
 *
 * Usage:
 *   const id = new BrandIdentifier("Smith Buick GMC of Austin");
 *   id.tags     // ["Buick GMC"]
 *   id.primary  // "Buick GMC"
 */
export class BrandIdentifier {
  readonly raw: string;

  private _cleaned?: string;
  private _tags?: readonly string[];

  constructor(raw: string) {
    this.raw = raw;
  }

  /**
   * Create a BrandIdentifier from the first non-empty string among candidates.
   * Accepts unknown values (typical for untyped JSON parse results).
   */
  static from(...candidates: unknown[]): BrandIdentifier | undefined {
    for (const c of candidates) {
      if (typeof c === "string" && c.trim()) {
        return new BrandIdentifier(c);
      }
    }
    return undefined;
  }

  /** Name after stripping unicode junk and collapsing whitespace */
  get cleaned(): string {
    if (this._cleaned === undefined) {
      this._cleaned = this.raw
        .replace(/[\u200b\u200c\u200d\ufeff\u00ad]/g, "")
        .replace(/\s+/g, " ")
        .trim();
    }
    return this._cleaned;
  }

  /**
   * Canonical brand names found in the name, in order of appearance.
   * Where matches overlap the longest one wins ("Buick GMC" over "GMC").
   */
  get tags(): readonly string[] {
    return (this._tags ??= identifyBrands(this.cleaned));
  }

  get primary(): string | undefined {
    return this.tags[0];
  }

  get isFranchised(): boolean {
    return this.tags.length > 0;
  }
}

// ---------------------------------------------------------------------------
// Vocabulary: canonical brands plus alias spellings, matched case-insensitively
// on word boundaries
// ---------------------------------------------------------------------------

interface VocabularyTerm {
  canonical: string;
  length: number;
  pattern: RegExp;
}

let vocabulary: VocabularyTerm[] | null = null;

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function getVocabulary(): VocabularyTerm[] {
  if (vocabulary) return vocabulary;

  const terms = new Map<string, string>();
  for (const brand of brandData.brands) terms.set(brand.toLowerCase(), brand);
  for (const [alias, canonical] of Object.entries(brandData.aliases)) {
    terms.set(alias.toLowerCase(), canonical);
  }

  vocabulary = [...terms.entries()].map(([term, canonical]) => ({
    canonical,
    length: term.length,
    pattern: new RegExp(`(?<![A-Za-z0-9])${escapeRegExp(term)}(?![A-Za-z0-9])`, "gi"),
  }));
  return vocabulary;
}

function identifyBrands(name: string): readonly string[] {
  if (!name) return [];

  const matches: { start: number; end: number; canonical: string }[] = [];
  for (const term of getVocabulary()) {
    for (const m of name.matchAll(term.pattern)) {
      const start = m.index ?? 0;
      matches.push({ start, end: start + term.length, canonical: term.canonical });
    }
  }

  matches.sort((a, b) => b.end - b.start - (a.end - a.start) || a.start - b.start);

  const accepted: typeof matches = [];
  for (const m of matches) {
    if (accepted.some((a) => m.start < a.end && a.start < m.end)) continue;
    accepted.push(m);
  }

  accepted.sort((a, b) => a.start - b.start);
  return [...new Set(accepted.map((a) => a.canonical))];
}
