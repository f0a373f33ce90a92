/**
 * Evidence Verifier
 *
 * Checks every non-empty extracted value against the source text and line
 * items. Values without support are forced back to their empty value and
 * flagged zero-evidence. Matching is tried in order of strictness:
 *
 *   exact    token-bounded match after normalization
 *   numeric  every number present, with the same or a converted unit, and
 *            every remaining word present exactly or fuzzily
 *   fuzzy    Levenshtein similarity of a token window >= fuzzyThreshold
 *
 * Boolean YES values are supported by positive indicators, synonyms or the
 * field's readable name, unless each occurrence sits inside a negative
 * indicator ("no conveyor").
 *
 * @module services/extraction/evidence-verifier
 */

import { distance } from 'fastest-levenshtein';
import type { FieldSchemaEntry } from '../../models/field-schema.js';
import { emptyValue, type EvidenceMatch, type FieldValue, isEmptyValue } from '../../models/field-value.js';
import { lineItemToText, type SourceDocument } from '../../models/ports.js';
import { containsPhrase, normalizeForMatch, readableFieldName } from '../../utils/text.js';
import { parseQuantities, type Quantity, quantitiesEqual, stripThousands, toBase } from './units.js';

export interface EvidenceConfig {
  fuzzyThreshold: number;
  numericTolerance: number;
}

export interface VerificationResult {
  value: FieldValue;
  evidenceBacked: boolean;
  evidence: EvidenceMatch | null;
  zeroEvidence: boolean;
}

/** Shorter values produce too many accidental near-matches */
const MIN_FUZZY_LENGTH = 4;

export class EvidenceVerifier {
  /** Haystack with thousands separators removed; quantity offsets index into it */
  private readonly raw: string;
  private readonly normalized: string;
  private readonly tokens: string[];
  private readonly tokenSet: Set<string>;
  private readonly quantities: Quantity[];

  constructor(
    source: SourceDocument,
    private readonly config: EvidenceConfig
  ) {
    this.raw = stripThousands([source.text, ...source.lineItems.map(lineItemToText)].join('\n'));
    this.normalized = normalizeForMatch(this.raw);
    this.tokens = this.normalized.length > 0 ? this.normalized.split(' ') : [];
    this.tokenSet = new Set(this.tokens);
    this.quantities = parseQuantities(this.raw);
  }

  verify(entry: FieldSchemaEntry, value: FieldValue): VerificationResult {
    if (isEmptyValue(value)) {
      return { value, evidenceBacked: false, evidence: null, zeroEvidence: false };
    }

    const evidence = value.type === 'boolean' ? this.findIndicators(entry) : this.findText(value.value);
    if (evidence) {
      return { value, evidenceBacked: true, evidence, zeroEvidence: false };
    }

    return { value: emptyValue(entry.type), evidenceBacked: false, evidence: null, zeroEvidence: true };
  }

  findText(text: string): EvidenceMatch | null {
    const needle = normalizeForMatch(text);
    if (needle.length === 0) return null;

    if (containsPhrase(this.normalized, needle)) {
      return { kind: 'exact', matched: text, similarity: 1 };
    }

    const numeric = this.findNumeric(text);
    if (numeric) return numeric;

    if (/\d/.test(needle) || needle.length < MIN_FUZZY_LENGTH) return null;
    return this.findFuzzy(needle);
  }

  private findNumeric(text: string): EvidenceMatch | null {
    const stripped = stripThousands(text);
    const wanted = parseQuantities(stripped);
    if (wanted.length === 0) return null;
    if (!this.wordsSupported(residualWords(stripped, wanted))) return null;

    const matched: string[] = [];
    for (const quantity of wanted) {
      for (const number of quantity.numbers) {
        const hit = this.findQuantity(parseFloat(number), quantity);
        if (!hit) return null;
        const snippet = this.raw.slice(hit.start, hit.end);
        if (!matched.includes(snippet)) matched.push(snippet);
      }
    }

    return { kind: 'numeric', matched: matched.join(', '), similarity: 1 };
  }

  private findQuantity(value: number, wanted: Quantity): Quantity | null {
    const unit = wanted.unit;
    for (const candidate of this.quantities) {
      for (const number of candidate.numbers) {
        const found = parseFloat(number);
        if (!unit) {
          if (found === value) return candidate;
          continue;
        }
        if (!candidate.unit || candidate.unit.dimension !== unit.dimension) continue;
        if (candidate.unit === unit) {
          if (found === value) return candidate;
          continue;
        }
        if (quantitiesEqual(toBase(found, candidate.unit), toBase(value, unit), this.config.numericTolerance)) {
          return candidate;
        }
      }
    }
    return null;
  }

  /**
   * Words of a value left once its quantities are removed. Each must occur
   * as a source token or be within fuzzyThreshold of one.
   */
  private wordsSupported(words: string[]): boolean {
    return words.every((word) => {
      if (this.tokenSet.has(word)) return true;
      if (word.length < MIN_FUZZY_LENGTH) return false;
      for (const token of this.tokenSet) {
        const longest = Math.max(token.length, word.length);
        if (1 - distance(word, token) / longest >= this.config.fuzzyThreshold) return true;
      }
      return false;
    });
  }

  private findFuzzy(needle: string): EvidenceMatch | null {
    const needleTokens = needle.split(' ').length;
    const maxLength = (len: number): number => Math.max(len, needle.length);
    let best: { text: string; similarity: number } | null = null;

    for (let size = Math.max(1, needleTokens - 1); size <= needleTokens + 1; size++) {
      for (let i = 0; i + size <= this.tokens.length; i++) {
        const window = this.tokens.slice(i, i + size).join(' ');
        const longest = maxLength(window.length);
        // Edit distance is at least the length difference
        if (1 - Math.abs(window.length - needle.length) / longest < this.config.fuzzyThreshold) continue;

        const similarity = 1 - distance(needle, window) / longest;
        if (similarity >= this.config.fuzzyThreshold && (!best || similarity > best.similarity)) {
          best = { text: window, similarity };
        }
      }
    }

    return best ? { kind: 'fuzzy', matched: best.text, similarity: best.similarity } : null;
  }

  private findIndicators(entry: FieldSchemaEntry): EvidenceMatch | null {
    const positives = unique(
      [...(entry.positiveIndicators ?? []), ...(entry.synonyms ?? []), readableFieldName(entry.name)].map(
        normalizeForMatch
      )
    );
    const negativeSpans = this.occurrenceSpans(unique((entry.negativeIndicators ?? []).map(normalizeForMatch)));

    const found: string[] = [];
    for (const phrase of positives) {
      const spans = this.occurrenceSpans([phrase]);
      const outsideNegatives = spans.some(
        ([start, end]) => !negativeSpans.some(([nStart, nEnd]) => start >= nStart && end <= nEnd)
      );
      if (outsideNegatives) found.push(phrase);
    }

    if (found.length === 0) return null;
    return { kind: 'indicator', matched: found[0], similarity: 1, indicators: found };
  }

  /**
   * Token-bounded occurrences of each phrase as [start, end) offsets into
   * the normalized haystack.
   */
  private occurrenceSpans(phrases: string[]): Array<[number, number]> {
    const padded = ` ${this.normalized} `;
    const spans: Array<[number, number]> = [];
    for (const phrase of phrases) {
      if (phrase.length === 0) continue;
      const needle = ` ${phrase} `;
      let index = padded.indexOf(needle);
      while (index !== -1) {
        spans.push([index, index + needle.length - 1]);
        index = padded.indexOf(needle, index + 1);
      }
    }
    return spans;
  }
}

function residualWords(text: string, quantities: Quantity[]): string[] {
  let rest = '';
  let cursor = 0;
  for (const quantity of quantities) {
    rest += `${text.slice(cursor, quantity.start)} `;
    cursor = quantity.end;
  }
  rest += text.slice(cursor);
  const normalized = normalizeForMatch(rest);
  return normalized.length === 0 ? [] : normalized.split(' ');
}

function unique(values: string[]): string[] {
  return [...new Set(values.filter((v) => v.length > 0))];
}
