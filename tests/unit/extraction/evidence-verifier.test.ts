/**
 * Unit tests for the Evidence Verifier
 *
 * @module tests/unit/extraction/evidence-verifier
 */

import { describe, it, expect } from 'vitest';
import type { SourceDocument } from '../../../src/models/ports.js';
import { EvidenceVerifier } from '../../../src/services/extraction/evidence-verifier.js';
import { booleanField, field } from '../helpers.js';

const SOURCE: SourceDocument = {
  text: [
    'Quotation for a piston filler.',
    'Compressed air: 6 bar at the inlet.',
    'Supply voltage 480V three phase.',
    'No conveyor included. Glass bottles 250 ml.',
    'Production speed up to 60 bottles per minute.',
  ].join('\n'),
  lineItems: [{ name: 'Capping station', quantity: 1 }],
};

const CONFIG = { fuzzyThreshold: 0.85, numericTolerance: 0.01 };

function text(value: string) {
  return { type: 'text' as const, value };
}

describe('EvidenceVerifier', () => {
  const verifier = new EvidenceVerifier(SOURCE, CONFIG);

  // ═══════════════════════════════════════════════════════════════════════════════
  // TEXT VALUES
  // ═══════════════════════════════════════════════════════════════════════════════

  it('should accept an exact token match', () => {
    const result = verifier.verify(field('container'), text('Glass bottles'));
    expect(result.evidenceBacked).toBe(true);
    expect(result.evidence).toEqual({ kind: 'exact', matched: 'Glass bottles', similarity: 1 });
  });

  it('should reset an unsupported value and flag zero evidence', () => {
    const result = verifier.verify(field('psi'), text('500 PSI'));
    expect(result).toEqual({ value: text(''), evidenceBacked: false, evidence: null, zeroEvidence: true });
  });

  it('should accept a value converted from another unit', () => {
    const result = verifier.verify(field('psi'), text('87 PSI'));
    expect(result.evidence).toEqual({ kind: 'numeric', matched: '6 bar', similarity: 1 });
    expect(result.value).toEqual(text('87 PSI'));
  });

  it('should accept the same quantity written differently', () => {
    expect(verifier.verify(field('voltage'), text('480 V')).evidence).toEqual({
      kind: 'numeric',
      matched: '480V',
      similarity: 1,
    });
    expect(verifier.verify(field('speed'), text('60 units per minute')).evidence).toEqual({
      kind: 'numeric',
      matched: '60 bottles per minute',
      similarity: 1,
    });
  });

  it('should match bare numbers only against equal numbers', () => {
    expect(verifier.verify(field('volume'), text('250')).evidence?.kind).toBe('exact');
    expect(verifier.verify(field('volume'), text('251')).zeroEvidence).toBe(true);
  });

  it('should accept a near spelling by edit distance', () => {
    const result = verifier.verify(field('machine'), text('Piston Filer'));
    expect(result.evidence?.kind).toBe('fuzzy');
    expect(result.evidence?.matched).toBe('piston filler');
    expect(result.evidence?.similarity).toBeCloseTo(12 / 13, 10);
  });

  it('should not fuzzy match values containing digits', () => {
    expect(verifier.verify(field('voltage'), text('490V')).zeroEvidence).toBe(true);
  });

  it('should honour a stricter fuzzy threshold', () => {
    const strict = new EvidenceVerifier(SOURCE, { ...CONFIG, fuzzyThreshold: 0.95 });
    expect(strict.verify(field('machine'), text('Piston Filer')).zeroEvidence).toBe(true);
  });

  it('should pass empty values through without a flag', () => {
    expect(verifier.verify(field('psi'), text(''))).toEqual({
      value: text(''),
      evidenceBacked: false,
      evidence: null,
      zeroEvidence: false,
    });
  });

  it('should search line items', () => {
    expect(verifier.verify(field('capper'), text('Capping station')).evidence?.kind).toBe('exact');
  });

  it('should report numeric offsets in text with thousands separators', () => {
    const document = new EvidenceVerifier({ text: 'Rated 1,200 units per hour output', lineItems: [] }, CONFIG);
    expect(document.verify(field('speed'), text('20 units per minute')).evidence).toEqual({
      kind: 'numeric',
      matched: '1200 units per hour',
      similarity: 1,
    });
  });

  it('should reject a value whose number appears but whose words do not', () => {
    const document = new EvidenceVerifier(
      { text: 'Allen-Bradley controls. Output 1200 bottles per hour.', lineItems: [] },
      CONFIG
    );
    expect(document.verify(field('hopper'), text('Stainless steel hopper 1200 L'))).toEqual({
      value: { type: 'text', value: '' },
      evidenceBacked: false,
      evidence: null,
      zeroEvidence: true,
    });
  });

  it('should accept a value whose number and words both appear', () => {
    const document = new EvidenceVerifier({ text: 'Hopper capacity: 1200 liters, stainless.', lineItems: [] }, CONFIG);
    expect(document.verify(field('hopper'), text('stainless hopper 1200')).evidence).toEqual({
      kind: 'numeric',
      matched: '1200',
      similarity: 1,
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════════
  // BOOLEAN VALUES
  // ═══════════════════════════════════════════════════════════════════════════════

  it('should support YES through the readable field name', () => {
    const result = verifier.verify(booleanField('capping_station'), { type: 'boolean', value: true });
    expect(result.evidence).toEqual({
      kind: 'indicator',
      matched: 'capping station',
      similarity: 1,
      indicators: ['capping station'],
    });
  });

  it('should ignore indicators inside a negative phrase', () => {
    const conveyor = booleanField('conveyor', { negativeIndicators: ['no conveyor'] });
    const result = verifier.verify(conveyor, { type: 'boolean', value: true });
    expect(result.value).toEqual({ type: 'boolean', value: false });
    expect(result.zeroEvidence).toBe(true);
  });

  it('should collect every matching indicator', () => {
    const glass = booleanField('container_glass', { synonyms: ['glass', 'glass bottles'] });
    const result = verifier.verify(glass, { type: 'boolean', value: true });
    expect(result.evidence?.indicators).toEqual(['glass', 'glass bottles']);
  });

  it('should leave NO answers alone', () => {
    const result = verifier.verify(booleanField('labeler'), { type: 'boolean', value: false });
    expect(result.zeroEvidence).toBe(false);
    expect(result.evidenceBacked).toBe(false);
  });
});
