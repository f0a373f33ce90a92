/**
 * Units of measure and quantity parsing
 *
 * Shared by the evidence verifier (numeric/unit equivalence) and the
 * post-processing unit normalization. Conversions are linear: a quantity in
 * base units is `value * factor`.
 *
 * @module services/extraction/units
 */

export type Dimension =
  | 'pressure'
  | 'voltage'
  | 'length'
  | 'frequency'
  | 'airflow'
  | 'power'
  | 'current'
  | 'rate'
  | 'temperature'
  | 'percent';

export interface UnitDefinition {
  /** Canonical spelling */
  symbol: string;
  dimension: Dimension;
  factor: number;
  /** Text placed between the number and the symbol */
  separator: '' | ' ';
  /** Lower-case spellings recognised after a number */
  aliases: string[];
}

export const UNITS: readonly UnitDefinition[] = [
  { symbol: 'PSI', dimension: 'pressure', factor: 1, separator: ' ', aliases: ['psi', 'psig', 'psia', 'lb/in2'] },
  { symbol: 'bar', dimension: 'pressure', factor: 14.5038, separator: ' ', aliases: ['bar', 'bars'] },
  { symbol: 'kPa', dimension: 'pressure', factor: 0.145038, separator: ' ', aliases: ['kpa'] },
  { symbol: 'MPa', dimension: 'pressure', factor: 145.038, separator: ' ', aliases: ['mpa'] },
  { symbol: 'V', dimension: 'voltage', factor: 1, separator: '', aliases: ['v', 'vac', 'vdc', 'volt', 'volts'] },
  { symbol: 'kV', dimension: 'voltage', factor: 1000, separator: '', aliases: ['kv'] },
  { symbol: 'mm', dimension: 'length', factor: 1, separator: ' ', aliases: ['mm', 'millimeter', 'millimeters'] },
  { symbol: 'cm', dimension: 'length', factor: 10, separator: ' ', aliases: ['cm', 'centimeter', 'centimeters'] },
  { symbol: 'm', dimension: 'length', factor: 1000, separator: ' ', aliases: ['m', 'meter', 'meters', 'metre', 'metres'] },
  { symbol: 'in', dimension: 'length', factor: 25.4, separator: ' ', aliases: ['inch', 'inches', '"'] },
  { symbol: 'ft', dimension: 'length', factor: 304.8, separator: ' ', aliases: ['ft', 'feet', 'foot'] },
  { symbol: 'Hz', dimension: 'frequency', factor: 1, separator: ' ', aliases: ['hz', 'hertz'] },
  { symbol: 'kHz', dimension: 'frequency', factor: 1000, separator: ' ', aliases: ['khz'] },
  { symbol: 'CFM', dimension: 'airflow', factor: 1, separator: ' ', aliases: ['cfm'] },
  { symbol: 'm3/h', dimension: 'airflow', factor: 0.588578, separator: ' ', aliases: ['m3/h', 'm³/h', 'm3/hr'] },
  { symbol: 'kW', dimension: 'power', factor: 1, separator: ' ', aliases: ['kw'] },
  { symbol: 'W', dimension: 'power', factor: 0.001, separator: ' ', aliases: ['w', 'watt', 'watts'] },
  { symbol: 'HP', dimension: 'power', factor: 0.7457, separator: ' ', aliases: ['hp', 'horsepower'] },
  { symbol: 'A', dimension: 'current', factor: 1, separator: '', aliases: ['a', 'amp', 'amps', 'ampere', 'amperes'] },
  {
    symbol: 'units per minute',
    dimension: 'rate',
    factor: 1,
    separator: ' ',
    aliases: ['units per minute', 'units/min', 'units/minute', 'upm', 'per minute', '/min', 'ppm', 'bottles per minute', 'bpm'],
  },
  {
    symbol: 'units per hour',
    dimension: 'rate',
    factor: 1 / 60,
    separator: ' ',
    aliases: ['units per hour', 'units/hour', 'units/hr', 'units/h', 'uph', 'per hour', '/hr', '/h'],
  },
  { symbol: '°C', dimension: 'temperature', factor: 1, separator: '', aliases: ['°c', 'degc', 'deg c', 'celsius'] },
  { symbol: '%', dimension: 'percent', factor: 1, separator: '', aliases: ['%', 'percent'] },
];

interface AliasEntry {
  alias: string;
  unit: UnitDefinition;
}

/** Longest first so "mm" wins over "m" and "units per minute" over "per minute" */
const ALIASES: AliasEntry[] = UNITS.flatMap((unit) => unit.aliases.map((alias) => ({ alias, unit }))).sort(
  (a, b) => b.alias.length - a.alias.length
);

export interface Quantity {
  /** Numbers as written, e.g. ["460", "480"] for a range */
  numbers: string[];
  unit: UnitDefinition | null;
  start: number;
  end: number;
}

const NUMBER_PATTERN = /(\d+(?:\.\d+)?)(?:\s*(?:-|–|to)\s*(\d+(?:\.\d+)?))?/g;

/**
 * Resolve a unit spelling ("psi", "Volts", "V") to its definition.
 */
export function findUnit(spelling: string): UnitDefinition | null {
  const lower = spelling.trim().toLowerCase().replace(/\s+/g, ' ');
  for (const unit of UNITS) {
    if (unit.symbol.toLowerCase() === lower || unit.aliases.includes(lower)) return unit;
  }
  return null;
}

/**
 * Remove thousands separators ("1,200" -> "1200").
 */
export function stripThousands(text: string): string {
  return text.replace(/(\d),(?=\d{3}(?!\d))/g, '$1');
}

/**
 * Find every number or numeric range in `text` together with the unit that
 * directly follows it, if any.
 */
export function parseQuantities(text: string): Quantity[] {
  const source = stripThousands(text);
  const quantities: Quantity[] = [];
  for (const match of source.matchAll(NUMBER_PATTERN)) {
    const start = match.index ?? 0;
    const numbers = match[2] !== undefined ? [match[1], match[2]] : [match[1]];
    const afterNumber = start + match[0].length;
    const unitMatch = matchUnitAt(source, afterNumber);
    quantities.push({
      numbers,
      unit: unitMatch?.unit ?? null,
      start,
      end: unitMatch ? unitMatch.end : afterNumber,
    });
  }
  return quantities;
}

/**
 * Parse `text` as exactly one quantity (surrounding whitespace allowed).
 */
export function parseSingleQuantity(text: string): Quantity | null {
  const trimmed = stripThousands(text.trim());
  const quantities = parseQuantities(trimmed);
  if (quantities.length !== 1) return null;
  const [quantity] = quantities;
  return quantity.start === 0 && quantity.end === trimmed.length ? quantity : null;
}

export function toBase(value: number, unit: UnitDefinition): number {
  return value * unit.factor;
}

export function quantitiesEqual(a: number, b: number, tolerance: number): boolean {
  if (a === b) return true;
  return Math.abs(a - b) <= tolerance * Math.max(Math.abs(a), Math.abs(b));
}

export function formatQuantity(numbers: string[], unit: UnitDefinition): string {
  return `${numbers.join('-')}${unit.separator}${unit.symbol}`;
}

function matchUnitAt(text: string, index: number): { unit: UnitDefinition; end: number } | null {
  const rest = text.slice(index, index + 24);
  const leading = /^\s?/.exec(rest)?.[0].length ?? 0;
  const candidate = rest.slice(leading).toLowerCase();
  for (const { alias, unit } of ALIASES) {
    if (!candidate.startsWith(alias)) continue;
    const next = candidate.charAt(alias.length);
    if (/[a-z]/.test(alias.charAt(alias.length - 1)) && /[\p{L}\p{N}]/u.test(next)) continue;
    return { unit, end: index + leading + alias.length };
  }
  return null;
}
