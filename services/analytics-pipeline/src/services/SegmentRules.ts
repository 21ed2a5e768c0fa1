import { RfmScores, ScoreBounds, SegmentName, SegmentRule } from '../types';

/**
 * RFM segment decision table. Evaluated top to bottom, first match wins;
 * a buyer matching no rule falls into FALLBACK_SEGMENT.
 */
export const SEGMENT_RULES: readonly SegmentRule[] = [
  { label: 'Champions', r: { min: 4 }, f: { min: 4 } },
  { label: 'Loyal Customers', r: { min: 3 }, f: { min: 3 } },
  { label: 'New Customers', r: { min: 4 }, f: { min: 1, max: 1 } },
  { label: 'Promising', r: { min: 3 }, f: { min: 1, max: 1 } },
  { label: 'Need Attention', r: { min: 2, max: 2 }, f: { min: 2 } },
  { label: 'Cant Lose Them', r: { min: 1, max: 1 }, f: { min: 4 } },
  { label: 'Hibernating', r: { min: 1, max: 1 }, f: { max: 2 } },
];

export const FALLBACK_SEGMENT: SegmentName = 'At Risk';

export const SEGMENT_NAMES: readonly SegmentName[] = [...SEGMENT_RULES.map((rule) => rule.label), FALLBACK_SEGMENT];

function withinBounds(value: number, bounds: ScoreBounds): boolean {
  if (bounds.min !== undefined && value < bounds.min) return false;
  if (bounds.max !== undefined && value > bounds.max) return false;
  return true;
}

export function assignSegment(scores: RfmScores, rules: readonly SegmentRule[] = SEGMENT_RULES): SegmentName {
  const match = rules.find((rule) => withinBounds(scores.r, rule.r) && withinBounds(scores.f, rule.f));
  return match ? match.label : FALLBACK_SEGMENT;
}

function boundsPredicate(column: string, bounds: ScoreBounds): string[] {
  if (bounds.min !== undefined && bounds.min === bounds.max) {
    return [`${column} = ${bounds.min}`];
  }
  const parts: string[] = [];
  if (bounds.min !== undefined) parts.push(`${column} >= ${bounds.min}`);
  if (bounds.max !== undefined) parts.push(`${column} <= ${bounds.max}`);
  return parts;
}

function rulePredicate(rule: SegmentRule, rColumn: string, fColumn: string): string {
  const parts = [...boundsPredicate(rColumn, rule.r), ...boundsPredicate(fColumn, rule.f)];
  return parts.length > 0 ? parts.join(' AND ') : 'TRUE';
}

function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Renders the decision table as a SQL CASE expression over the given score columns.
 */
export function segmentCaseExpression(
  rColumn: string = 'r_score',
  fColumn: string = 'f_score',
  rules: readonly SegmentRule[] = SEGMENT_RULES
): string {
  const branches = rules.map((rule) => `WHEN ${rulePredicate(rule, rColumn, fColumn)} THEN ${quoteLiteral(rule.label)}`);
  return ['CASE', ...branches, `ELSE ${quoteLiteral(FALLBACK_SEGMENT)}`, 'END'].join('\n  ');
}
