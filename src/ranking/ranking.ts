import { HOTSPOT_SEVERITIES } from '../storage/enums.js';
import type { HotspotSeverity } from '../storage/enums.js';

export interface RankingInput {
  /** Coverage percentage; higher is better. */
  coverage: number | null;
  /** Duplicated lines percentage; lower is better. */
  duplication: number | null;
  /** New issue count; lower is better. */
  newIssues: number | null;
  /** Most severe open hotspot; less severe is better. Case-insensitive. */
  worstHotspot: string | null;
}

export type Ranked<T> = T & { rank: number };

type Extractor = (entry: RankingInput) => number | null;

// Severity as a sortable number, ascending = better
const SEVERITY_ORDER: Record<HotspotSeverity, number> = { LOW: 0, MEDIUM: 1, HIGH: 2, CRITICAL: 3 };

export function severityWeight(severity: string | null): number | null {
  if (severity === null) return null;
  const upper = severity.toUpperCase();
  const known = HOTSPOT_SEVERITIES.find((s) => s === upper);
  return known ? SEVERITY_ORDER[known] : null;
}

const KEYS: ReadonlyArray<{ extract: Extractor; direction: 1 | -1 }> = [
  { extract: (e) => e.coverage, direction: -1 },
  { extract: (e) => e.duplication, direction: 1 },
  { extract: (e) => e.newIssues, direction: 1 },
  { extract: (e) => severityWeight(e.worstHotspot), direction: 1 },
];

/**
 * Orders analysis projects best-first: coverage desc, duplication asc, new
 * issues asc, worst hotspot severity asc. A missing value sorts after every
 * present value of the same key. Ties keep input order.
 */
export function rank<T extends RankingInput>(entries: readonly T[]): Ranked<T>[] {
  return entries
    .map((entry, index) => ({ entry, index }))
    .sort((a, b) => compareEntries(a.entry, b.entry) || a.index - b.index)
    .map(({ entry }, position) => ({ ...entry, rank: position + 1 }));
}

function compareEntries(a: RankingInput, b: RankingInput): number {
  for (const { extract, direction } of KEYS) {
    const left = presentNumber(extract(a));
    const right = presentNumber(extract(b));
    if (left === null && right === null) continue;
    if (left === null) return 1;
    if (right === null) return -1;
    if (left !== right) return (left - right) * direction;
  }
  return 0;
}

function presentNumber(value: number | null): number | null {
  return value === null || Number.isNaN(value) ? null : value;
}
