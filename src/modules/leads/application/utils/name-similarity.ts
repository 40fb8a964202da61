import { normalizeKey } from '@/modules/leads/application/utils/normalize';

/**
 * Words dropped before comparing organization names. They describe the kind of
 * institution rather than which one it is ("Riverside Academy" vs "Riverside
 * School").
 */
const ORG_SUFFIX_WORDS = new Set([
  'the',
  'school',
  'schools',
  'academy',
  'academie',
  'preparatory',
  'prep',
  'inc',
  'llc',
]);

/**
 * Comparison form of an organization name: accents removed, case-folded,
 * `&` spelled out, punctuation dropped, suffix words removed, single spaces.
 */
export function normalizeOrgName(name: string | null | undefined): string {
  if (!name) return '';
  return normalizeKey(name)
    .split(' ')
    .filter((word) => word && !ORG_SUFFIX_WORDS.has(word))
    .join(' ');
}

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    previous = current;
  }
  return previous[b.length];
}

/**
 * Normalized edit similarity in [0, 1] between two organization names.
 * Names that are empty after normalization never match anything.
 */
export function nameSimilarity(a: string | null | undefined, b: string | null | undefined): number {
  const left = normalizeOrgName(a);
  const right = normalizeOrgName(b);
  if (!left || !right) return 0;
  if (left === right) return 1;

  return 1 - levenshtein(left, right) / Math.max(left.length, right.length);
}
