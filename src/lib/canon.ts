// Name canonicalization shared by identity resolution and mission-file matching.

// Rank prefixes the generator puts in front of pilot names in some report versions.
const RANK_TOKENS = new Set([
  'lt',
  'ltn',
  'lieut',
  'lieutenant',
  'sgt',
  'sergeant',
  'cpl',
  'capt',
  'captain',
  'maj',
  'major',
  'col',
  'ltcol',
  'fo',
  'po',
  'plt',
  'off',
  'fl',
  'sqn',
  'ldr',
  'uffz',
  'fw',
  'ofw',
  'oblt',
  'hptm',
  'kpt'
]);

export function stripDiacritics(value: string): string {
  return value.normalize('NFKD').replace(/[\u0300-\u036f]/g, '');
}

/** Lowercase alphanumeric tokens of a name or file name. */
export function tokenize(value: string | undefined): string[] {
  if (!value) return [];
  return stripDiacritics(value)
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(Boolean);
}

export function nameTokens(name: string | undefined): string[] {
  return tokenize(name).filter((token) => !RANK_TOKENS.has(token));
}

export function canonicalName(name: string | undefined): string {
  return nameTokens(name).join(' ');
}

function tokenCovered(token: string, candidates: string[]): boolean {
  return candidates.some(
    (candidate) =>
      candidate === token ||
      (token.length === 1 && candidate.startsWith(token)) ||
      (candidate.length === 1 && token.startsWith(candidate))
  );
}

/**
 * Two spellings refer to the same pilot when, after dropping rank prefixes, accents and
 * punctuation, every token of the shorter one appears in the longer one (initials match
 * the names they abbreviate). "Lt. J. Smith" and "John Smith" agree; "Smith" and
 * "Jones" do not.
 */
export function namesMateriallyDiffer(a: string, b: string): boolean {
  const left = nameTokens(a);
  const right = nameTokens(b);
  if (!left.length || !right.length) return false;
  const [shorter, longer] = left.length <= right.length ? [left, right] : [right, left];
  return !shorter.every((token) => tokenCovered(token, longer));
}

function completeness(name: string): [number, number] {
  const tokens = nameTokens(name);
  return [tokens.length, tokens.join('').length];
}

/**
 * Prefers the most complete spelling: more name tokens first, then longer ones, so
 * "John Smith" beats "J. Smith". Ties keep the earlier one.
 */
export function preferredName(names: readonly string[]): string | undefined {
  let best: string | undefined;
  let bestScore: [number, number] = [0, 0];
  for (const name of names) {
    const score = completeness(name);
    if (best === undefined || score[0] > bestScore[0] || (score[0] === bestScore[0] && score[1] > bestScore[1])) {
      best = name;
      bestScore = score;
    }
  }
  return best;
}

/**
 * Serial ordering: numeric when both serials are digit strings, lexicographic
 * otherwise, with digit strings first.
 */
export function compareSerials(a: string, b: string): number {
  const aNumeric = /^\d+$/.test(a);
  const bNumeric = /^\d+$/.test(b);
  if (aNumeric && bNumeric) {
    const left = a.replace(/^0+(?=\d)/, '');
    const right = b.replace(/^0+(?=\d)/, '');
    if (left.length !== right.length) return left.length - right.length;
    if (left !== right) return left < right ? -1 : 1;
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (aNumeric) return -1;
  if (bNumeric) return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}
