export const MIN_SCORE = 0;
export const MAX_SCORE = 5;

/**
 * How the scores were read.
 * - `line_exact`, `keyed`, `ordinal`: every line score came from that one rule.
 * - `mixed`: line scores came from more than one rule.
 * - `fallback`: the line pass did not yield exactly one score per criterion, so every
 *   standalone digit 0-5 in the text was taken instead.
 * - `empty`: no criteria, nothing to parse.
 */
export type ScoreParseTier = "line_exact" | "keyed" | "ordinal" | "mixed" | "fallback" | "empty";

export interface ScoreParseResult {
  scores: number[];
  tier: ScoreParseTier;
  /** Scores found before padding or truncation. */
  parsedCount: number;
}

type LineRuleName = "line_exact" | "keyed" | "ordinal";

/**
 * `claimed` means the rule's shape matched the line; later rules are then not tried,
 * even when the claimed value is out of range and yields no score.
 */
type LineVerdict = { claimed: false } | { claimed: true; score: number | null };

interface LineRule {
  name: LineRuleName;
  match: (line: string) => LineVerdict;
}

const DIGITS = /^\d+$/;
const STANDALONE_SCORE = /(?<![\p{L}\p{N}_])[0-5](?![\p{L}\p{N}_])/gu;
const UNCLAIMED: LineVerdict = { claimed: false };

const LINE_RULES: readonly LineRule[] = [
  {
    name: "line_exact",
    match: (line) => {
      const score = toScore(line);
      return score === null ? UNCLAIMED : { claimed: true, score };
    },
  },
  {
    name: "keyed",
    match: (line) => matchAfterSeparator(line, ": "),
  },
  {
    name: "ordinal",
    match: (line) => {
      const separator = line.includes(". ") ? ". " : line.includes(") ") ? ") " : null;
      return separator ? matchAfterSeparator(line, separator) : UNCLAIMED;
    },
  },
];

/**
 * Parses a free-text scoring answer into exactly `expectedCount` integers in [0,5].
 * Each line is tried against the line rules in order and the first rule that claims it
 * decides that line. When the lines yield anything other than `expectedCount` scores,
 * every standalone digit 0-5 is taken instead. Missing scores become 0, extra ones are
 * dropped.
 */
export function parseScores(raw: string, expectedCount: number): ScoreParseResult {
  if (expectedCount <= 0) {
    return { scores: [], tier: "empty", parsedCount: 0 };
  }

  const { scores, rules } = collectLineScores(raw);
  if (scores.length === expectedCount) {
    const [onlyRule] = rules;
    const tier: ScoreParseTier = rules.size === 1 && onlyRule ? onlyRule : "mixed";
    return { scores, tier, parsedCount: scores.length };
  }

  const fallback = extractStandaloneScores(raw);
  return {
    scores: fitToLength(fallback, expectedCount),
    tier: "fallback",
    parsedCount: fallback.length,
  };
}

/** Digits 0-5 not adjacent to a letter, digit or underscore, in order of appearance. */
export function extractStandaloneScores(text: string): number[] {
  return (text.match(STANDALONE_SCORE) ?? []).map(Number);
}

export function fitToLength(scores: readonly number[], length: number): number[] {
  const fitted = scores.slice(0, length);
  while (fitted.length < length) {
    fitted.push(MIN_SCORE);
  }
  return fitted;
}

function collectLineScores(raw: string): { scores: number[]; rules: Set<LineRuleName> } {
  const scores: number[] = [];
  const rules = new Set<LineRuleName>();
  for (const line of raw.split("\n").map((item) => item.trim())) {
    for (const rule of LINE_RULES) {
      const verdict = rule.match(line);
      if (!verdict.claimed) {
        continue;
      }
      if (verdict.score !== null) {
        scores.push(verdict.score);
        rules.add(rule.name);
      }
      break;
    }
  }
  return { scores, rules };
}

function matchAfterSeparator(line: string, separator: string): LineVerdict {
  if (!line.includes(separator)) {
    return UNCLAIMED;
  }
  const segment = (line.split(separator)[1] ?? "").trim();
  if (!DIGITS.test(segment)) {
    return UNCLAIMED;
  }
  return { claimed: true, score: toScore(segment) };
}

function toScore(segment: string): number | null {
  if (!DIGITS.test(segment)) {
    return null;
  }
  const score = Number.parseInt(segment, 10);
  return score >= MIN_SCORE && score <= MAX_SCORE ? score : null;
}
