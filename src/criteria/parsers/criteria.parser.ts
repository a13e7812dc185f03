import type { Criterion } from "../../shared/types/ranking.types";

const BULLET_MARKERS = ["- ", "• ", "* ", "· "];
const NUMBERED_MARKER = /^(?:10|[1-9])\. /;

/**
 * Splits raw model output into criteria, one per non-empty line, in encounter order.
 * Repeated lines are kept.
 */
export function parseCriteria(raw: string): Criterion[] {
  const criteria: Criterion[] = [];
  for (const line of raw.split("\n")) {
    const cleaned = stripListMarker(line.trim());
    if (!cleaned || cleaned.startsWith("#")) {
      continue;
    }
    criteria.push(cleaned);
  }
  return criteria;
}

export function stripListMarker(line: string): string {
  if (BULLET_MARKERS.some((marker) => line.startsWith(marker))) {
    return line.slice(2).trim();
  }
  const numbered = NUMBERED_MARKER.exec(line);
  if (numbered) {
    return line.slice(numbered[0].length).trim();
  }
  return line;
}
