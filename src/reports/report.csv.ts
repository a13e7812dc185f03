import type { Criterion, RankedReport } from "../shared/types/ranking.types";

const CSV_LINE_END = "\r\n";

export function shortCriterionLabel(criterion: Criterion): string {
  return `${criterion.split(/\s+/).filter(Boolean).slice(0, 3).join(" ")}...`;
}

export function renderReportCsv(criteria: readonly Criterion[], ranked: RankedReport): string {
  const header = ["Candidate Name", ...criteria.map(shortCriterionLabel), "Total Score"];
  const rows = ranked.map((candidate) => [
    candidate.name,
    ...candidate.scores.map(String),
    String(candidate.total),
  ]);
  return [header, ...rows].map((row) => row.map(escapeCsvField).join(",")).join(CSV_LINE_END) + CSV_LINE_END;
}

function escapeCsvField(value: string): string {
  if (!/[",\r\n]/.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, "\"\"")}"`;
}
