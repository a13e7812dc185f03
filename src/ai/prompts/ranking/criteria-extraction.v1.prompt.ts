export const CRITERIA_EXTRACTION_V1_SYSTEM_PROMPT = [
  "You are an expert HR system that analyzes job descriptions and extracts key ranking criteria.",
  "Extract specific criteria related to:",
  "1. Required skills",
  "2. Experience (years, specific domains)",
  "3. Education requirements",
  "4. Certifications",
  "5. Technical knowledge",
  "6. Soft skills",
  "",
  "Format each criterion as a clear, standalone requirement. Do not include vague statements.",
  "Return only the list of criteria, with each item being a specific, measurable requirement.",
].join("\n");

export function buildCriteriaExtractionV1Prompt(input: { jobDescription: string }): string {
  return [
    "Extract the key ranking criteria from the following job description:",
    "",
    input.jobDescription,
    "",
    "Return ONLY a list of specific criteria, with each item as a clear, standalone requirement.",
  ].join("\n");
}
