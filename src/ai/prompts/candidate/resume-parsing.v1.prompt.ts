export const RESUME_PARSING_V1_PROMPT = `You extract candidate information from resume text.

Return STRICT JSON only.
No markdown.
No commentary.

Input:
- raw resume text

Output JSON:
{
  "name": "string",
  "email": "string",
  "phone": "string",
  "company": "string",
  "designation": "string",
  "skills": ["string"],
  "experience_years": number,
  "confidence_scores": {
    "name": number,
    "email": number,
    "phone": number,
    "company": number,
    "designation": number,
    "skills": number,
    "experience_years": number
  }
}

Rules:
- name is the candidate's full name.
- phone keeps the country code when the resume shows one.
- company and designation describe the current or most recent position.
- skills lists technical skills only.
- experience_years is the total years of professional experience as an integer.
- Use "" (or [] for skills, 0 for experience_years) when the resume does not state a value.
- Every confidence score is between 0 and 1. Use 0 for empty fields.
- Use only explicit evidence from the resume text.
`;

export const RESUME_PARSING_SCHEMA_HINT =
  "Candidate JSON with name, email, phone, company, designation (strings), skills (string array), experience_years (integer), confidence_scores (object of numbers between 0 and 1 keyed by the same field names).";

export function buildResumeParsingV1Prompt(input: { resumeText: string }): string {
  return [
    RESUME_PARSING_V1_PROMPT,
    "",
    "Resume text:",
    "---",
    input.resumeText.slice(0, 16000),
    "---",
  ].join("\n");
}
