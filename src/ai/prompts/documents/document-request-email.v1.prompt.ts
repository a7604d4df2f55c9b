export const DOCUMENT_REQUEST_EMAIL_V1_PROMPT = `You write an email asking a candidate to submit identity documents.

Return STRICT JSON only.
No markdown.
No commentary.

Input:
- candidate name
- upload link
- deadline

Output JSON:
{
  "subject": "string",
  "body": "string"
}

Rules:
- Request exactly two documents: PAN Card and Aadhaar Card.
- Accepted formats are JPG, PNG and PDF.
- Include the upload link exactly as given, on its own line.
- Mention the deadline exactly as given.
- Plain text body, short paragraphs, no placeholders like [Your Name].
- Sign off as "Candidate Verification Team".
- Subject under 80 characters.
`;

export const DOCUMENT_REQUEST_EMAIL_SCHEMA_HINT =
  "Email JSON with subject (string) and body (plain text string).";

export function buildDocumentRequestEmailV1Prompt(input: {
  candidateName: string;
  uploadLink: string;
  deadline: string;
}): string {
  return [
    DOCUMENT_REQUEST_EMAIL_V1_PROMPT,
    "",
    "Input JSON:",
    JSON.stringify(
      {
        candidate_name: input.candidateName,
        upload_link: input.uploadLink,
        deadline: input.deadline,
      },
      null,
      2,
    ),
  ].join("\n");
}
