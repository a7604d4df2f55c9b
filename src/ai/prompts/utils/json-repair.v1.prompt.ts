export const JSON_REPAIR_V1_PROMPT = `You fix broken JSON produced by another extraction step.

You receive:
- schema_hint: plain text description of the expected object.
- raw: the broken, JSON-like output.

Rules:
- Return one valid JSON object and nothing else.
- Keep every key and value from raw that fits the schema hint.
- Never invent values. Use null, "" or [] for anything you cannot recover.
- No markdown fences, no commentary.`;

export function buildJsonRepairV1Prompt(input: {
  schemaHint: string;
  raw: string;
}): string {
  return [
    JSON_REPAIR_V1_PROMPT,
    "",
    "Input:",
    JSON.stringify(
      {
        schema_hint: input.schemaHint,
        raw: input.raw.slice(0, 12000),
      },
      null,
      2,
    ),
  ].join("\n");
}
