/**
 * Prompt templates for LLM-backed biography extraction.
 *
 * Shared by the batch pipeline and the CLI; edit here rather than inlining
 * prompt text elsewhere.
 */

export const EXTRACTION_SYSTEM_PROMPT = `You are an information extraction system.
You will be given a single biography as raw text.
Return ONLY a JSON object with the fields listed by the user.
If a field is missing in the text, return null (or [] for list fields).
Do not infer facts that are not present in the text.`;

export const EXTRACTION_INSTRUCTIONS = `Extract the following from the input and answer with one JSON object:

- "name": the person's full name if present in the text header, otherwise null
- "degrees": list of degree strings like "Engineer-Physicist (Moscow Institute of Electronic Technology, 1989)"
- "education": array of objects { "institution": string|null, "year": integer|null, "qualification": string|null }
- "occupations": list of roles or occupations, e.g. "Cosmonaut", "Lieutenant Colonel"
- "time_in_space": free text as stated, e.g. "124 days 23 hours 52 minutes", or null
- "interests": list of hobbies exactly as mentioned, e.g. "tourism", "water skiing", "balloon flights"
- "nationality": nationality exactly as stated on a "Nationality:" line, or null
- "age": integer age ONLY if explicitly written as a number, e.g. "(age 59)"; otherwise null

Do not add any other fields.`;

/**
 * Chat messages for one biography
 */
export function buildExtractionMessages(
  biography: string
): Array<{ role: 'system' | 'user'; content: string }> {
  return [
    { role: 'system', content: EXTRACTION_SYSTEM_PROMPT },
    { role: 'user', content: EXTRACTION_INSTRUCTIONS },
    { role: 'user', content: biography },
  ];
}
