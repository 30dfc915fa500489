import { DISCIPLINES, POSITION_TYPES } from '../classify/taxonomy.js';

export const IS_JOB_PROMPT =
  'Is this a real PhD or academic job posting? ' +
  'A real posting advertises an actual open position with application details. ' +
  'Exclude jokes, complaints about job hunting, news about academia, ' +
  'personal announcements (such as someone accepting a position) and general discussion. ' +
  'Answer only YES or NO.';

export function buildMetadataPrompt(): string {
  return `Extract metadata from this academic job posting.

Disciplines (pick 1 to 3): ${DISCIPLINES.join(', ')}.
Use "General call" for institution-wide calls that are not tied to a field.
Position types (pick all that apply): ${POSITION_TYPES.join(', ')}.
Country: the country of the hiring institution, or "Unknown".

Respond with ONLY a JSON object:
{"disciplines": ["..."], "country": "...", "position_type": ["..."]}`;
}

export const DUPLICATE_CHECK_PROMPT = `You are checking whether two academic job postings refer to the SAME position.

Two posts are duplicates if they advertise the same job at the same institution, even if worded differently.
Two posts are NOT duplicates if they are at different institutions, different departments, or different roles.

Respond with ONLY a JSON object:
{"duplicate": true/false, "confidence": 0.0-1.0, "reason": "brief explanation"}`;

export function buildDuplicateCheckInput(textA: string, textB: string): string {
  return `=== POST A ===\n${textA}\n\n=== POST B ===\n${textB}\n`;
}
