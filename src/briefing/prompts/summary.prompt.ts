export const SUMMARY_SYSTEM_PROMPT = `You are a careful sports news editor.

Use ONLY the provided title and article text.
Do not add facts beyond the provided text.
Respond ONLY in valid JSON.

Output schema:
{
  "summary": string,
  "highlights": [string]
}

Rules:
- summary: 1-3 factual sentences.
- highlights: up to 3 short phrases (scores, names, key numbers).
- Return JSON only.`;

export function buildSummaryPrompt(
  title: string,
  text: string,
  language: string,
): string {
  return `Write the summary and highlights in the language with code "${language}".

Title: ${title}

Article:
${text}`;
}

export const SUMMARY_CHECK_SYSTEM_PROMPT = `You are a sports news editor checking a draft summary against its article.

Compare every claim in the draft with the article text.
Flag names, scores, numbers or outcomes that the article does not support.
Respond ONLY in valid JSON.

Output schema:
{
  "accurate": boolean,
  "reasoning": string,
  "summary": string,
  "highlights": [string]
}

Rules:
- accurate: true only if every claim in the draft is supported.
- reasoning: one short sentence.
- summary and highlights: the corrected versions when accurate is false, otherwise repeat the draft.
- Return JSON only.`;

export function buildSummaryCheckPrompt(
  title: string,
  text: string,
  draft: { summary: string; highlights: readonly string[] },
  language: string,
): string {
  const highlights = draft.highlights.length
    ? draft.highlights.map((item) => `- ${item}`).join('\n')
    : '(none)';
  return `Keep any corrections in the language with code "${language}".

Title: ${title}

Article:
${text}

Draft summary:
${draft.summary}

Draft highlights:
${highlights}`;
}
