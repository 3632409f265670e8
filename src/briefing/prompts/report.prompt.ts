export interface ReportPromptEntry {
  kind: 'article' | 'stat';
  title: string;
  sourceName: string;
  timestamp: string;
  body: string;
}

export const REPORT_INSTRUCTIONS = `You are a sports desk editor writing the daily briefing.

Use ONLY the numbered entries below. Do not add facts, scores or names that
are not in them.
Start with the most important results, then transfers and injuries, then
anything else worth knowing.
Group by sport or competition where it helps the reader.
Refer to entries by their number in square brackets, e.g. [3].
Keep it under 400 words. Plain text, short paragraphs, no JSON.`;

export function buildReportPrompt(
  date: string,
  language: string,
  entries: ReportPromptEntry[],
): string {
  const lines = entries.map((entry, index) => {
    const label = entry.kind === 'stat' ? 'STAT' : 'ARTICLE';
    return [
      `[${index + 1}] ${label} | ${entry.sourceName} | ${entry.timestamp}`,
      `Title: ${entry.title}`,
      entry.body,
    ].join('\n');
  });

  return [
    REPORT_INSTRUCTIONS,
    `Date: ${date}`,
    `Language: ${language}`,
    '',
    'Entries:',
    lines.join('\n\n'),
  ].join('\n');
}
