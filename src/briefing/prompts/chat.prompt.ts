import type { ChatTurn, SubjectStats } from '../types/briefing.types';

export interface ChatContextEntry {
  title: string;
  sourceName: string;
  timestamp: string;
  body: string;
}

export function buildChatPrompt(
  question: string,
  context: ChatContextEntry[],
  history: readonly ChatTurn[],
): string {
  const contextText = context
    .map(
      (entry, index) =>
        `[${index + 1}] ${entry.title} (${entry.sourceName}, ${entry.timestamp})\n${entry.body}`,
    )
    .join('\n\n');

  const historyText = history.length
    ? history
        .map((turn) => `${turn.role === 'user' ? 'User' : 'Assistant'}: ${turn.content}`)
        .join('\n')
    : '(none)';

  return `You answer questions about recent sports news and stats.
Answer ONLY from the context entries below and cite them as [n].
If the context does not contain the answer, say that you do not know.

Context:
${contextText}

Conversation so far:
${historyText}

Question: ${question}`;
}

/** Stat lookup results as a context entry body. */
export function formatSubjectStats(stats: SubjectStats): string {
  const averages = stats.averages
    .map(
      (item) =>
        `${item.metric} ${item.average} over ${item.games} ${item.games === 1 ? 'game' : 'games'}`,
    )
    .join('; ');
  const games = stats.recentGames.map((game) => {
    const competition = game.competition ? ` (${game.competition})` : '';
    const values = game.values
      .map((item) => `${item.metric} ${item.rawValue ?? item.value}`)
      .join(', ');
    return `${game.date}${competition}: ${values}`;
  });
  return `Averages: ${averages}\nRecent games:\n${games.join('\n')}`;
}

export function buildQueryRefinePrompt(question: string): string {
  return `Rewrite the question below as a short search query for an archive of sports news and stats.
Keep team names, player names, competitions and dates. Drop filler words.
Return only the query on one line, without quotes or explanations.

Question: ${question}`;
}
