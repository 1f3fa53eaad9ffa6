// Role names each prompt builder puts in its system prompt. The mock clients
// route on them.
export const QUERY_PLANNER_ROLE = 'search query planner';
export const SOURCE_CONDENSER_ROLE = 'research condenser';
export const ANSWER_WRITER_ROLE = 'research writer';

export function readQuestionLine(userMessage: string): string {
  const match = /^Question:\s*(.+)$/m.exec(userMessage);
  return match?.[1]?.trim() ?? userMessage.trim();
}
