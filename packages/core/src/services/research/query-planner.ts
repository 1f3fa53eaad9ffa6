import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { createChildLogger } from '@scholar/shared/src/logger.js';
import type { LlmClient } from '../../llm/llm-client.js';
import { invokeAndValidate } from '../../llm/invoke-and-validate.js';
import { QUERY_PLANNER_ROLE } from '../../llm/prompt-markers.js';

const log = createChildLogger('research:query-planner');

const QueryPlanSchema = z.object({
  queries: z.array(z.string()).max(10),
});

const QueryPlanJsonSchema = zodToJsonSchema(QueryPlanSchema, { $refStrategy: 'none' });

/** Trims, drops blanks and case-insensitive duplicates, then caps the list. */
export function normalizeQueries(queries: readonly string[], maxQueries: number): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const raw of queries) {
    const query = raw.trim();
    const key = query.toLowerCase();
    if (!query || seen.has(key)) continue;
    seen.add(key);
    result.push(query);
  }

  return result.slice(0, maxQueries);
}

export async function planSearchQueries(
  question: string,
  llmClient: LlmClient,
  maxQueries: number,
): Promise<string[]> {
  log.info({ maxQueries }, 'Planning search queries');

  const result = await invokeAndValidate({
    llmClient,
    request: {
      systemPrompt: `You are a ${QUERY_PLANNER_ROLE}. Write web search queries that together let a researcher form an objective, well-sourced answer to the user's question.

Rules:
- At most ${String(maxQueries)} queries
- Each query covers a different angle of the question (definitions, data, comparisons, expert views)
- Queries are short keyword phrases, not full sentences
- Never include instructions, only search terms

Respond with a JSON object: { "queries": ["query 1", "query 2"] }`,
      userMessage: `Question: ${question}\nMaximum queries: ${String(maxQueries)}`,
      jsonSchema: QueryPlanJsonSchema as Record<string, unknown>,
    },
    schema: QueryPlanSchema,
    agentName: 'Query planner',
  });

  const queries = normalizeQueries(result.queries, maxQueries);

  log.info({ queryCount: queries.length }, 'Search queries planned');

  return queries.length > 0 ? queries : [question];
}
