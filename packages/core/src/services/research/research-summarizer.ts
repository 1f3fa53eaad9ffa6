import pLimit from 'p-limit';
import { createChildLogger } from '@scholar/shared/src/logger.js';
import { LlmError } from '@scholar/shared/src/utils/errors.js';
import { withTimeout } from '@scholar/shared/src/utils/timeout.js';
import type { ResearchFindings } from '@scholar/shared/src/types/research.types.js';
import { planSearchQueries } from './query-planner.js';
import { condenseSearchResult } from './source-condenser.js';
import type { WebSearchResult } from '../web-search/types.js';
import type {
  QueryFinding,
  ResearchStageConfig,
  ResearchStageDeps,
  WebResearchStage,
} from './types.js';

const log = createChildLogger('research:summarizer');

const EMPTY_RESEARCH_SUMMARY = '';

const SECTION_SEPARATOR = '\n\n';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function formatFinding(finding: QueryFinding): string {
  const sources =
    finding.sourceUrls.length > 0 ? `\nSources: ${finding.sourceUrls.join(', ')}` : '';
  return `Query: ${finding.query}${sources}\nSummary: ${finding.summary}`;
}

/**
 * Keeps whole sections while their joined length fits in `maxChars`. A first
 * section that is already too long is cut at the limit.
 */
export function fitSections(sections: readonly string[], maxChars: number): string[] {
  const kept: string[] = [];
  let length = 0;

  for (const section of sections) {
    const next = kept.length === 0 ? section.length : length + SECTION_SEPARATOR.length + section.length;
    if (next > maxChars) {
      if (kept.length === 0) {
        kept.push(section.slice(0, maxChars));
      }
      break;
    }
    kept.push(section);
    length = next;
  }

  return kept;
}

export function createResearchSummarizer(
  deps: ResearchStageDeps,
  config: ResearchStageConfig,
): WebResearchStage {
  const { llmClient, textLlmClient, webSearchClient } = deps;

  async function planQueries(question: string): Promise<string[]> {
    try {
      return await withTimeout(
        planSearchQueries(question, llmClient, config.maxQueries),
        config.requestTimeoutMs,
        'Query planning',
      );
    } catch (error) {
      if (error instanceof LlmError) {
        throw error;
      }
      log.warn({ error: errorMessage(error) }, 'Query planning failed, searching the question directly');
      return [question];
    }
  }

  async function searchQuery(question: string, query: string): Promise<WebSearchResult | undefined> {
    try {
      const result = await withTimeout(
        webSearchClient.search(query, `Researching the question: "${question}"`),
        config.requestTimeoutMs,
        `Web search for "${query}"`,
      );

      if (!result.content.trim()) {
        log.warn({ query }, 'Web search returned no content, dropping query');
        return undefined;
      }
      return result;
    } catch (error) {
      log.warn({ query, error: errorMessage(error) }, 'Web search failed, dropping query');
      return undefined;
    }
  }

  async function researchQuery(question: string, query: string): Promise<QueryFinding | undefined> {
    const result = await searchQuery(question, query);
    if (!result) {
      return undefined;
    }

    try {
      const summary = await withTimeout(
        condenseSearchResult(question, result, textLlmClient, config.maxSourceChars),
        config.requestTimeoutMs,
        `Condensing results for "${query}"`,
      );

      return { query, summary, sourceUrls: result.sourceUrls };
    } catch (error) {
      // Provider failures end the run; unusable output only drops this query.
      if (error instanceof LlmError) {
        throw error;
      }
      log.warn({ query, error: errorMessage(error) }, 'Condensing failed, dropping query');
      return undefined;
    }
  }

  async function gatherFindings(rawQuestion: string): Promise<ResearchFindings> {
    const question = rawQuestion.trim();
    if (!question) {
      log.info('Empty question, skipping web research');
      return { summary: EMPTY_RESEARCH_SUMMARY, queries: [], sourceUrls: [], failedQueries: [] };
    }

    const queries = await planQueries(question);
    const limit = pLimit(config.concurrency);

    log.info({ queryCount: queries.length, concurrency: config.concurrency }, 'Starting web research');

    const outcomes = await Promise.all(
      queries.map((query) => limit(() => researchQuery(question, query))),
    );

    const findings: QueryFinding[] = [];
    const failedQueries: string[] = [];
    queries.forEach((query, index) => {
      const outcome = outcomes[index];
      if (outcome) {
        findings.push(outcome);
      } else {
        failedQueries.push(query);
      }
    });

    const sections = fitSections(findings.map(formatFinding), config.maxSummaryChars);
    const summary = sections.join(SECTION_SEPARATOR);
    const sourceUrls = [
      ...new Set(findings.slice(0, sections.length).flatMap((f) => f.sourceUrls)),
    ];

    if (findings.length === 0) {
      log.warn({ queryCount: queries.length }, 'No search query produced results');
    } else {
      log.info(
        {
          succeeded: findings.length,
          failed: failedQueries.length,
          summaryLength: summary.length,
          sourceCount: sourceUrls.length,
        },
        'Web research complete',
      );
    }

    return { summary, queries, sourceUrls, failedQueries };
  }

  return {
    gatherFindings,
    async summarizeResearch(question: string): Promise<string> {
      const findings = await gatherFindings(question);
      return findings.summary;
    },
  };
}
