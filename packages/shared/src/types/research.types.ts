export type ReportType = 'research_report' | 'resource_report' | 'outline_report';

export interface ResearchRequest {
  readonly question: string;
}

/**
 * Record carried between the pipeline stages of one invocation.
 * Fields are only ever added, never replaced.
 */
export interface ResearchContext {
  readonly question: string;
  readonly researchSummary?: string;
  readonly searchQueries?: readonly string[];
  readonly sources?: readonly string[];
}

export interface ResearchFindings {
  readonly summary: string;
  readonly queries: readonly string[];
  readonly sourceUrls: readonly string[];
  readonly failedQueries: readonly string[];
}

export interface FinalAnswer {
  readonly text: string;
}

export type PipelineStatus = 'start' | 'researched' | 'done';

export interface PipelineResult {
  readonly answer: FinalAnswer;
  readonly context: ResearchContext;
  readonly status: PipelineStatus;
}
