import { Annotation } from '@langchain/langgraph';
import type { FinalAnswer, PipelineStatus } from '@scholar/shared/src/types/research.types.js';
import { AgentError } from '@scholar/shared/src/utils/errors.js';

const PIPELINE_STATUSES: readonly PipelineStatus[] = ['start', 'researched', 'done'];

/** Reducer for context fields that may be set once and never replaced. */
export function writeOnce<T>(
  field: string,
): (current: T | undefined, update: T | undefined) => T | undefined {
  return (current, update) => {
    if (update === undefined) {
      return current;
    }
    if (current !== undefined) {
      throw new AgentError(`Context field "${field}" is already set and cannot be overwritten`);
    }
    return update;
  };
}

/** Reducer for the status channel: only the direct successor is accepted. */
export function advanceStatus(current: PipelineStatus, next: PipelineStatus): PipelineStatus {
  const expected = PIPELINE_STATUSES[PIPELINE_STATUSES.indexOf(current) + 1];
  if (next !== expected) {
    throw new AgentError(`Invalid pipeline transition: ${current} -> ${next}`);
  }
  return next;
}

export const PipelineGraphAnnotation = Annotation.Root({
  question: Annotation<string | undefined>({
    reducer: writeOnce<string>('question'),
    default: () => undefined,
  }),
  researchSummary: Annotation<string | undefined>({
    reducer: writeOnce<string>('researchSummary'),
    default: () => undefined,
  }),
  searchQueries: Annotation<readonly string[] | undefined>({
    reducer: writeOnce<readonly string[]>('searchQueries'),
    default: () => undefined,
  }),
  sources: Annotation<readonly string[] | undefined>({
    reducer: writeOnce<readonly string[]>('sources'),
    default: () => undefined,
  }),
  answer: Annotation<FinalAnswer | undefined>({
    reducer: writeOnce<FinalAnswer>('answer'),
    default: () => undefined,
  }),
  status: Annotation<PipelineStatus>({
    reducer: advanceStatus,
    default: () => 'start',
  }),
});

export type PipelineGraphState = typeof PipelineGraphAnnotation.State;
export type PipelineGraphUpdate = typeof PipelineGraphAnnotation.Update;
