export class ScholarError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'ScholarError';
  }
}

export class AgentError extends ScholarError {
  constructor(message: string, cause?: Error) {
    super(message, 'AGENT_ERROR', cause);
    this.name = 'AgentError';
  }
}

export class LlmError extends ScholarError {
  constructor(
    message: string,
    public readonly isTransient: boolean,
    cause?: Error,
  ) {
    super(message, 'LLM_ERROR', cause);
    this.name = 'LlmError';
  }
}

export class TimeoutError extends ScholarError {
  constructor(
    message: string,
    public readonly timeoutMs: number,
  ) {
    super(message, 'TIMEOUT_ERROR');
    this.name = 'TimeoutError';
  }
}

export class SchemaValidationError extends ScholarError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class ConfigurationError extends ScholarError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export type PipelineStage = 'research' | 'writer' | 'orchestration';

export class PipelineError extends ScholarError {
  constructor(
    message: string,
    public readonly stage: PipelineStage,
    cause?: Error,
  ) {
    super(message, 'PIPELINE_ERROR', cause);
    this.name = 'PipelineError';
  }
}
