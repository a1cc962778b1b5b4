/** Error hierarchy for tree building and structural search. */

export interface StagePosition {
  /** 1-based stage of a cascading search. */
  stage?: number;
  /** 1-based position of the element or tree within the stage. */
  ordinal?: number;
}

function describe(action: string, position: StagePosition): string {
  const parts: string[] = [];
  if (position.stage !== undefined) parts.push(`stage ${position.stage}`);
  if (position.ordinal !== undefined) parts.push(`#${position.ordinal}`);
  return parts.length > 0 ? `${action} (${parts.join(', ')})` : action;
}

function causeMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export class NavigatorError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'NavigatorError';
  }
}

export class NilParameterError extends NavigatorError {
  constructor(
    public readonly parameter: string,
    options?: ErrorOptions,
  ) {
    super(`Parameter "${parameter}" must not be nil`, options);
    this.name = 'NilParameterError';
  }
}

export class NodeLimitError extends NavigatorError {
  constructor(public readonly limit: number) {
    super(`Tree exceeds the limit of ${limit} nodes`);
    this.name = 'NodeLimitError';
  }
}

export class BuildFailureError extends NavigatorError {
  public readonly stage?: number;
  public readonly ordinal?: number;

  constructor(cause: unknown, position: StagePosition = {}) {
    super(`${describe('Failed to build tree', position)}: ${causeMessage(cause)}`, { cause });
    this.name = 'BuildFailureError';
    this.stage = position.stage;
    this.ordinal = position.ordinal;
  }
}

export class TraversalFailureError extends NavigatorError {
  public readonly stage?: number;
  public readonly ordinal?: number;

  constructor(cause: unknown, position: StagePosition = {}) {
    super(`${describe('Traversal failed', position)}: ${causeMessage(cause)}`, { cause });
    this.name = 'TraversalFailureError';
    this.stage = position.stage;
    this.ordinal = position.ordinal;
  }
}

/** Raised when a single-stage search is called without criteria. Not recoverable. */
export class MissingCriteriaError extends NavigatorError {
  constructor(operation: string) {
    super(`${operation} requires search criteria; pass wildcard() to match everything`);
    this.name = 'MissingCriteriaError';
  }
}

export class ConfigError extends NavigatorError {
  constructor(
    message: string,
    public readonly errors: string[],
    options?: ErrorOptions,
  ) {
    super(errors.length > 0 ? `${message}: ${errors.join('; ')}` : message, options);
    this.name = 'ConfigError';
  }
}
