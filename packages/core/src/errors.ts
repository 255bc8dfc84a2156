/**
 * Raised when flow code breaks the replay contract: a screen key presented
 * twice in one turn, a missing builder, or an action that returns without
 * prompting or terminating. These abort the turn and are never turned into a
 * user-facing message.
 */
export class FlowDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FlowDefinitionError';
  }
}

/** Raised when pagination is invoked with settings that cannot produce a page. */
export class PaginationConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PaginationConfigError';
  }
}

/** Raised for an invalid middleware stack or missing processor collaborators. */
export class PipelineConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PipelineConfigError';
  }
}
