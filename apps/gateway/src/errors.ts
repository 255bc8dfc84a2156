/** Raised when a provider request body does not match the gateway's wire format. */
export class InvalidRequestError extends Error {
  readonly statusCode = 400;

  constructor(message = 'Invalid request payload') {
    super(message);
    this.name = 'InvalidRequestError';
  }
}

/**
 * Wraps failures raised while running a conversation turn. The message is
 * generic so no flow text or stack detail reaches the provider.
 */
export class FlowExecutionError extends Error {
  readonly statusCode = 500;

  constructor(
    message = 'Conversation turn failed',
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'FlowExecutionError';
  }
}
