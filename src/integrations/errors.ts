// ============================================================================
// Integration Errors: Lifecycle and lookup failures
// ============================================================================

export class IntegrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IntegrationError';
  }
}

/** An integration already exists for this owner and CRM type. */
export class ConflictError extends IntegrationError {
  constructor(message: string) {
    super(message);
    this.name = 'ConflictError';
  }
}

/** No integration in the required state exists. */
export class NotFoundError extends IntegrationError {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/** A sync was requested but the owner has no active integration among the targets. */
export class NoActiveIntegrationsError extends NotFoundError {
  constructor() {
    super('No active CRM integrations found');
    this.name = 'NoActiveIntegrationsError';
  }
}
