/**
 * Gateway Errors
 *
 * Every rejection raised by the gateway core is a GatewayError with a
 * category and a stable code. Callers branch on `code`, never on message text.
 *
 * Categories:
 * - VALIDATION          bad input (zero amount, wrong token, malformed payload)
 * - AUTHORIZATION       wrong caller (not the messenger, counterpart or owner)
 * - STATE_PRECONDITION  wrong ledger status or gateway state for the call
 * - COLLABORATOR        token, CCTP or messenger call failed
 */

export type GatewayErrorCategory =
  | 'VALIDATION'
  | 'AUTHORIZATION'
  | 'STATE_PRECONDITION'
  | 'COLLABORATOR';

export class GatewayError extends Error {
  constructor(
    public readonly category: GatewayErrorCategory,
    public readonly code: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'GatewayError';
  }
}

export class ValidationError extends GatewayError {
  constructor(code: string, message: string) {
    super('VALIDATION', code, message);
    this.name = 'ValidationError';
  }
}

export class AuthorizationError extends GatewayError {
  constructor(code: string, message: string) {
    super('AUTHORIZATION', code, message);
    this.name = 'AuthorizationError';
  }
}

export class StatePreconditionError extends GatewayError {
  constructor(code: string, message: string) {
    super('STATE_PRECONDITION', code, message);
    this.name = 'StatePreconditionError';
  }
}

/**
 * A collaborator call failed. The original error is kept as `cause` and its
 * message is appended so the reason survives serialization.
 */
export class CollaboratorError extends GatewayError {
  constructor(code: string, message: string, cause?: unknown) {
    super('COLLABORATOR', code, cause === undefined ? message : `${message}: ${describeError(cause)}`, { cause });
    this.name = 'CollaboratorError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run a collaborator call, converting any failure into a CollaboratorError.
 */
export async function callCollaborator<T>(
  code: string,
  description: string,
  fn: () => Promise<T>
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw new CollaboratorError(code, description, error);
  }
}
