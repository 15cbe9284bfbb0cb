// ---------------------------------------------------------------------------
// Error taxonomy shared by every bounded context.
//
// Each class carries a stable `code` that the HTTP layer maps to a status.
// "Wrong tenant" and "absent" both surface as NotFoundError so callers cannot
// probe for the existence of another tenant's rows.
// ---------------------------------------------------------------------------

export type DomainErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'INVALID_TRANSITION'
  | 'CONFLICT'
  | 'INFRASTRUCTURE_FAILURE'
  | 'TENANT_REQUIRED'

export abstract class DomainError extends Error {
  abstract readonly code: DomainErrorCode

  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Malformed input or a missing required override. Raised before any mutation. */
export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR' as const
}

/** The referenced entity is absent, tombstoned where that matters, or owned by another tenant. */
export class NotFoundError extends DomainError {
  readonly code = 'NOT_FOUND' as const

  constructor(
    readonly entity: string,
    readonly entityId: string,
  ) {
    super(`${entity} not found`)
  }
}

/** A state machine refused the requested move. The entity is unchanged. */
export class InvalidTransitionError extends DomainError {
  readonly code = 'INVALID_TRANSITION' as const
}

/** Concurrent modification, or a re-derivation against a dispatched invoice. Re-read and retry. */
export class ConflictError extends DomainError {
  readonly code = 'CONFLICT' as const
}

/** Storage or a dependency is unavailable. Never masked as an empty result. */
export class InfrastructureError extends DomainError {
  readonly code = 'INFRASTRUCTURE_FAILURE' as const
}

/** An operation on tenant-scoped data was attempted without an active tenant identity. */
export class MissingTenantError extends DomainError {
  readonly code = 'TENANT_REQUIRED' as const

  constructor() {
    super('An active tenant identity is required for this operation')
  }
}

export function isDomainError(err: unknown): err is DomainError {
  return err instanceof DomainError
}
