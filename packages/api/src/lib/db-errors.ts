// ---------------------------------------------------------------------------
// Driver error translation
//
// pg raises DatabaseError carrying the SQLSTATE in `code`. Unique violations
// mean another writer got there first, and foreign-key violations mean a row
// is still referenced; both become ConflictError. A value that cannot be
// parsed as the column's type (a path id that is not a UUID) cannot match a
// row, so it is NotFoundError. Every other driver or connection failure
// becomes InfrastructureError. Domain errors thrown inside a transaction pass
// through unchanged.
// ---------------------------------------------------------------------------

import { DatabaseError } from 'pg'
import { ConflictError, InfrastructureError, NotFoundError, isDomainError } from '@crewbook/domain'

const UNIQUE_VIOLATION = '23505'
const FOREIGN_KEY_VIOLATION = '23503'
const INVALID_TEXT_REPRESENTATION = '22P02'

function driverError(err: unknown): DatabaseError | undefined {
  if (err instanceof DatabaseError) return err
  if (err instanceof Error && err.cause instanceof DatabaseError) return err.cause
  return undefined
}

/** Node system errors (ECONNREFUSED, ETIMEDOUT, ...) carry a string `code`. */
function isSystemError(err: unknown): err is Error & { code: string } {
  return err instanceof Error && 'code' in err && typeof err.code === 'string'
}

export function translateDbError(err: unknown): unknown {
  if (isDomainError(err)) return err

  const pgError = driverError(err)
  if (pgError) {
    if (pgError.code === UNIQUE_VIOLATION) {
      return new ConflictError(`Concurrent write rejected by ${pgError.constraint ?? 'a unique constraint'}`, {
        cause: err,
      })
    }
    if (pgError.code === FOREIGN_KEY_VIOLATION) {
      return new ConflictError(`Row is still referenced (${pgError.constraint ?? 'foreign key'})`, { cause: err })
    }
    if (pgError.code === INVALID_TEXT_REPRESENTATION) {
      return new NotFoundError('Record', /"([^"]*)"/.exec(pgError.message)?.[1] ?? '')
    }
    return new InfrastructureError(`Database error ${pgError.code ?? 'unknown'}: ${pgError.message}`, { cause: err })
  }

  if (isSystemError(err)) {
    return new InfrastructureError(`Database unavailable: ${err.code}`, { cause: err })
  }

  return err
}
