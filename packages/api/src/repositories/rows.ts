import { InfrastructureError } from '@crewbook/domain'

/** First row of an INSERT/UPDATE ... RETURNING that must have produced one. */
export function requireRow<T>(rows: readonly T[], what: string): T {
  const row = rows[0]
  if (row === undefined) {
    throw new InfrastructureError(`${what} returned no row`)
  }
  return row
}
