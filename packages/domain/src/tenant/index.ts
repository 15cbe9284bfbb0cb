// ---------------------------------------------------------------------------
// Tenant bounded context
// A tenant is one business account and the unit of data isolation.
// ---------------------------------------------------------------------------

import type { Brand } from '../shared/types'
import { MissingTenantError } from '../shared/errors'

/** Identifies a business account. */
export type TenantId = Brand<string, 'TenantId'>

export const toTenantId = (raw: string): TenantId => raw as TenantId

export type TenantStatus = 'ACTIVE' | 'SUSPENDED' | 'OFFBOARDED'

export interface Tenant {
  readonly id: TenantId
  readonly name: string
  readonly slug: string
  readonly status: TenantStatus
  readonly createdAt: Date
}

/**
 * The active business identity for one logical operation.
 *
 * @invariant `tenantId` is a non-empty string. There is no "all tenants" value.
 */
export interface TenantContext {
  readonly tenantId: TenantId
}

/**
 * Establishes a tenant context, failing closed when the identity is absent.
 *
 * @throws {MissingTenantError} for `null`, `undefined` or blank input.
 */
export function createTenantContext(raw: string | null | undefined): TenantContext {
  if (raw == null || raw.trim() === '') {
    throw new MissingTenantError()
  }
  return { tenantId: toTenantId(raw) }
}

