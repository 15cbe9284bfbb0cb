// ---------------------------------------------------------------------------
// Hono application types
// ---------------------------------------------------------------------------

import type { TenantId } from '@crewbook/domain'
import type { TenantDb } from './lib/tenant-db'

/**
 * Variables injected into Hono context by the tenant middleware.
 * Every handler mounted under /api/v1/* can rely on these being present;
 * the middleware aborts with 4xx before reaching the handler if the tenant
 * cannot be resolved.
 */
export type AppVariables = {
  /** The UUID of the resolved tenant for this request. */
  tenantId: TenantId
  /** Database handle bound to the resolved tenant. Pass it to repositories and services. */
  db: TenantDb
}

/** Hono environment type used when constructing the app and all sub-routers. */
export type AppEnv = { Variables: AppVariables }

/**
 * Added by `requirePermission` on routes that need an elevated bearer token.
 */
export type AuthVariables = AppVariables & {
  /** `sub` claim of the verified token; recorded as the audit actor. */
  actorSub: string
}

export type AuthEnv = { Variables: AuthVariables }
