// ---------------------------------------------------------------------------
// Multi-tenant middleware
//
// Extracts the tenant slug from the incoming Host header subdomain, resolves
// the tenant from the database, then populates the Hono context with:
//   - tenantId  (branded UUID)
//   - db        (TenantDb bound to that tenant)
//
// Routes protected by this middleware abort with 400/403/404 if the tenant
// cannot be resolved, so downstream handlers are guaranteed a valid context.
// ---------------------------------------------------------------------------

import type { Context, Next } from 'hono'
import type { AppEnv } from '../types'
import { getDb } from '../db'
import { createTenantDb } from '../lib/tenant-db'
import { findTenantBySlug } from '../repositories'

// Root-level subdomains that do not represent a tenant (e.g. the marketing
// site or API gateway health checks).
const NON_TENANT_SUBDOMAINS = new Set(['www', 'api', 'app', 'mail'])

/**
 * Extracts the subdomain segment from a Host header value.
 *
 * Examples:
 *   sparkle.crewbook.app  → "sparkle"
 *   www.crewbook.app      → null  (reserved subdomain)
 *   crewbook.app          → null  (no subdomain)
 *   localhost             → null  (local without X-Tenant-Slug)
 */
function extractSubdomain(host: string): string | null {
  const hostname = host.split(':')[0] ?? ''
  const parts = hostname.split('.')

  // A real subdomain requires at least 3 dot-separated segments.
  if (parts.length >= 3) {
    const sub = parts[0] ?? ''
    if (!sub || NON_TENANT_SUBDOMAINS.has(sub)) return null
    return sub
  }

  return null
}

/**
 * Hono middleware that resolves the tenant for the current request.
 *
 * Resolution order:
 *   1. Host header subdomain (production)
 *   2. X-Tenant-Slug header (local development / testing convenience)
 */
export async function tenantMiddleware(c: Context<AppEnv>, next: Next): Promise<Response | void> {
  const host = c.req.header('host') ?? ''
  const slug = extractSubdomain(host) ?? c.req.header('x-tenant-slug') ?? null

  if (!slug) {
    return c.json({ error: 'Tenant slug could not be determined from Host header', code: 'TENANT_REQUIRED' }, 400)
  }

  const db = getDb()
  const tenant = await findTenantBySlug(db, slug)
  if (!tenant) {
    return c.json({ error: 'Tenant not found', code: 'TENANT_NOT_FOUND' }, 404)
  }

  // SUSPENDED  → 403: the tenant's users should know their account is blocked.
  // OFFBOARDED → 404: indistinguishable from an unknown slug.
  if (tenant.status === 'SUSPENDED') {
    return c.json({ error: 'Tenant account is suspended', code: 'TENANT_SUSPENDED' }, 403)
  }
  if (tenant.status === 'OFFBOARDED') {
    return c.json({ error: 'Tenant not found', code: 'TENANT_NOT_FOUND' }, 404)
  }

  c.set('tenantId', tenant.id)
  c.set('db', createTenantDb(db, tenant.id))

  await next()
}
