import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { logger } from 'hono/logger'
import { HTTPException } from 'hono/http-exception'
import type { ContentfulStatusCode } from 'hono/utils/http-status'
import { isDomainError, type DomainErrorCode } from '@crewbook/domain'
import type { AppEnv } from './types'
import { tenantMiddleware } from './middleware/tenant'
import { translateDbError } from './lib/db-errors'
import { customersHandler } from './handlers/customers'
import { servicesHandler } from './handlers/services'
import { ticketsHandler } from './handlers/tickets'
import { invoicesHandler } from './handlers/invoices'
import { recurringTemplatesHandler } from './handlers/recurring-templates'
import { leadsHandler } from './handlers/leads'

const app = new Hono<AppEnv>()

// ---------------------------------------------------------------------------
// Global middleware (applies to all routes including /health)
// ---------------------------------------------------------------------------
app.use('*', logger())
app.use('*', cors())

// ---------------------------------------------------------------------------
// Public routes (no tenant required)
// ---------------------------------------------------------------------------
app.get('/health', (c) => {
  return c.json({ status: 'ok' as const, timestamp: new Date().toISOString() })
})

// ---------------------------------------------------------------------------
// Tenant-protected API: all routes under /api/v1 require a resolved tenant.
//
// The tenant middleware resolves the tenant from the Host subdomain (or the
// X-Tenant-Slug header for local development) and populates:
//   - c.get('tenantId')  the tenant's UUID
//   - c.get('db')        a TenantDb that every repository call requires
// ---------------------------------------------------------------------------
const v1 = new Hono<AppEnv>()
v1.use('*', tenantMiddleware)

// Bounded-context routers
v1.route('/customers', customersHandler)
v1.route('/services', servicesHandler)
v1.route('/tickets', ticketsHandler)
v1.route('/invoices', invoicesHandler)
v1.route('/recurring-templates', recurringTemplatesHandler)
v1.route('/leads', leadsHandler)

app.route('/api/v1', v1)

// ---------------------------------------------------------------------------
// Error mapping
//
// Handlers do not catch: domain errors carry their own code and map to a
// status here. Anything unrecognised is logged and answered with a bare 500.
// ---------------------------------------------------------------------------
const STATUS_BY_CODE: Record<DomainErrorCode, ContentfulStatusCode> = {
  VALIDATION_ERROR: 400,
  TENANT_REQUIRED: 400,
  NOT_FOUND: 404,
  INVALID_TRANSITION: 409,
  CONFLICT: 409,
  INFRASTRUCTURE_FAILURE: 503,
}

app.onError((err, c) => {
  if (err instanceof HTTPException) return err.getResponse()

  const error = translateDbError(err)
  if (isDomainError(error)) {
    if (error.code === 'INFRASTRUCTURE_FAILURE') {
      console.error('[api] infrastructure failure', { path: c.req.path, error: error.message })
    }
    return c.json({ error: error.message, code: error.code }, STATUS_BY_CODE[error.code])
  }

  console.error('[api] unhandled error', {
    path: c.req.path,
    error: err instanceof Error ? (err.stack ?? err.message) : String(err),
  })
  return c.json({ error: 'Internal server error', code: 'INTERNAL_ERROR' }, 500)
})

// ---------------------------------------------------------------------------
// 404 fallback
// ---------------------------------------------------------------------------
app.notFound((c) => c.json({ error: 'Not found', code: 'NOT_FOUND' }, 404))

export { app }
