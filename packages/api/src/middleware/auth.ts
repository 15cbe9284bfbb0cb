// ---------------------------------------------------------------------------
// Permission middleware
//
// Verifies an HS256 bearer token signed with AUTH_JWT_SECRET and requires a
// named permission in its `permissions` claim. The token's `tid` claim must
// match the tenant resolved by tenantMiddleware, so a token issued for one
// business cannot act on another.
//
// On success, sets `actorSub` in the Hono context for the audit trail.
// On failure, returns 401 (missing/invalid/expired token) or 403 (valid token
// but wrong tenant or missing permission). Error responses never leak
// internal details.
// ---------------------------------------------------------------------------

import type { MiddlewareHandler } from 'hono'
import { errors, jwtVerify, type JWTPayload } from 'jose'
import type { AuthEnv } from '../types'
import { getConfig } from '../config'

export type Permission = 'tickets:reopen'

let _secret: Uint8Array | null = null

function getSecret(): Uint8Array {
  if (_secret === null) {
    _secret = new TextEncoder().encode(getConfig().AUTH_JWT_SECRET)
  }
  return _secret
}

function permissionsOf(payload: JWTPayload): readonly string[] {
  const claim = payload['permissions']
  return Array.isArray(claim) ? claim.filter((p): p is string => typeof p === 'string') : []
}

/**
 * Builds a middleware that lets the request through only with a verified
 * token for the current tenant that grants `permission`. Mount it after
 * tenantMiddleware.
 */
export function requirePermission(permission: Permission): MiddlewareHandler<AuthEnv> {
  return async (c, next) => {
    const authHeader = c.req.header('Authorization')
    if (!authHeader?.startsWith('Bearer ')) {
      return c.json({ error: 'Missing or malformed Authorization header', code: 'UNAUTHORIZED' }, 401)
    }

    const token = authHeader.slice(7)

    let payload: JWTPayload
    try {
      const result = await jwtVerify(token, getSecret(), { algorithms: ['HS256'] })
      payload = result.payload
    } catch (err) {
      if (err instanceof errors.JWTExpired) {
        return c.json({ error: 'Token has expired', code: 'TOKEN_EXPIRED' }, 401)
      }
      return c.json({ error: 'Invalid or unverifiable token', code: 'UNAUTHORIZED' }, 401)
    }

    if (!payload.sub) {
      return c.json({ error: 'Invalid token: missing sub claim', code: 'UNAUTHORIZED' }, 401)
    }

    if (payload['tid'] !== c.get('tenantId')) {
      return c.json({ error: 'Forbidden: token was issued for another tenant', code: 'FORBIDDEN' }, 403)
    }

    if (!permissionsOf(payload).includes(permission)) {
      return c.json({ error: `Forbidden: ${permission} permission required`, code: 'FORBIDDEN' }, 403)
    }

    c.set('actorSub', payload.sub)
    await next()
  }
}
