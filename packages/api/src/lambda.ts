// ---------------------------------------------------------------------------
// Lambda entry point
//
// Wraps the Hono app with the AWS Lambda adapter.
//
// Environment variables expected at runtime (validated by config.ts on first
// use):
//   DATABASE_URL      Postgres connection string
//   AUTH_JWT_SECRET   HS256 key for elevated bearer tokens
// ---------------------------------------------------------------------------

import { handle } from 'hono/aws-lambda'
import { app } from './app'

export const handler = handle(app)
