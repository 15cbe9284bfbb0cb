// ---------------------------------------------------------------------------
// Scheduled entry point for the recurrence sweep
//
// Invoked by an EventBridge schedule. Overlapping invocations are safe: each
// occurrence is claimed by a compare-and-set on the template, so a second
// sweep running at the same time generates nothing twice.
// ---------------------------------------------------------------------------

import type { ScheduledHandler } from 'aws-lambda'
import { getDb } from './db'
import { materializeDue } from './services/recurrence.service'

export const handler: ScheduledHandler = async (event) => {
  const asOf = new Date(event.time)
  const report = await materializeDue(getDb(), Number.isNaN(asOf.getTime()) ? new Date() : asOf)
  if (report.failed > 0) {
    // Surfaces in the function's error metric; generated tickets stay committed.
    throw new Error(`Recurrence sweep finished with ${report.failed} failed template(s)`)
  }
}
