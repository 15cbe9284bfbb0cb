// ---------------------------------------------------------------------------
// Recurrence engine
//
// The sweep finds tenants with due templates, then works one tenant at a
// time through a fresh TenantDb and one transaction per template. Inside a
// template's transaction the compare-and-set advance of next_occurrence_at
// runs first; only the sweep that wins it inserts the ticket, so concurrent
// sweeps cannot both generate the same occurrence.
//
// A template that can no longer generate (its customer was deleted, or one of
// its services is gone or no longer offered) is deactivated with an audited
// reason instead of failing on every sweep.
// ---------------------------------------------------------------------------

import {
  NotFoundError,
  ValidationError,
  alignFirstOccurrence,
  assembleLineItems,
  assertCadence,
  creationChanges,
  planOccurrence,
  ticketEvent,
  type Cadence,
  type LineItemRequest,
  type OccurrencePlan,
  type PricedLineItem,
  type RecurringTemplate,
  type RecurringTemplateId,
  type TemplateService,
  type TenantId,
  type Ticket,
  type TicketId,
} from '@crewbook/domain'
import type { Database } from '../db'
import { inTenantTransaction, withTenant, type TenantDb } from '../lib/tenant-db'
import {
  advanceTemplate,
  deactivateTemplate as deactivateTemplateRow,
  findAddressById,
  findCustomerById,
  findServicesByIds,
  findTemplateById,
  insertLineItems,
  insertTemplate,
  insertTicket,
  listDueTemplateIds,
  listTenantIdsWithDueTemplates,
} from '../repositories'
import { flushEffects, getRuntime, type Runtime } from '../runtime'

// ---------------------------------------------------------------------------
// Sweep report
// ---------------------------------------------------------------------------

export type TemplateOutcome =
  | {
      readonly status: 'generated'
      readonly tenantId: TenantId
      readonly templateId: RecurringTemplateId
      readonly ticketId: TicketId
      readonly occurrenceAt: Date
      readonly nextOccurrenceAt: Date
    }
  | {
      readonly status: 'skipped'
      readonly tenantId: TenantId
      readonly templateId: RecurringTemplateId
      readonly reason: string
    }
  | {
      readonly status: 'failed'
      readonly tenantId: TenantId
      readonly templateId: RecurringTemplateId
      readonly error: string
    }

export interface SweepReport {
  readonly asOf: Date
  readonly generated: number
  readonly skipped: number
  readonly failed: number
  readonly outcomes: readonly TemplateOutcome[]
}

type Attempt =
  | { kind: 'generated'; template: RecurringTemplate; plan: OccurrencePlan; ticket: Ticket }
  | { kind: 'skipped'; reason: string }
  | { kind: 'stopped'; template: RecurringTemplate; reason: string }
  | { kind: 'lost' }

// ---------------------------------------------------------------------------
// One template
// ---------------------------------------------------------------------------

function toLineItemRequest(service: TemplateService): LineItemRequest {
  return {
    serviceId: service.serviceId,
    quantity: service.quantity,
    priceOverrideCents: service.customPriceCents,
  }
}

async function priceTemplate(tx: TenantDb, template: RecurringTemplate): Promise<PricedLineItem[]> {
  if (template.services.length === 0) return []
  return assembleLineItems(
    template.services.map(toLineItemRequest),
    await findServicesByIds(
      tx,
      template.services.map((s) => s.serviceId),
    ),
  )
}

async function attemptOccurrence(tdb: TenantDb, templateId: RecurringTemplateId, asOf: Date): Promise<Attempt> {
  return inTenantTransaction(tdb, async (tx): Promise<Attempt> => {
    const template = await findTemplateById(tx, templateId)
    if (!template) return { kind: 'skipped', reason: 'template not found' }
    const plan = planOccurrence(template, asOf)
    if (!plan) return { kind: 'skipped', reason: 'not due' }

    const stop = async (reason: string): Promise<Attempt> => {
      await deactivateTemplateRow(tx, template.id)
      return { kind: 'stopped', template, reason }
    }

    if (!(await findCustomerById(tx, template.customerId))) return stop('customer deleted')

    let priced: PricedLineItem[]
    try {
      priced = await priceTemplate(tx, template)
    } catch (err) {
      if (err instanceof NotFoundError || err instanceof ValidationError) return stop(err.message)
      throw err
    }

    // Serialization point: the loser of a concurrent sweep matches no row here.
    const won = await advanceTemplate(tx, template.id, plan.occurrenceAt, plan.nextOccurrenceAt, asOf)
    if (!won) return { kind: 'lost' }

    const ticket = await insertTicket(tx, {
      customerId: template.customerId,
      addressId: template.addressId,
      scheduledAt: plan.occurrenceAt,
      scheduledDurationMinutes: template.estimatedDurationMinutes,
      templateId: template.id,
      notes: template.notes,
    })
    await insertLineItems(tx, ticket.id, priced)
    return { kind: 'generated', template, plan, ticket }
  })
}

/**
 * Generates the due occurrence of one template, retrying after a lost
 * compare-and-set against the template's new state.
 */
export async function materializeTemplate(
  tdb: TenantDb,
  templateId: RecurringTemplateId,
  asOf: Date,
  rt: Runtime = getRuntime(),
): Promise<TemplateOutcome> {
  const base = { tenantId: tdb.tenantId, templateId }
  for (let attempt = 0; attempt <= rt.settings.RECURRENCE_MAX_RETRIES; attempt++) {
    const result = await attemptOccurrence(tdb, templateId, asOf)
    if (result.kind === 'lost') continue
    if (result.kind === 'skipped') return { ...base, status: 'skipped', reason: result.reason }
    if (result.kind === 'stopped') {
      console.warn('[recurrence] template deactivated', { ...base, reason: result.reason })
      await flushEffects(rt, tdb, {
        audit: [
          {
            tenantId: tdb.tenantId,
            entityType: 'recurring_template',
            entityId: result.template.id,
            action: 'update',
            changes: {
              isActive: { old: true, new: false },
              deactivationReason: { old: null, new: result.reason },
            },
          },
        ],
        events: [],
      })
      return { ...base, status: 'skipped', reason: `template deactivated: ${result.reason}` }
    }

    const { template, plan, ticket } = result
    await flushEffects(rt, tdb, {
      audit: [
        {
          tenantId: tdb.tenantId,
          entityType: 'ticket',
          entityId: ticket.id,
          action: 'create',
          changes: creationChanges(ticket),
        },
        {
          tenantId: tdb.tenantId,
          entityType: 'recurring_template',
          entityId: template.id,
          action: 'update',
          changes: {
            nextOccurrenceAt: { old: plan.occurrenceAt.toISOString(), new: plan.nextOccurrenceAt.toISOString() },
            lastGeneratedAt: { old: template.lastGeneratedAt?.toISOString() ?? null, new: asOf.toISOString() },
          },
        },
      ],
      events: [ticketEvent('ticket.created', tdb.tenantId, ticket.id, ticket.scheduledAt)],
    })
    return {
      ...base,
      status: 'generated',
      ticketId: ticket.id,
      occurrenceAt: plan.occurrenceAt,
      nextOccurrenceAt: plan.nextOccurrenceAt,
    }
  }
  return { ...base, status: 'skipped', reason: 'contended by concurrent sweeps' }
}

// ---------------------------------------------------------------------------
// Sweeps
// ---------------------------------------------------------------------------

/** Every due template of one tenant. A failing template does not stop the others. */
export async function materializeDueForTenant(
  tdb: TenantDb,
  asOf: Date,
  rt: Runtime = getRuntime(),
): Promise<TemplateOutcome[]> {
  const outcomes: TemplateOutcome[] = []
  for (const templateId of await listDueTemplateIds(tdb, asOf)) {
    try {
      outcomes.push(await materializeTemplate(tdb, templateId, asOf, rt))
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      console.error('[recurrence] template failed', { tenantId: tdb.tenantId, templateId, error: message })
      outcomes.push({ tenantId: tdb.tenantId, templateId, status: 'failed', error: message })
    }
  }
  return outcomes
}

/**
 * The periodic sweep: one ticket per overdue template, each template's next
 * occurrence left strictly after `asOf`.
 */
export async function materializeDue(db: Database, asOf: Date, rt: Runtime = getRuntime()): Promise<SweepReport> {
  const outcomes: TemplateOutcome[] = []
  for (const tenantId of await listTenantIdsWithDueTemplates(db, asOf)) {
    outcomes.push(...(await withTenant(db, tenantId, (tdb) => materializeDueForTenant(tdb, asOf, rt))))
  }
  const report: SweepReport = {
    asOf,
    generated: outcomes.filter((o) => o.status === 'generated').length,
    skipped: outcomes.filter((o) => o.status === 'skipped').length,
    failed: outcomes.filter((o) => o.status === 'failed').length,
    outcomes,
  }
  console.log('[recurrence] sweep finished', {
    asOf: asOf.toISOString(),
    generated: report.generated,
    skipped: report.skipped,
    failed: report.failed,
  })
  return report
}

// ---------------------------------------------------------------------------
// Template management
// ---------------------------------------------------------------------------

export type CreateTemplateRequest = Cadence & {
  customerId: string
  addressId: string
  /** First occurrence; weekly templates snap forward to the preferred weekday. */
  startAt: Date
  estimatedDurationMinutes?: number
  notes?: string
  services: readonly TemplateService[]
}

/**
 * Creates an active template. Monthly templates anchor on the day of month
 * of their first occurrence unless `anchorDay` is given.
 *
 * @throws {ValidationError} for an invalid cadence or a service that is no longer offered.
 * @throws {NotFoundError} for an unknown customer, address or service.
 */
export async function createTemplate(
  tdb: TenantDb,
  req: CreateTemplateRequest,
  rt: Runtime = getRuntime(),
): Promise<RecurringTemplate> {
  const { startAt, ...rest } = req
  assertCadence(req)
  const firstOccurrence = alignFirstOccurrence(startAt, req)
  const anchorDay = req.intervalType === 'months' ? (req.anchorDay ?? firstOccurrence.getUTCDate()) : req.anchorDay

  const template = await inTenantTransaction(tdb, async (tx) => {
    const customer = await findCustomerById(tx, req.customerId)
    if (!customer) throw new NotFoundError('Customer', req.customerId)
    const address = await findAddressById(tx, req.addressId)
    if (!address || address.customerId !== customer.id) throw new NotFoundError('Address', req.addressId)

    // Price once now so a template that can never generate is rejected up front.
    if (req.services.length > 0) {
      assembleLineItems(
        req.services.map(toLineItemRequest),
        await findServicesByIds(
          tx,
          req.services.map((s) => s.serviceId),
        ),
      )
    }

    return insertTemplate(tx, { ...rest, anchorDay, nextOccurrenceAt: firstOccurrence })
  })

  await flushEffects(rt, tdb, {
    audit: [
      {
        tenantId: tdb.tenantId,
        entityType: 'recurring_template',
        entityId: template.id,
        action: 'create',
        changes: creationChanges(template),
      },
    ],
    events: [],
  })
  return template
}

/** Stops generation; tickets already generated are unaffected. */
export async function deactivateTemplate(
  tdb: TenantDb,
  templateId: string,
  rt: Runtime = getRuntime(),
): Promise<RecurringTemplate> {
  const template = await deactivateTemplateRow(tdb, templateId)
  if (!template) throw new NotFoundError('Recurring template', templateId)
  await flushEffects(rt, tdb, {
    audit: [
      {
        tenantId: tdb.tenantId,
        entityType: 'recurring_template',
        entityId: template.id,
        action: 'update',
        changes: { isActive: { old: true, new: false } },
      },
    ],
    events: [],
  })
  return template
}
