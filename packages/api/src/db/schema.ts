// ---------------------------------------------------------------------------
// PostgreSQL schema (drizzle-orm)
//
// Every tenant-owned table carries tenant_id. Tombstoned tables carry
// deleted_at; the repositories add the not-deleted predicate themselves.
// Money columns are integer cents, rates integer basis points.
// ---------------------------------------------------------------------------

import {
  pgTable,
  uuid,
  text,
  integer,
  boolean,
  real,
  jsonb,
  timestamp,
  index,
  uniqueIndex,
  check,
  type AnyPgColumn,
} from 'drizzle-orm/pg-core'
import { sql } from 'drizzle-orm'
import type {
  AttributeSource,
  AuditAction,
  AuditEntityType,
  ConfirmationStatus,
  ContactMethod,
  FieldChanges,
  IntervalType,
  InvoiceStatus,
  JsonValue,
  LeadSource,
  LeadStatus,
  LeadUrgency,
  TenantStatus,
  TicketStatus,
  TimeOfDay,
} from '@crewbook/domain'

const createdAt = () => timestamp('created_at', { withTimezone: true }).notNull().defaultNow()
const updatedAt = () => timestamp('updated_at', { withTimezone: true }).notNull().defaultNow()
const deletedAt = () => timestamp('deleted_at', { withTimezone: true })

// ── Tenants ───────────────────────────────────────────────────────────────
export const tenants = pgTable('tenants', {
  id: uuid('id').primaryKey().defaultRandom(),
  name: text('name').notNull(),
  slug: text('slug').notNull().unique(),
  status: text('status').$type<TenantStatus>().notNull().default('ACTIVE'),
  createdAt: createdAt(),
})

// ── Customers ─────────────────────────────────────────────────────────────
export const customers = pgTable(
  'customers',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: uuid('tenant_id')
      .notNull()
      .references(() => tenants.id, { onDelete: 'cascade' }),
    firstName: text('first_name'),
    lastName: text('last_name'),
    businessName: text('business_name'),
    email: text('email'),
    phone: text('phone'),
    referredById: uuid('referred_by_id').references((): AnyPgColumn => customers.id),
    preferredContactMethod: text('preferred_contact_method').$type<ContactMethod>(),
    preferredTimeOfDay: text('preferred_time_of_day').$type<TimeOfDay>(),
    notes: text('notes'),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
    deletedAt: deletedAt(),
  },
  (table) => [
    index('idx_customers_tenant').on(table.tenantId),
    check(
      'customers_has_name',
      sql`${table.firstName} IS NOT NULL OR ${table.lastName} IS NOT NULL OR ${table.businessName} IS NOT NULL`,
    ),
  ],
)

// No partial unique index on is_primary: writers clear siblings in the same transaction.
export const addresses = pgTable(
  'addresses',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: uuid('tenant_id')
      .notNull()
      .references(() => tenants.id, { onDelete: 'cascade' }),
    customerId: uuid('customer_id')
      .notNull()
      .references(() => customers.id, { onDelete: 'cascade' }),
    label: text('label'),
    street: text('street').notNull(),
    street2: text('street2'),
    city: text('city').notNull(),
    state: text('state').notNull(),
    zip: text('zip').notNull(),
    notes: text('notes'),
    isPrimary: boolean('is_primary').notNull().default(false),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  (table) => [index('idx_addresses_customer').on(table.tenantId, table.customerId)],
)

// ── Service catalog ───────────────────────────────────────────────────────
export const services = pgTable(
  'services',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: uuid('tenant_id')
      .notNull()
      .references(() => tenants.id, { onDelete: 'cascade' }),
    name: text('name').notNull(),
    description: text('description'),
    pricingType: text('pricing_type').notNull(),
    defaultPriceCents: integer('default_price_cents'),
    unitPriceCents: integer('unit_price_cents'),
    unitLabel: text('unit_label'),
    isActive: boolean('is_active').notNull().default(true),
    displayOrder: integer('display_order').notNull().default(0),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
    deletedAt: deletedAt(),
  },
  (table) => [
    index('idx_services_tenant').on(table.tenantId),
    check('services_valid_pricing', sql`${table.pricingType} IN ('fixed', 'flexible', 'per_unit')`),
    check(
      'services_fixed_needs_price',
      sql`${table.pricingType} <> 'fixed' OR ${table.defaultPriceCents} IS NOT NULL`,
    ),
    check(
      'services_per_unit_needs_price',
      sql`${table.pricingType} <> 'per_unit' OR ${table.unitPriceCents} IS NOT NULL`,
    ),
  ],
)

// ── Recurring templates ───────────────────────────────────────────────────
export const recurringTemplates = pgTable(
  'recurring_templates',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: uuid('tenant_id')
      .notNull()
      .references(() => tenants.id, { onDelete: 'cascade' }),
    customerId: uuid('customer_id')
      .notNull()
      .references(() => customers.id, { onDelete: 'cascade' }),
    addressId: uuid('address_id')
      .notNull()
      .references(() => addresses.id),
    intervalType: text('interval_type').$type<IntervalType>().notNull(),
    intervalValue: integer('interval_value').notNull(),
    preferredDayOfWeek: integer('preferred_day_of_week'),
    /** "HH:MM", UTC. */
    preferredTime: text('preferred_time'),
    anchorDay: integer('anchor_day'),
    estimatedDurationMinutes: integer('estimated_duration_minutes'),
    notes: text('notes'),
    isActive: boolean('is_active').notNull().default(true),
    lastGeneratedAt: timestamp('last_generated_at', { withTimezone: true }),
    nextOccurrenceAt: timestamp('next_occurrence_at', { withTimezone: true }),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  (table) => [
    index('idx_recurring_templates_due')
      .on(table.nextOccurrenceAt)
      .where(sql`is_active = true`),
    check('recurring_valid_interval', sql`${table.intervalType} IN ('days', 'weeks', 'months')`),
    check('recurring_positive_interval', sql`${table.intervalValue} > 0`),
    check(
      'recurring_valid_day',
      sql`${table.preferredDayOfWeek} IS NULL OR ${table.preferredDayOfWeek} BETWEEN 0 AND 6`,
    ),
  ],
)

export const recurringTemplateServices = pgTable(
  'recurring_template_services',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: uuid('tenant_id')
      .notNull()
      .references(() => tenants.id, { onDelete: 'cascade' }),
    templateId: uuid('template_id')
      .notNull()
      .references(() => recurringTemplates.id, { onDelete: 'cascade' }),
    serviceId: uuid('service_id')
      .notNull()
      .references(() => services.id),
    quantity: integer('quantity'),
    customPriceCents: integer('custom_price_cents'),
    sortOrder: integer('sort_order').notNull().default(0),
  },
  (table) => [index('idx_template_services_template').on(table.templateId)],
)

// ── Tickets ───────────────────────────────────────────────────────────────
export const tickets = pgTable(
  'tickets',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: uuid('tenant_id')
      .notNull()
      .references(() => tenants.id, { onDelete: 'cascade' }),
    customerId: uuid('customer_id')
      .notNull()
      .references(() => customers.id),
    addressId: uuid('address_id')
      .notNull()
      .references(() => addresses.id),
    templateId: uuid('template_id').references(() => recurringTemplates.id, { onDelete: 'set null' }),
    status: text('status').$type<TicketStatus>().notNull().default('scheduled'),
    confirmationStatus: text('confirmation_status').$type<ConfirmationStatus>().notNull().default('pending'),
    scheduledAt: timestamp('scheduled_at', { withTimezone: true }).notNull(),
    scheduledDurationMinutes: integer('scheduled_duration_minutes'),
    clockInAt: timestamp('clock_in_at', { withTimezone: true }),
    clockOutAt: timestamp('clock_out_at', { withTimezone: true }),
    actualDurationMinutes: integer('actual_duration_minutes'),
    closedAt: timestamp('closed_at', { withTimezone: true }),
    isPriceEstimated: boolean('is_price_estimated').notNull().default(true),
    notes: text('notes'),
    version: integer('version').notNull().default(1),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
    deletedAt: deletedAt(),
  },
  (table) => [
    index('idx_tickets_schedule').on(table.tenantId, table.scheduledAt),
    index('idx_tickets_customer').on(table.tenantId, table.customerId),
    // One generated ticket per template occurrence.
    uniqueIndex('uq_tickets_template_occurrence')
      .on(table.templateId, table.scheduledAt)
      .where(sql`template_id IS NOT NULL AND deleted_at IS NULL`),
    check(
      'tickets_closed_iff_terminal',
      sql`(${table.closedAt} IS NOT NULL) = (${table.status} IN ('completed', 'cancelled'))`,
    ),
    check('tickets_clock_out_after_in', sql`${table.clockOutAt} IS NULL OR ${table.clockOutAt} >= ${table.clockInAt}`),
  ],
)

export const lineItems = pgTable(
  'line_items',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: uuid('tenant_id')
      .notNull()
      .references(() => tenants.id, { onDelete: 'cascade' }),
    ticketId: uuid('ticket_id')
      .notNull()
      .references(() => tickets.id, { onDelete: 'cascade' }),
    serviceId: uuid('service_id')
      .notNull()
      .references(() => services.id),
    description: text('description'),
    quantity: integer('quantity').notNull().default(1),
    unitPriceCents: integer('unit_price_cents'),
    totalPriceCents: integer('total_price_cents').notNull(),
    durationMinutes: integer('duration_minutes'),
    isPriceOverridden: boolean('is_price_overridden').notNull().default(false),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
    deletedAt: deletedAt(),
  },
  (table) => [
    index('idx_line_items_ticket').on(table.tenantId, table.ticketId),
    check('line_items_positive_quantity', sql`${table.quantity} > 0`),
  ],
)

// ── Invoices ──────────────────────────────────────────────────────────────
export const invoices = pgTable(
  'invoices',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: uuid('tenant_id')
      .notNull()
      .references(() => tenants.id, { onDelete: 'cascade' }),
    customerId: uuid('customer_id')
      .notNull()
      .references(() => customers.id),
    ticketId: uuid('ticket_id')
      .notNull()
      .references(() => tickets.id),
    invoiceNumber: text('invoice_number').notNull(),
    status: text('status').$type<InvoiceStatus>().notNull().default('draft'),
    subtotalCents: integer('subtotal_cents').notNull(),
    taxRateBps: integer('tax_rate_bps').notNull().default(0),
    taxAmountCents: integer('tax_amount_cents').notNull().default(0),
    totalAmountCents: integer('total_amount_cents').notNull(),
    amountPaidCents: integer('amount_paid_cents').notNull().default(0),
    issuedAt: timestamp('issued_at', { withTimezone: true }),
    dueAt: timestamp('due_at', { withTimezone: true }),
    sentAt: timestamp('sent_at', { withTimezone: true }),
    paidAt: timestamp('paid_at', { withTimezone: true }),
    voidedAt: timestamp('voided_at', { withTimezone: true }),
    notes: text('notes'),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
    deletedAt: deletedAt(),
  },
  (table) => [
    uniqueIndex('uq_invoices_number').on(table.tenantId, table.invoiceNumber),
    // At most one authoritative invoice per ticket.
    uniqueIndex('uq_invoices_active_per_ticket')
      .on(table.ticketId)
      .where(sql`status <> 'void' AND deleted_at IS NULL`),
    index('idx_invoices_unpaid').on(table.tenantId, table.status),
    check('invoices_valid_status', sql`${table.status} IN ('draft', 'sent', 'partial', 'paid', 'void')`),
    check('invoices_total', sql`${table.totalAmountCents} = ${table.subtotalCents} + ${table.taxAmountCents}`),
  ],
)

// ── Leads ─────────────────────────────────────────────────────────────────
export const leads = pgTable(
  'leads',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: uuid('tenant_id')
      .notNull()
      .references(() => tenants.id, { onDelete: 'cascade' }),
    status: text('status').$type<LeadStatus>().notNull().default('new'),
    rawNotes: text('raw_notes').notNull(),
    extractedData: jsonb('extracted_data').$type<{ [key: string]: JsonValue }>(),
    extractedAt: timestamp('extracted_at', { withTimezone: true }),
    name: text('name'),
    phone: text('phone'),
    email: text('email'),
    address: text('address'),
    serviceInterest: text('service_interest'),
    leadSource: text('lead_source').$type<LeadSource>(),
    urgency: text('urgency').$type<LeadUrgency>(),
    propertyDetails: text('property_details'),
    reminderAt: timestamp('reminder_at', { withTimezone: true }),
    reminderNote: text('reminder_note'),
    convertedAt: timestamp('converted_at', { withTimezone: true }),
    convertedCustomerId: uuid('converted_customer_id').references(() => customers.id),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
    deletedAt: deletedAt(),
  },
  (table) => [
    index('idx_leads_status').on(table.tenantId, table.status),
    check(
      'leads_converted_has_customer',
      sql`${table.status} <> 'converted' OR (${table.convertedCustomerId} IS NOT NULL AND ${table.convertedAt} IS NOT NULL)`,
    ),
  ],
)

// ── Customer knowledge ────────────────────────────────────────────────────
export const notes = pgTable(
  'notes',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: uuid('tenant_id')
      .notNull()
      .references(() => tenants.id, { onDelete: 'cascade' }),
    customerId: uuid('customer_id')
      .notNull()
      .references(() => customers.id, { onDelete: 'cascade' }),
    ticketId: uuid('ticket_id').references(() => tickets.id),
    content: text('content').notNull(),
    processedAt: timestamp('processed_at', { withTimezone: true }),
    createdAt: createdAt(),
  },
  (table) => [index('idx_notes_customer').on(table.tenantId, table.customerId)],
)

export const attributes = pgTable(
  'attributes',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: uuid('tenant_id')
      .notNull()
      .references(() => tenants.id, { onDelete: 'cascade' }),
    customerId: uuid('customer_id')
      .notNull()
      .references(() => customers.id, { onDelete: 'cascade' }),
    key: text('key').notNull(),
    value: jsonb('value').$type<JsonValue>().notNull(),
    sourceType: text('source_type').$type<AttributeSource>().notNull().default('manual'),
    sourceNoteId: uuid('source_note_id').references(() => notes.id),
    confidence: real('confidence'),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  (table) => [uniqueIndex('uq_attributes_customer_key').on(table.customerId, table.key)],
)

export const waitlist = pgTable(
  'waitlist',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: uuid('tenant_id')
      .notNull()
      .references(() => tenants.id, { onDelete: 'cascade' }),
    customerId: uuid('customer_id')
      .notNull()
      .references(() => customers.id, { onDelete: 'cascade' }),
    nearCustomerId: uuid('near_customer_id').references(() => customers.id),
    nearAddressId: uuid('near_address_id').references(() => addresses.id),
    preferredDates: text('preferred_dates'),
    preferredTimeOfDay: text('preferred_time_of_day').$type<TimeOfDay>(),
    notes: text('notes'),
    isActive: boolean('is_active').notNull().default(true),
    notifiedAt: timestamp('notified_at', { withTimezone: true }),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  (table) => [uniqueIndex('uq_waitlist_customer').on(table.customerId)],
)

// ── Audit trail ───────────────────────────────────────────────────────────
export const auditLog = pgTable(
  'audit_log',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: uuid('tenant_id')
      .notNull()
      .references(() => tenants.id, { onDelete: 'cascade' }),
    entityType: text('entity_type').$type<AuditEntityType>().notNull(),
    entityId: uuid('entity_id').notNull(),
    action: text('action').$type<AuditAction>().notNull(),
    changes: jsonb('changes').$type<FieldChanges>().notNull(),
    actor: text('actor'),
    createdAt: createdAt(),
  },
  (table) => [index('idx_audit_log_entity').on(table.tenantId, table.entityType, table.entityId)],
)

export type TicketRow = typeof tickets.$inferSelect
export type LineItemRow = typeof lineItems.$inferSelect
export type InvoiceRow = typeof invoices.$inferSelect
export type ServiceRow = typeof services.$inferSelect
export type CustomerRow = typeof customers.$inferSelect
export type AddressRow = typeof addresses.$inferSelect
export type RecurringTemplateRow = typeof recurringTemplates.$inferSelect
export type LeadRow = typeof leads.$inferSelect
