export * from './tenant.repository'
export * from './customer.repository'
export * from './address.repository'
export * from './service.repository'
export * from './ticket.repository'
export * from './line-item.repository'
export * from './invoice.repository'
export * from './recurring-template.repository'
export * from './lead.repository'
export * from './knowledge.repository'
export * from './audit.repository'
