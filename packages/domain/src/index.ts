// ---------------------------------------------------------------------------
// Public surface of the domain package. Contexts are re-exported whole;
// nothing here adds behaviour.
// ---------------------------------------------------------------------------
export * from './shared/types'
export * from './shared/errors'
export * from './tenant/index'
export * from './catalog/index'
export * from './customer/index'
export * from './lead/index'
export * from './ticket/index'
export * from './pricing/index'
export * from './billing/index'
export * from './recurrence/index'
export * from './events/index'
