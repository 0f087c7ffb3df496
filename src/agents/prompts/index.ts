export * from './classifier'
export * from './checklist-filter'
export * from './missing-items'
export * from './red-flag'
