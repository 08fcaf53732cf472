export type { AuditStore } from './interface.js'
export { JsonlAuditStore } from './jsonl.js'
