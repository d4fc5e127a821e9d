export type { RecordSource, RunQuery, PlanQuery } from './record-source.js';
export { ApiRecordSource } from './api-source.js';
export { InMemoryRecordSource } from './memory-source.js';
