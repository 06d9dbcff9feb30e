export { ingestUtterance } from './ingest.js';
export type { IngestSummary } from './ingest.js';
