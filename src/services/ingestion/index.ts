export { readCorpus, ingestDocuments, documentContentHash } from './corpus.js';
export type { CorpusReadResult, IngestResult, SkippedRecord } from './corpus.js';
