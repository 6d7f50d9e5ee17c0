/**
 * Corpus document model
 *
 * @module models/document
 */

/** Fields indexed by the lexical source, in FTS5 column order */
export const LEXICAL_FIELDS = ['title', 'body', 'tags'] as const;
export type LexicalField = (typeof LEXICAL_FIELDS)[number];

/**
 * A document as read from a JSONL corpus file
 */
export interface CorpusDocument {
  doc_id: string;
  title: string;
  body: string;
  tags: string[];
  source?: string;
  created_at?: string;
}

/**
 * A document as stored in a corpus database
 */
export interface StoredDocument extends CorpusDocument {
  content_hash: string;
  ingested_at: string;
}

/**
 * Text handed to the embedder and the cross-encoder for a document
 */
export function documentText(doc: Pick<CorpusDocument, 'title' | 'body'>): string {
  return `${doc.title}\n${doc.body}`.trim();
}

/**
 * Whitespace-collapsed preview, cut to `length` characters with "..."
 */
export function snippet(text: string, length: number = 160): string {
  const collapsed = text.split(/\s+/).filter((part) => part.length > 0).join(' ');
  if (collapsed.length <= length) return collapsed;
  return `${collapsed.slice(0, length - 3)}...`;
}
