/**
 * Source framework types
 */

import type { Document } from 'mongodb';

export interface Source {
  readonly name: string;
  readonly kind: string;
}

/**
 * Result stream of a store read. Must be closed on every exit path.
 */
export interface DocumentCursor extends AsyncIterable<unknown> {
  close(): Promise<void>;
}

export interface DocumentCollection {
  find(filter: Document): DocumentCursor;
  aggregate(pipeline: Document[]): DocumentCursor;
}

export interface MongoDBSource extends Source {
  readonly kind: 'mongodb';
  readonly databaseName: string;
  collection(name: string): DocumentCollection;
}

export type SourceMap = ReadonlyMap<string, Source>;
