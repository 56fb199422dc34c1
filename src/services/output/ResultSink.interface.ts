import type { AssertionRecord } from '../../domain/package.js';

export interface ResultSink {
  /** Appends one record as a single line; concurrent callers are serialized. */
  append(record: AssertionRecord): Promise<void>;
  close(): Promise<void>;
}
