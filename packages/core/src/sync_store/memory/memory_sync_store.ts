import { DocumentSyncStore, emptyDocument } from '../document_sync_store';
import type { DocumentSyncStoreOptions } from '../document_sync_store';
import type { SyncStoreDocument } from '../sync_store.types';

export type MemorySyncStoreOptions = DocumentSyncStoreOptions & {
  /** Initial document */
  initial?: SyncStoreDocument;
};

/**
 * MemorySyncStore - In-memory ISyncStore
 *
 * Designed for unit tests and scenarios without persistence.
 *
 * @example
 * const store = new MemorySyncStore();
 * await store.transaction(async (tx) => tx.getOrCreateRepository('gecko'));
 * expect(store.snapshot().repositories).toHaveLength(1);
 */
export class MemorySyncStore extends DocumentSyncStore {
  private document: SyncStoreDocument;
  private failNextSave: Error | null = null;

  constructor(options: MemorySyncStoreOptions = {}) {
    super(options);
    this.document = options.initial ? structuredClone(options.initial) : emptyDocument();
  }

  protected async load(): Promise<SyncStoreDocument> {
    return this.document;
  }

  protected async save(document: SyncStoreDocument): Promise<void> {
    if (this.failNextSave) {
      const error = this.failNextSave;
      this.failNextSave = null;
      throw error;
    }
    this.document = document;
  }

  // ─────────────────────────────────────────────────────────
  // Test Helpers (not part of ISyncStore, only for tests)
  // ─────────────────────────────────────────────────────────

  /** Returns a copy of the committed document */
  snapshot(): SyncStoreDocument {
    return structuredClone(this.document);
  }

  /** Makes the next commit fail with `error` */
  failNextCommit(error: Error): void {
    this.failNextSave = error;
  }
}
