import type {
  ISyncStore,
  NewSync,
  RepositoryRecord,
  SyncKey,
  SyncRecord,
  SyncStoreDocument,
  SyncStoreTransaction,
  SyncUpdate,
} from './sync_store.types';
import { DuplicateSyncError, SyncNotFoundError, UnknownRepositoryError } from './sync_store.errors';

export function emptyDocument(): SyncStoreDocument {
  return {
    version: 1,
    nextRepositoryId: 1,
    nextSyncId: 1,
    repositories: [],
    syncs: [],
  };
}

function sameKey(sync: SyncRecord, key: SyncKey): boolean {
  return sync.repository === key.repository
    && sync.changeRequestId === key.changeRequestId
    && sync.direction === key.direction;
}

/**
 * SyncStoreTransaction over a private draft of the store document.
 * Returned records are copies; mutating them does not touch the draft.
 */
class DocumentTransaction implements SyncStoreTransaction {
  constructor(
    private readonly draft: SyncStoreDocument,
    private readonly now: () => Date,
  ) {}

  async getRepository(name: string): Promise<RepositoryRecord | null> {
    const repository = this.draft.repositories.find((r) => r.name === name);
    return repository ? { ...repository } : null;
  }

  async getOrCreateRepository(name: string): Promise<RepositoryRecord> {
    const existing = await this.getRepository(name);
    if (existing) {
      return existing;
    }
    const repository = { id: this.draft.nextRepositoryId++, name };
    this.draft.repositories.push(repository);
    return { ...repository };
  }

  async getSync(id: number): Promise<SyncRecord | null> {
    const sync = this.draft.syncs.find((s) => s.id === id);
    return sync ? structuredClone(sync) : null;
  }

  async findSync(key: SyncKey): Promise<SyncRecord | null> {
    const sync = this.draft.syncs.find((s) => sameKey(s, key));
    return sync ? structuredClone(sync) : null;
  }

  async listSyncs(): Promise<SyncRecord[]> {
    return structuredClone(this.draft.syncs);
  }

  async createSync(input: NewSync): Promise<SyncRecord> {
    if (!this.draft.repositories.some((r) => r.name === input.repository)) {
      throw new UnknownRepositoryError(input.repository);
    }
    if (this.draft.syncs.some((s) => sameKey(s, input))) {
      throw new DuplicateSyncError({
        repository: input.repository,
        changeRequestId: input.changeRequestId,
        direction: input.direction,
      });
    }

    const timestamp = this.now().toISOString();
    const sync: SyncRecord = {
      id: this.draft.nextSyncId++,
      repository: input.repository,
      changeRequestId: input.changeRequestId,
      direction: input.direction,
      issueRef: input.issueRef ?? null,
      worktrees: {},
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.draft.syncs.push(sync);
    return structuredClone(sync);
  }

  async updateSync(id: number, update: SyncUpdate): Promise<SyncRecord> {
    const sync = this.draft.syncs.find((s) => s.id === id);
    if (!sync) {
      throw new SyncNotFoundError(id);
    }

    if (update.issueRef !== undefined) {
      sync.issueRef = update.issueRef;
    }
    if (update.worktrees) {
      sync.worktrees = { ...sync.worktrees, ...update.worktrees };
    }
    sync.updatedAt = this.now().toISOString();
    return structuredClone(sync);
  }
}

export type DocumentSyncStoreOptions = {
  /** Clock used for createdAt/updatedAt (default: system time) */
  now?: () => Date;
};

/**
 * Base for stores that persist the whole state as one document.
 *
 * Transactions are serialized in-process: each one loads the document, works
 * on a draft copy and saves the draft only if `work` resolves.
 */
export abstract class DocumentSyncStore implements ISyncStore {
  private queue: Promise<unknown> = Promise.resolve();
  private readonly now: () => Date;

  constructor(options: DocumentSyncStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  protected abstract load(): Promise<SyncStoreDocument>;
  protected abstract save(document: SyncStoreDocument): Promise<void>;

  /** Wraps one whole transaction, e.g. to hold a cross-process lock */
  protected async exclusive<T>(run: () => Promise<T>): Promise<T> {
    return run();
  }

  transaction<T>(work: (tx: SyncStoreTransaction) => Promise<T>): Promise<T> {
    const run = () => this.exclusive(async () => {
      const draft = structuredClone(await this.load());
      const result = await work(new DocumentTransaction(draft, this.now));
      await this.save(draft);
      return result;
    });

    const next = this.queue.then(run, run);
    this.queue = next.catch(() => undefined);
    return next;
  }
}
