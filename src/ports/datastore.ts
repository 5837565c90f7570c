import type { LedgerDocument } from '../usecases/document';

export interface IDocumentStore {
  /** Resolves to null when nothing is stored at `path` yet. */
  read(path: string): Promise<unknown | null>;
  /** Replaces the whole document; never a partial write. */
  write(path: string, doc: LedgerDocument): Promise<void>;
}
