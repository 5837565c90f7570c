import type { CategoryId, ItemId } from '../domain/types';
import type { ILogger } from '../ports/logger';
import type { CategoryRegistry } from './categories';
import type { ItemRegistry } from './items';
import type { SnapshotStore } from './snapshots';
import { ConflictError, NotFoundError } from '../domain/errors';

/**
 * Edits that touch more than one of categories, items and snapshots. Each
 * one checks everything it can before the first write.
 */
export class ReconciliationEngine {
  constructor(
    private readonly categories: CategoryRegistry,
    private readonly items: ItemRegistry,
    private readonly snapshots: SnapshotStore,
    private readonly log: ILogger,
  ){}

  /** Folds `dropId` into `keepId` across every snapshot, then removes `dropId`. */
  mergeItems(keepId: ItemId, dropId: ItemId): void {
    const keep = this.items.get(keepId);
    if (!keep) throw new NotFoundError('item', keepId);
    const drop = this.items.get(dropId);
    if (!drop) throw new NotFoundError('item', dropId);
    if (keepId === dropId) throw new ConflictError(`cannot merge ${keepId} into itself`, keepId);
    if (keep.type !== drop.type) {
      throw new ConflictError(`cannot merge ${drop.type} ${dropId} into ${keep.type} ${keepId}`, dropId);
    }
    const moved = this.snapshots.reassignItem(dropId, keepId);
    this.items.delete(dropId);
    this.log.info(`merged ${dropId} into ${keepId} (${moved} balances moved)`);
  }

  moveItems(fromId: CategoryId, toId: CategoryId): ItemId[] {
    if (!this.categories.has(fromId)) throw new NotFoundError('category', fromId);
    if (!this.categories.has(toId)) throw new NotFoundError('category', toId);
    const moved = this.items.list().filter(i => i.categoryId === fromId).map(i => i.id);
    for (const id of moved) this.items.update(id, { categoryId: toId });
    return moved;
  }

  /**
   * Deletes a category. With `reassignTo` its items move there first;
   * without it a category still in use is refused.
   */
  deleteCategory(id: CategoryId, opts: { reassignTo?: CategoryId } = {}): void {
    if (!this.categories.has(id)) throw new NotFoundError('category', id);
    if (opts.reassignTo !== undefined) {
      if (opts.reassignTo === id) throw new ConflictError(`cannot reassign ${id} to itself`, id);
      this.moveItems(id, opts.reassignTo);
    }
    this.categories.delete(id);
  }
}
