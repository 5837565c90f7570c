import type { CategoryId, FinancialItem, ItemId, ItemType } from '../domain/types';
import type { IBalanceLookup, ICategoryLookup } from '../ports/lookups';
import type { ILogger } from '../ports/logger';
import { ImmutableFieldError, InvalidInputError, NotFoundError } from '../domain/errors';
import { ITEM_PREFIX, formatId, maxIdNumber } from '../utils/ids';

export interface ItemPatch {
  name?: string;
  categoryId?: CategoryId;
  liquid?: boolean;
  type?: ItemType;
  targetBalance?: number | null;
}

export type DeleteOutcome = 'archived' | 'removed';

export class ItemRegistry {
  private readonly byId = new Map<ItemId, FinancialItem>();
  private counter: number;

  constructor(
    private readonly categories: ICategoryLookup,
    private readonly balances: IBalanceLookup,
    private readonly log: ILogger,
    initial: FinancialItem[] = [],
    counter = 0,
  ){
    for (const it of initial) this.byId.set(it.id, { ...it });
    this.counter = Math.max(counter, maxIdNumber(this.byId.keys(), ITEM_PREFIX));
  }

  create(name: string, categoryId: CategoryId, liquid: boolean, type: ItemType, opts: { targetBalance?: number } = {}): ItemId {
    const clean = requireName(name);
    if (!this.categories.has(categoryId)) throw new NotFoundError('category', categoryId);
    if (opts.targetBalance !== undefined) requireAmount(opts.targetBalance);
    const id = formatId(ITEM_PREFIX, this.counter + 1);
    this.counter += 1;
    const item: FinancialItem = { id, name: clean, categoryId, liquid, type, status: 'active' };
    if (opts.targetBalance !== undefined) item.targetBalance = opts.targetBalance;
    this.byId.set(id, item);
    this.log.debug(`item created ${id} "${clean}" (${type})`);
    return id;
  }

  update(id: ItemId, patch: ItemPatch): void {
    const item = this.require(id);
    const name = patch.name === undefined ? undefined : requireName(patch.name);
    if (patch.categoryId !== undefined && !this.categories.has(patch.categoryId)) {
      throw new NotFoundError('category', patch.categoryId);
    }
    if (patch.type !== undefined && patch.type !== item.type && this.balances.referencesItem(id)) {
      throw new ImmutableFieldError(id, 'type');
    }
    if (patch.targetBalance != null) requireAmount(patch.targetBalance);

    if (name !== undefined) item.name = name;
    if (patch.categoryId !== undefined) item.categoryId = patch.categoryId;
    if (patch.liquid !== undefined) item.liquid = patch.liquid;
    if (patch.type !== undefined) item.type = patch.type;
    if (patch.targetBalance === null) delete item.targetBalance;
    else if (patch.targetBalance !== undefined) item.targetBalance = patch.targetBalance;
    this.log.debug(`item updated ${id}`);
  }

  /** Archives the item while snapshots still hold balances for it, removes it otherwise. */
  delete(id: ItemId): DeleteOutcome {
    const item = this.require(id);
    if (this.balances.referencesItem(id)) {
      item.status = 'inactive';
      this.log.debug(`item archived ${id}`);
      return 'archived';
    }
    this.byId.delete(id);
    this.log.debug(`item removed ${id}`);
    return 'removed';
  }

  restore(id: ItemId): void {
    this.require(id).status = 'active';
  }

  listActive(): FinancialItem[] {
    return this.list().filter(i => i.status === 'active');
  }

  list(): FinancialItem[] {
    return Array.from(this.byId.values(), i => ({ ...i }));
  }

  get(id: ItemId): FinancialItem | undefined {
    const i = this.byId.get(id);
    return i && { ...i };
  }

  has(id: ItemId): boolean {
    return this.byId.has(id);
  }

  countInCategory(categoryId: CategoryId): number {
    let n = 0;
    for (const i of this.byId.values()) if (i.categoryId === categoryId) n++;
    return n;
  }

  nextCounter(): number {
    return this.counter;
  }

  private require(id: ItemId): FinancialItem {
    const i = this.byId.get(id);
    if (!i) throw new NotFoundError('item', id);
    return i;
  }
}

function requireName(name: string): string {
  const clean = name.trim();
  if (!clean) throw new InvalidInputError('item name must not be empty');
  return clean;
}

function requireAmount(n: number){
  if (!Number.isFinite(n)) throw new InvalidInputError(`amount must be a finite number, got ${n}`);
}
