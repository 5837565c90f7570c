import type { CategoryId, ItemId } from '../domain/types';

// Narrow views the registries get of each other, so none of them holds
// another's container.
export interface ICategoryLookup {
  has(id: CategoryId): boolean;
}

export interface IItemLookup {
  has(id: ItemId): boolean;
  countInCategory(id: CategoryId): number;
}

export interface IBalanceLookup {
  referencesItem(id: ItemId): boolean;
}
