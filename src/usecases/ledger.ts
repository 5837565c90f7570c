import type { FinancialGoal, LedgerState } from '../domain/types';
import type { ILogger } from '../ports/logger';
import { InvalidInputError } from '../domain/errors';
import { silentLogger } from '../adapters/logger/consoleLogger';
import { CategoryRegistry } from './categories';
import { ItemRegistry } from './items';
import { SnapshotStore } from './snapshots';
import { ReconciliationEngine } from './reconciliation';
import { NetWorthAggregator } from './analytics';

export function emptyState(): LedgerState {
  return { categories: [], items: [], snapshots: [], goal: null, counters: { category: 0, item: 0 } };
}

/**
 * One in-memory ledger: the two registries, the snapshot store and the
 * engines that read or reconcile across them.
 */
export class Ledger {
  readonly categories: CategoryRegistry;
  readonly items: ItemRegistry;
  readonly snapshots: SnapshotStore;
  readonly reconciliation: ReconciliationEngine;
  readonly aggregator: NetWorthAggregator;
  private financialGoal: FinancialGoal | null;

  constructor(state: LedgerState = emptyState(), log: ILogger = silentLogger){
    // The lookups close over fields assigned below; none is called during construction.
    this.categories = new CategoryRegistry(
      { has: id => this.items.has(id), countInCategory: id => this.items.countInCategory(id) },
      log, state.categories, state.counters.category);
    this.items = new ItemRegistry(
      { has: id => this.categories.has(id) },
      { referencesItem: id => this.snapshots.referencesItem(id) },
      log, state.items, state.counters.item);
    this.snapshots = new SnapshotStore({ has: id => this.items.has(id) }, log, state.snapshots);
    this.reconciliation = new ReconciliationEngine(this.categories, this.items, this.snapshots, log);
    this.aggregator = new NetWorthAggregator(this.categories, this.items, this.snapshots, () => this.goal());
    this.financialGoal = state.goal && { ...state.goal };
  }

  goal(): FinancialGoal | null {
    return this.financialGoal && { ...this.financialGoal };
  }

  setGoal(goal: FinancialGoal | null): void {
    if (goal && (!Number.isFinite(goal.targetNetWorth) || goal.targetNetWorth < 0)) {
      throw new InvalidInputError(`target net worth must be a non-negative number, got ${goal.targetNetWorth}`);
    }
    this.financialGoal = goal && { ...goal };
  }

  toState(): LedgerState {
    return {
      categories: this.categories.list(),
      items: this.items.list(),
      snapshots: this.snapshots.list(),
      goal: this.goal(),
      counters: { category: this.categories.nextCounter(), item: this.items.nextCounter() },
    };
  }
}
