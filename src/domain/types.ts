export type ItemType = 'asset' | 'liability';
export type ItemStatus = 'active' | 'inactive';

export type CategoryId = string;
export type ItemId = string;

export interface Category {
  id: CategoryId;
  name: string;
  keywords: string[];
}

export interface FinancialItem {
  id: ItemId;
  name: string;
  categoryId: CategoryId;
  liquid: boolean;
  type: ItemType;
  status: ItemStatus;
  targetBalance?: number;
}

export type Balances = Record<ItemId, number>;

export interface Snapshot {
  date: string; // YYYY-MM-DD
  balances: Balances;
}

export interface FinancialGoal {
  targetNetWorth: number;
}

export interface IdCounters {
  category: number;
  item: number;
}

export interface LedgerState {
  categories: Category[];
  items: FinancialItem[];
  snapshots: Snapshot[]; // ascending by date
  goal: FinancialGoal | null;
  counters: IdCounters;
}

export interface Totals {
  totalAssets: number;
  totalLiabilities: number;
  netWorth: number;
}

export interface Point { x: string; y: number }
