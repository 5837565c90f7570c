import type { INetWorthAggregator, SeriesKey } from '../ports/analytics';
import type { IChartProvider } from '../ports/chart';
import type { CategoryId, FinancialGoal, FinancialItem, ItemId, Point, Snapshot, Totals } from '../domain/types';
import type { CategoryRegistry } from './categories';
import type { ItemRegistry } from './items';
import type { SnapshotStore } from './snapshots';
import { NotFoundError } from '../domain/errors';

export interface CategoryTotal {
  categoryId: CategoryId;
  name: string;
  total: number;
}

export interface NetWorthSummary extends Totals {
  date: string;
  liquidAssets: number;
  nonLiquidAssets: number;
  liquidPercentage: number;
  itemCount: number;
  categoryCount: number;
  topCategories: CategoryTotal[];
  /** Versus the snapshot before `date`; null when there is none. */
  change: { value: number; percentage: number | null } | null;
}

export interface GoalProgress {
  targetNetWorth: number;
  netWorth: number;
  remaining: number;
  percentage: number;
  reached: boolean;
}

export interface TargetProgress {
  itemId: ItemId;
  name: string;
  targetBalance: number;
  balance: number | null;
  percentage: number | null;
}

/**
 * Read-only figures over the registries and the snapshot store. Holds no
 * state of its own; every call reflects the current data.
 */
export class NetWorthAggregator implements INetWorthAggregator {
  constructor(
    private readonly categories: CategoryRegistry,
    private readonly items: ItemRegistry,
    private readonly snapshots: SnapshotStore,
    private readonly goal: () => FinancialGoal | null,
  ){}

  totals(date: string): Totals {
    return this.totalsOf(this.require(date));
  }

  byCategory(date: string): Record<CategoryId, number> {
    const out = new Map<CategoryId, number>();
    for (const [item, amount] of this.entries(this.require(date))){
      out.set(item.categoryId, (out.get(item.categoryId) ?? 0) + contribution(item, amount));
    }
    return Object.fromEntries(out);
  }

  series(key: SeriesKey): Iterable<Point> {
    if (key === 'networth') {
      return restartable(() => this.netWorthPoints());
    }
    const item = this.items.get(key);
    if (item) return this.snapshots.history(item.id);
    if (this.categories.has(key)) {
      return restartable(() => this.categoryPoints(key));
    }
    throw new NotFoundError('series', key);
  }

  summary(date: string): NetWorthSummary {
    const snap = this.require(date);
    const totals = this.totalsOf(snap);
    let liquidAssets = 0;
    const used = new Set<CategoryId>();
    let itemCount = 0;
    for (const [item, amount] of this.entries(snap)){
      itemCount++;
      used.add(item.categoryId);
      if (item.type === 'asset' && item.liquid) liquidAssets += amount;
    }
    const topCategories = Object.entries(this.byCategory(date))
      .filter(([,total]) => total > 0)
      .sort((a,b)=> b[1] - a[1])
      .slice(0, 3)
      .map(([categoryId, total]) => ({ categoryId, name: this.categories.get(categoryId)?.name ?? categoryId, total }));

    const prev = this.snapshots.previous(date);
    let change: NetWorthSummary['change'] = null;
    if (prev) {
      const before = this.totalsOf(prev).netWorth;
      const value = totals.netWorth - before;
      change = { value, percentage: before === 0 ? null : (value / Math.abs(before)) * 100 };
    }

    return {
      date,
      ...totals,
      liquidAssets,
      nonLiquidAssets: totals.totalAssets - liquidAssets,
      liquidPercentage: totals.totalAssets > 0 ? (liquidAssets / totals.totalAssets) * 100 : 0,
      itemCount,
      categoryCount: used.size,
      topCategories,
      change,
    };
  }

  goalProgress(date: string): GoalProgress | null {
    const goal = this.goal();
    if (!goal) return null;
    const { netWorth } = this.totals(date);
    const target = goal.targetNetWorth;
    return {
      targetNetWorth: target,
      netWorth,
      remaining: Math.max(0, target - netWorth),
      percentage: target === 0 ? 100 : (netWorth / target) * 100,
      reached: netWorth >= target,
    };
  }

  targetProgress(date: string): TargetProgress[] {
    const snap = this.require(date);
    const out: TargetProgress[] = [];
    for (const item of this.items.list()){
      if (item.targetBalance === undefined) continue;
      const balance = Object.hasOwn(snap.balances, item.id) ? snap.balances[item.id] : null;
      out.push({
        itemId: item.id,
        name: item.name,
        targetBalance: item.targetBalance,
        balance,
        percentage: balance === null || item.targetBalance === 0 ? null : (balance / item.targetBalance) * 100,
      });
    }
    return out;
  }

  private *netWorthPoints(): Generator<Point> {
    for (const s of this.snapshots.list()) yield { x: s.date, y: this.totalsOf(s).netWorth };
  }

  private *categoryPoints(categoryId: CategoryId): Generator<Point> {
    for (const s of this.snapshots.list()){
      let total = 0;
      let seen = false;
      for (const [item, amount] of this.entries(s)){
        if (item.categoryId !== categoryId) continue;
        total += contribution(item, amount);
        seen = true;
      }
      if (seen) yield { x: s.date, y: total };
    }
  }

  private totalsOf(snap: Snapshot): Totals {
    let totalAssets = 0;
    let totalLiabilities = 0;
    for (const [item, amount] of this.entries(snap)){
      if (item.type === 'asset') totalAssets += amount;
      else totalLiabilities += Math.abs(amount);
    }
    return { totalAssets, totalLiabilities, netWorth: totalAssets - totalLiabilities };
  }

  private entries(snap: Snapshot): Array<[FinancialItem, number]> {
    const out: Array<[FinancialItem, number]> = [];
    for (const [id, amount] of Object.entries(snap.balances)){
      const item = this.items.get(id);
      if (item) out.push([item, amount]);
    }
    return out;
  }

  private require(date: string): Snapshot {
    const snap = this.snapshots.get(date);
    if (!snap) throw new NotFoundError('snapshot', date);
    return snap;
  }
}

/** Hands a series to the chart collaborator; rendering itself is not awaited. */
export function renderSeries(chart: IChartProvider, aggregator: INetWorthAggregator, key: SeriesKey, name = key): Point[] {
  const data = [...aggregator.series(key)];
  chart.renderLine({ name, data });
  return data;
}

// Liabilities count against net worth whatever sign they were entered with.
function contribution(item: FinancialItem, amount: number): number {
  return item.type === 'asset' ? amount : -Math.abs(amount);
}

function restartable<T>(make: () => Iterator<T>): Iterable<T> {
  return { [Symbol.iterator]: make };
}
