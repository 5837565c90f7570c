import { describe, it, expect, vi } from 'vitest';
import { Ledger } from '../ledger';
import { renderSeries } from '../analytics';
import { loadDocument } from '../document';
import { NotFoundError } from '../../domain/errors';
import type { IChartProvider } from '../../ports/chart';

function houseScenario() {
  const ledger = new Ledger();
  const property = ledger.categories.create('Property');
  const house = ledger.items.create('House', property, false, 'asset');
  ledger.snapshots.addSnapshot('2024-01-01', { [house]: 300000 });
  ledger.snapshots.addSnapshot('2024-06-01', { [house]: 310000 });
  return { ledger, property, house };
}

function mixed() {
  const ledger = new Ledger();
  const property = ledger.categories.create('Property');
  const bank = ledger.categories.create('Current Account');
  const debt = ledger.categories.create('Mortgage');
  const house = ledger.items.create('House', property, false, 'asset');
  const current = ledger.items.create('Current', bank, true, 'asset');
  const mortgage = ledger.items.create('Mortgage', debt, false, 'liability');
  ledger.snapshots.addSnapshot('2024-01-01', { [house]: 300000, [current]: 5000, [mortgage]: 200000 });
  // legacy-style negative liability reads the same as its magnitude
  ledger.snapshots.addSnapshot('2024-02-01', { [house]: 300000, [current]: 7000, [mortgage]: -199000 });
  ledger.snapshots.addSnapshot('2024-03-01', { [current]: 8000 });
  return { ledger, property, bank, debt, house, current, mortgage };
}

describe('NetWorthAggregator', () => {
  it('totals and history for a single house', () => {
    const { ledger, house } = houseScenario();
    expect(ledger.aggregator.totals('2024-06-01')).toEqual({ totalAssets: 310000, totalLiabilities: 0, netWorth: 310000 });
    expect([...ledger.snapshots.history(house)]).toEqual([
      { x: '2024-01-01', y: 300000 },
      { x: '2024-06-01', y: 310000 },
    ]);
  });

  it('reflects a corrected balance', () => {
    const { ledger, house } = houseScenario();
    ledger.snapshots.updateSnapshot('2024-06-01', { [house]: 320000 });
    expect([...ledger.snapshots.history(house)].at(-1)).toEqual({ x: '2024-06-01', y: 320000 });
    expect(ledger.aggregator.totals('2024-01-01').netWorth).toBe(300000);
  });

  it('gives zeros for a snapshot without balances', () => {
    const ledger = new Ledger();
    ledger.snapshots.addSnapshot('2024-01-01', {});
    expect(ledger.aggregator.totals('2024-01-01')).toEqual({ totalAssets: 0, totalLiabilities: 0, netWorth: 0 });
    expect(ledger.aggregator.byCategory('2024-01-01')).toEqual({});
  });

  it('fails for a date with no snapshot', () => {
    const { ledger } = houseScenario();
    expect(() => ledger.aggregator.totals('2024-02-01')).toThrow(NotFoundError);
  });

  it('subtracts liabilities as magnitudes', () => {
    const { ledger } = mixed();
    expect(ledger.aggregator.totals('2024-01-01')).toEqual({ totalAssets: 305000, totalLiabilities: 200000, netWorth: 105000 });
    expect(ledger.aggregator.totals('2024-02-01')).toEqual({ totalAssets: 307000, totalLiabilities: 199000, netWorth: 108000 });
  });

  it('includes archived items on the dates they were recorded', () => {
    const { ledger, current } = mixed();
    ledger.items.delete(current);
    expect(ledger.aggregator.totals('2024-03-01').totalAssets).toBe(8000);
  });

  it('subtotals by category and leaves out categories without a balance', () => {
    const { ledger, property, bank, debt } = mixed();
    expect(ledger.aggregator.byCategory('2024-01-01')).toEqual({ [property]: 300000, [bank]: 5000, [debt]: -200000 });
    expect(ledger.aggregator.byCategory('2024-03-01')).toEqual({ [bank]: 8000 });
  });

  describe('series', () => {
    it('net worth per snapshot date', () => {
      const { ledger } = mixed();
      expect([...ledger.aggregator.series('networth')]).toEqual([
        { x: '2024-01-01', y: 105000 },
        { x: '2024-02-01', y: 108000 },
        { x: '2024-03-01', y: 8000 },
      ]);
    });

    it('an item series skips dates without a record', () => {
      const { ledger, house } = mixed();
      expect([...ledger.aggregator.series(house)]).toEqual([
        { x: '2024-01-01', y: 300000 },
        { x: '2024-02-01', y: 300000 },
      ]);
    });

    it('a category series sums its items and is restartable', () => {
      const { ledger, debt } = mixed();
      const s = ledger.aggregator.series(debt);
      const expected = [
        { x: '2024-01-01', y: -200000 },
        { x: '2024-02-01', y: -199000 },
      ];
      expect([...s]).toEqual(expected);
      expect([...s]).toEqual(expected);
    });

    it('rejects an unknown key', () => {
      const { ledger } = mixed();
      expect(() => ledger.aggregator.series('nope')).toThrow(NotFoundError);
      expect(() => ledger.aggregator.series('nope')).toThrow('series not found: nope');
    });
  });

  it('summarizes a date against the previous snapshot', () => {
    const { ledger, property, bank } = mixed();
    const s = ledger.aggregator.summary('2024-02-01');
    expect(s).toEqual({
      date: '2024-02-01',
      totalAssets: 307000,
      totalLiabilities: 199000,
      netWorth: 108000,
      liquidAssets: 7000,
      nonLiquidAssets: 300000,
      liquidPercentage: (7000 / 307000) * 100,
      itemCount: 3,
      categoryCount: 3,
      topCategories: [
        { categoryId: property, name: 'Property', total: 300000 },
        { categoryId: bank, name: 'Current Account', total: 7000 },
      ],
      change: { value: 3000, percentage: (3000 / 105000) * 100 },
    });
    expect(ledger.aggregator.summary('2024-01-01').change).toBeNull();
  });

  it('tracks the financial goal and item targets', () => {
    const { ledger, house } = houseScenario();
    expect(ledger.aggregator.goalProgress('2024-06-01')).toBeNull();
    ledger.setGoal({ targetNetWorth: 620000 });
    expect(ledger.aggregator.goalProgress('2024-06-01')).toEqual({
      targetNetWorth: 620000,
      netWorth: 310000,
      remaining: 310000,
      percentage: 50,
      reached: false,
    });
    ledger.items.update(house, { targetBalance: 620000 });
    expect(ledger.aggregator.targetProgress('2024-06-01')).toEqual([
      { itemId: house, name: 'House', targetBalance: 620000, balance: 310000, percentage: 50 },
    ]);
  });

  it('handles ids that collide with object property names', () => {
    const ledger = loadDocument({
      categories: [{ id: 'constructor', name: 'Odd', keywords: [] }],
      financial_items: [
        { id: 'item_1', name: 'Jar', category_id: 'constructor', liquid: true, type: 'asset' },
        { id: 'toString', name: 'Pot', category_id: 'constructor', liquid: true, type: 'asset', target_balance: 100 },
      ],
      snapshots: [{ date: '2024-01-01', balances: [{ item_id: 'item_1', balance: 5 }] }],
    });
    expect(ledger.aggregator.byCategory('2024-01-01')).toEqual({ constructor: 5 });
    expect(ledger.aggregator.targetProgress('2024-01-01')).toEqual([
      { itemId: 'toString', name: 'Pot', targetBalance: 100, balance: null, percentage: null },
    ]);
  });

  it('hands a series to the chart collaborator', () => {
    const { ledger } = houseScenario();
    const chart: IChartProvider = { renderLine: vi.fn() };
    const data = renderSeries(chart, ledger.aggregator, 'networth', 'Net worth');
    expect(data).toEqual([{ x: '2024-01-01', y: 300000 }, { x: '2024-06-01', y: 310000 }]);
    expect(chart.renderLine).toHaveBeenCalledWith({ name: 'Net worth', data });
  });
});
