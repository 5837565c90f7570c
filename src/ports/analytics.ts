import type { CategoryId, Point, Totals } from '../domain/types';

export type SeriesKey = 'networth' | string;

export interface INetWorthAggregator {
  totals(date: string): Totals;
  byCategory(date: string): Record<CategoryId, number>;
  series(key: SeriesKey): Iterable<Point>;
}
