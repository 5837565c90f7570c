import type { Point } from '../domain/types';

export interface IChartProvider {
  renderLine(series: { name: string; data: Point[] }, options?: Record<string, unknown>): void;
}
