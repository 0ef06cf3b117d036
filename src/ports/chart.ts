import type { Point } from '../domain/types';

export type ChartType = 'pie' | 'bar' | 'line';

export interface ChartDataset { label: string; data: number[] }

/** chart.js-shaped payload handed to whatever renders it. */
export interface ChartData {
  type: ChartType;
  title: string;
  labels: string[];
  datasets: ChartDataset[];
  empty?: string;
}

export interface BarRow { label: string; values: Record<string, number> }

export interface IChartProvider {
  pie(totals: ReadonlyMap<string, number>, title: string, emptyMessage?: string): ChartData;
  bar(rows: readonly BarRow[], series: readonly string[], title: string, emptyMessage?: string): ChartData;
  line(series: { name: string; data: Point[] }, title: string): ChartData;
}
