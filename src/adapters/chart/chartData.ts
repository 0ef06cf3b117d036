import type { BarRow, ChartData, IChartProvider } from '../../ports/chart';

// Produces chart.js-shaped data; drawing is left to the client.
export const ChartDataProvider: IChartProvider = {
  pie(totals, title, emptyMessage) {
    const chart: ChartData = {
      type: 'pie',
      title,
      labels: [...totals.keys()],
      datasets: [{ label: title, data: [...totals.values()] }],
    };
    if (!totals.size) chart.empty = emptyMessage ?? 'No data available';
    return chart;
  },
  bar(rows, series, title, emptyMessage) {
    const chart: ChartData = {
      type: 'bar',
      title,
      labels: rows.map((r) => r.label),
      datasets: series.map((name) => ({ label: name, data: rows.map((r) => valueOf(r, name)) })),
    };
    if (!rows.length) chart.empty = emptyMessage ?? 'No data available';
    return chart;
  },
  line(series, title) {
    const chart: ChartData = {
      type: 'line',
      title,
      labels: series.data.map((p) => p.x),
      datasets: [{ label: series.name, data: series.data.map((p) => p.y) }],
    };
    if (!series.data.length) chart.empty = 'No data available';
    return chart;
  },
};

function valueOf(row: BarRow, name: string): number {
  return row.values[name] ?? 0;
}
