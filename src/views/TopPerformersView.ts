import { BarChart } from '../components/BarChart';
import { ScatterChart } from '../components/ScatterChart';
import { MetricDefinition, formatMetricValue } from '../config/metrics';
import type { TopPerformersResult } from '../controllers/DashboardController';
import type { FilteredView } from '../models/Dataset';
import { metricValue } from '../services/RankingService';
import { escapeHtml, renderOptions } from '../utils/html';

export interface TopPerformersViewOptions {
  metrics: MetricDefinition[];
  onScatterMetricsChange: (xKey: string, yKey: string) => void;
  onBarMetricChange: (key: string) => void;
}

export interface TopPerformersSelection {
  scatterXMetric: string;
  scatterYMetric: string;
  barMetric: string;
}

const SCATTER_CONTAINER_ID = 'top-performers-scatter';
const BAR_CONTAINER_ID = 'top-performers-bar';

export class TopPerformersView {
  private container: HTMLElement;
  private options: TopPerformersViewOptions;
  private scatterChart: ScatterChart | null = null;
  private barChart: BarChart | null = null;

  constructor(container: HTMLElement, options: TopPerformersViewOptions) {
    this.container = container;
    this.options = options;
  }

  render(result: TopPerformersResult, selection: TopPerformersSelection): void {
    this.destroyCharts();

    const metricOptions = this.options.metrics.map((metric) => ({ value: metric.key, label: metric.label }));
    const controls = `
      <div class="metric-controls">
        <label class="control-label">Select X-axis Metric
          <select id="scatter-x-metric" class="control-select">${renderOptions(metricOptions, selection.scatterXMetric)}</select>
        </label>
        <label class="control-label">Select Y-axis Metric
          <select id="scatter-y-metric" class="control-select">${renderOptions(metricOptions, selection.scatterYMetric)}</select>
        </label>
        <label class="control-label">Select Bar Chart Metric
          <select id="bar-metric" class="control-select">${renderOptions(metricOptions, selection.barMetric)}</select>
        </label>
      </div>
    `;

    if (result.status === 'empty') {
      this.container.innerHTML = `
        <h2 class="section-title">Identify Top Performers</h2>
        ${controls}
        <div class="notice notice-warning">${escapeHtml(result.message)}</div>
      `;
      this.attachEventListeners();
      return;
    }

    const { metricX, metricY, barMetric } = result;

    this.container.innerHTML = `
      <h2 class="section-title">Identify Top Performers</h2>
      ${controls}

      <h3 class="chart-title">${escapeHtml(metricY.label)} vs. ${escapeHtml(metricX.label)}</h3>
      <div id="${SCATTER_CONTAINER_ID}" class="chart-container"></div>
      <p class="chart-help">
        <strong>How to Read:</strong> Players further to the <strong>top-right</strong> are strong in both
        selected metrics. Colour shows primary position; hover a point for the player's details.
      </p>

      <hr class="divider" />

      <h3 class="chart-title">Top ${result.ranking.length} Players by ${escapeHtml(barMetric.label)}</h3>
      <div id="${BAR_CONTAINER_ID}" class="chart-container"></div>
      <p class="chart-help">
        <strong>How to Read:</strong> Longer bars mean a higher value for the selected metric.
        Colour shows primary position.
      </p>

      <details class="data-table-toggle">
        <summary>Show Filtered Data Table (${result.rows.length} players)</summary>
        ${this.renderTable(result.rows)}
      </details>
    `;

    this.attachEventListeners();

    this.scatterChart = new ScatterChart({
      containerId: SCATTER_CONTAINER_ID,
      points: result.points,
      metricX,
      metricY,
    });
    this.scatterChart.render();

    this.barChart = new BarChart({
      containerId: BAR_CONTAINER_ID,
      ranking: result.ranking,
      metric: barMetric,
    });
    this.barChart.render();
  }

  destroy(): void {
    this.destroyCharts();
    this.container.innerHTML = '';
  }

  private renderTable(rows: FilteredView): string {
    const metrics = this.options.metrics;
    const header = ['Player', 'Squad', 'Pos', 'Age', 'Min', ...metrics.map((metric) => metric.label)]
      .map((label) => `<th>${escapeHtml(label)}</th>`)
      .join('');

    const body = rows
      .map((player) => {
        const metricCells = metrics
          .map((metric) => `<td class="num">${formatMetricValue(metric, metricValue(player, metric))}</td>`)
          .join('');
        return `
          <tr>
            <td>${escapeHtml(player.name)}</td>
            <td>${escapeHtml(player.team)}</td>
            <td>${escapeHtml(player.positions.join(',') || player.primaryPosition)}</td>
            <td class="num">${player.age}</td>
            <td class="num">${player.minutes}</td>
            ${metricCells}
          </tr>
        `;
      })
      .join('');

    return `
      <div class="table-scroll">
        <table class="data-table">
          <thead><tr>${header}</tr></thead>
          <tbody>${body}</tbody>
        </table>
      </div>
    `;
  }

  private attachEventListeners(): void {
    const xSelect = this.container.querySelector<HTMLSelectElement>('#scatter-x-metric');
    const ySelect = this.container.querySelector<HTMLSelectElement>('#scatter-y-metric');
    const barSelect = this.container.querySelector<HTMLSelectElement>('#bar-metric');
    if (!xSelect || !ySelect || !barSelect) return;

    const emitScatter = (): void => this.options.onScatterMetricsChange(xSelect.value, ySelect.value);
    xSelect.addEventListener('change', emitScatter);
    ySelect.addEventListener('change', emitScatter);
    barSelect.addEventListener('change', () => this.options.onBarMetricChange(barSelect.value));
  }

  private destroyCharts(): void {
    this.scatterChart?.destroy();
    this.scatterChart = null;
    this.barChart?.destroy();
    this.barChart = null;
  }
}
