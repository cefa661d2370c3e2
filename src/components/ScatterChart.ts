/**
 * ScatterChart Component
 *
 * ApexCharts scatter wrapper for metric-vs-metric plots, one series per
 * primary position.
 */

import ApexCharts from 'apexcharts';
import { MetricDefinition, formatMetricValue } from '../config/metrics';
import { POSITION_ORDER, Position } from '../models/Player';
import type { ScatterPoint } from '../services/RankingService';
import { escapeHtml } from '../utils/html';
import { CHART_FONT_FAMILY, CHART_FORE_COLOR, CHART_GRID_COLOR, POSITION_COLORS } from './chartTheme';

export interface PositionSeries {
  position: Position;
  points: ScatterPoint[];
}

interface ScatterChartConfig {
  containerId: string;
  points: ScatterPoint[];
  metricX: MetricDefinition;
  metricY: MetricDefinition;
  height?: number;
}

/**
 * Split points into per-position series, in the usual GK → FW order.
 * Positions with no points are left out so the legend stays short.
 */
export function groupPointsByPosition(points: ScatterPoint[]): PositionSeries[] {
  return POSITION_ORDER
    .map((position) => ({
      position,
      points: points.filter((point) => point.player.primaryPosition === position),
    }))
    .filter((series) => series.points.length > 0);
}

export class ScatterChart {
  private chart: ApexCharts | null = null;
  private containerId: string;
  private series: PositionSeries[];
  private metricX: MetricDefinition;
  private metricY: MetricDefinition;
  private height: number;

  constructor(config: ScatterChartConfig) {
    this.containerId = config.containerId;
    this.series = groupPointsByPosition(config.points);
    this.metricX = config.metricX;
    this.metricY = config.metricY;
    this.height = config.height ?? 500;
  }

  render(): void {
    const container = document.getElementById(this.containerId);
    if (!container) {
      console.error(`ScatterChart: Container #${this.containerId} not found`);
      return;
    }

    this.chart = new ApexCharts(container, this.buildOptions());
    this.chart.render().catch((error: unknown) => {
      console.error('ScatterChart: render failed', error);
    });
  }

  destroy(): void {
    if (this.chart) {
      this.chart.destroy();
      this.chart = null;
    }
  }

  private buildOptions(): ApexCharts.ApexOptions {
    return {
      chart: {
        type: 'scatter',
        height: this.height,
        background: 'transparent',
        foreColor: CHART_FORE_COLOR,
        fontFamily: CHART_FONT_FAMILY,
        toolbar: { show: false },
        zoom: { enabled: true, type: 'xy' },
      },
      series: this.series.map((s) => ({
        name: s.position,
        data: s.points.map((point) => ({ x: point.x, y: point.y })),
      })),
      colors: this.series.map((s) => POSITION_COLORS[s.position]),
      markers: { size: 8, fillOpacity: 0.7, strokeWidth: 0 },
      xaxis: {
        type: 'numeric',
        tickAmount: 8,
        title: { text: this.metricX.label },
        labels: { formatter: (val: string) => formatMetricValue(this.metricX, Number(val)) },
      },
      yaxis: {
        title: { text: this.metricY.label },
        labels: { formatter: (val: number) => formatMetricValue(this.metricY, val) },
      },
      grid: { borderColor: CHART_GRID_COLOR },
      legend: {
        show: true,
        position: 'top',
        labels: { colors: CHART_FORE_COLOR },
      },
      tooltip: {
        theme: 'dark',
        custom: ({ seriesIndex, dataPointIndex }: { seriesIndex: number; dataPointIndex: number }) =>
          this.renderTooltip(seriesIndex, dataPointIndex),
      },
    };
  }

  private renderTooltip(seriesIndex: number, dataPointIndex: number): string {
    const point = this.series[seriesIndex]?.points[dataPointIndex];
    if (!point) return '';

    const { player } = point;
    return `
      <div class="chart-tooltip">
        <strong>${escapeHtml(player.name)}</strong>
        <div>${escapeHtml(player.team)} · ${player.primaryPosition} · Age ${player.age} · ${player.minutes} min</div>
        <div>${escapeHtml(this.metricX.label)}: ${formatMetricValue(this.metricX, point.x)}</div>
        <div>${escapeHtml(this.metricY.label)}: ${formatMetricValue(this.metricY, point.y)}</div>
      </div>
    `;
  }
}
