/**
 * BarChart Component
 *
 * Horizontal ApexCharts bar for a top-N ranking, best player on top,
 * bars coloured by primary position.
 */

import ApexCharts from 'apexcharts';
import { MetricDefinition, formatMetricValue } from '../config/metrics';
import type { RankedPlayer } from '../services/RankingService';
import { CHART_FONT_FAMILY, CHART_FORE_COLOR, CHART_GRID_COLOR, POSITION_COLORS } from './chartTheme';

interface BarChartConfig {
  containerId: string;
  ranking: RankedPlayer[];
  metric: MetricDefinition;
  height?: number;
}

export class BarChart {
  private chart: ApexCharts | null = null;
  private containerId: string;
  private ranking: RankedPlayer[];
  private metric: MetricDefinition;
  private height: number;

  constructor(config: BarChartConfig) {
    this.containerId = config.containerId;
    this.ranking = config.ranking;
    this.metric = config.metric;
    this.height = config.height ?? 600;
  }

  render(): void {
    const container = document.getElementById(this.containerId);
    if (!container) {
      console.error(`BarChart: Container #${this.containerId} not found`);
      return;
    }

    this.chart = new ApexCharts(container, this.buildOptions());
    this.chart.render().catch((error: unknown) => {
      console.error('BarChart: render failed', error);
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
        type: 'bar',
        height: this.height,
        background: 'transparent',
        foreColor: CHART_FORE_COLOR,
        fontFamily: CHART_FONT_FAMILY,
        toolbar: { show: false },
      },
      series: [
        {
          name: this.metric.label,
          data: this.ranking.map((entry) => Number(entry.value.toFixed(this.metric.precision))),
        },
      ],
      colors: this.ranking.map((entry) => POSITION_COLORS[entry.player.primaryPosition]),
      plotOptions: {
        bar: {
          horizontal: true,
          distributed: true,
          dataLabels: { position: 'top' },
        },
      },
      dataLabels: {
        enabled: true,
        offsetX: 28,
        style: { colors: [CHART_FORE_COLOR] },
        formatter: (val: string | number | number[]) => formatMetricValue(this.metric, Number(val)),
      },
      xaxis: {
        categories: this.ranking.map((entry) => entry.player.name),
        title: { text: this.metric.label },
      },
      grid: { borderColor: CHART_GRID_COLOR },
      legend: { show: false },
      tooltip: {
        theme: 'dark',
        y: {
          formatter: (val: number, opts?: { dataPointIndex: number }) => {
            const entry = opts ? this.ranking[opts.dataPointIndex] : undefined;
            const context = entry ? ` (${entry.player.team}, ${entry.player.minutes} min)` : '';
            return `${formatMetricValue(this.metric, val)}${context}`;
          },
        },
      },
    };
  }
}
