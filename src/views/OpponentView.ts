import { MetricDefinition, formatMetricValue } from '../config/metrics';
import type { OpponentResult } from '../controllers/DashboardController';
import type { PlayerRecord } from '../models/Player';
import { metricValue } from '../services/RankingService';
import { escapeHtml, renderOptions } from '../utils/html';

/** Columns of the squad table, after the identity columns */
export const OPPONENT_METRIC_KEYS: readonly string[] = [
  'goals_per90',
  'assists_per90',
  'xg_per90',
  'xa_per90',
  'shots_per90',
  'key_passes_per90',
  'prog_passes_per90',
  'dribbles_per90',
  'tackles_won_per90',
];

export interface OpponentViewOptions {
  metrics: MetricDefinition[];
  onTeamChange: (team: string) => void;
  onMetricChange: (key: string) => void;
}

export class OpponentView {
  private container: HTMLElement;
  private options: OpponentViewOptions;

  constructor(container: HTMLElement, options: OpponentViewOptions) {
    this.container = container;
    this.options = options;
  }

  render(result: OpponentResult): void {
    const teamOptions = result.teams.map((team) => ({ value: team, label: team }));
    const metricOptions = this.options.metrics.map((metric) => ({ value: metric.key, label: metric.label }));

    const controls = `
      <div class="metric-controls">
        <label class="control-label">Select Opponent Team
          <select id="opponent-team" class="control-select" ${teamOptions.length === 0 ? 'disabled' : ''}>
            ${renderOptions(teamOptions, result.team)}
          </select>
        </label>
        <label class="control-label">Highlight Top Players by Metric
          <select id="opponent-metric" class="control-select">${renderOptions(metricOptions, result.metric.key)}</select>
        </label>
      </div>
    `;

    const body = result.status === 'empty'
      ? `<div class="notice notice-warning">${escapeHtml(result.message)}</div>`
      : `
        <h3 class="chart-title">Player Stats for ${escapeHtml(result.team)}</h3>
        <p class="section-subtitle">Highlighting based on: ${escapeHtml(result.metric.label)}</p>
        ${this.renderTable(result.squad, result.metric)}
        <p class="chart-help">
          <strong>How to Read:</strong> The squad is sorted by the highlight metric, so the biggest
          threats are at the top. Progressive passes, dribbles and tackles per 90 show each player's role.
        </p>
      `;

    this.container.innerHTML = `
      <h2 class="section-title">Analyze Opponent</h2>
      ${controls}
      ${body}
    `;

    this.attachEventListeners();
  }

  private tableMetrics(highlight: MetricDefinition): MetricDefinition[] {
    const columns = this.options.metrics.filter((metric) => OPPONENT_METRIC_KEYS.includes(metric.key));
    return columns.some((metric) => metric.key === highlight.key) ? columns : [...columns, highlight];
  }

  private renderTable(squad: PlayerRecord[], highlight: MetricDefinition): string {
    const metrics = this.tableMetrics(highlight);
    const highlightClass = (metric: MetricDefinition): string => (metric.key === highlight.key ? ' is-highlight' : '');

    const header = metrics
      .map((metric) => `<th class="num${highlightClass(metric)}">${escapeHtml(metric.label)}</th>`)
      .join('');

    const rows = squad
      .map((player, index) => {
        const cells = metrics
          .map((metric) => `<td class="num${highlightClass(metric)}">${formatMetricValue(metric, metricValue(player, metric))}</td>`)
          .join('');
        return `
          <tr>
            <td class="num">${index + 1}</td>
            <td>${escapeHtml(player.name)}</td>
            <td>${escapeHtml(player.positions.join(',') || player.primaryPosition)}</td>
            <td class="num">${player.age}</td>
            <td class="num">${player.minutes}</td>
            ${cells}
          </tr>
        `;
      })
      .join('');

    return `
      <div class="table-scroll">
        <table class="data-table opponent-table">
          <thead><tr><th>#</th><th>Player</th><th>Pos</th><th>Age</th><th>Min</th>${header}</tr></thead>
          <tbody>${rows}</tbody>
        </table>
      </div>
    `;
  }

  private attachEventListeners(): void {
    const teamSelect = this.container.querySelector<HTMLSelectElement>('#opponent-team');
    const metricSelect = this.container.querySelector<HTMLSelectElement>('#opponent-metric');

    teamSelect?.addEventListener('change', () => this.options.onTeamChange(teamSelect.value));
    metricSelect?.addEventListener('change', () => this.options.onMetricChange(metricSelect.value));
  }
}
