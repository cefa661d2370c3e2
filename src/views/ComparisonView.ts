import { formatMetricValue } from '../config/metrics';
import type { ComparisonResult } from '../controllers/DashboardController';
import type { PlayerComparison, PlayerProfile } from '../services/RankingService';
import { escapeHtml, renderOptions } from '../utils/html';

export interface ComparisonViewOptions {
  onPlayersChange: (playerA: string, playerB: string | null) => void;
}

export class ComparisonView {
  private container: HTMLElement;
  private onPlayersChange: (playerA: string, playerB: string | null) => void;

  constructor(container: HTMLElement, options: ComparisonViewOptions) {
    this.container = container;
    this.onPlayersChange = options.onPlayersChange;
  }

  render(result: ComparisonResult): void {
    const title = '<h2 class="section-title">Compare Players</h2>';

    switch (result.status) {
      case 'empty':
        this.container.innerHTML = `${title}<div class="notice notice-warning">${escapeHtml(result.message)}</div>`;
        return;

      case 'single':
        this.container.innerHTML = `
          ${title}
          ${this.renderPickers(result.playerNames, result.playerA, null)}
          <div class="notice notice-info">${escapeHtml(result.message)}</div>
        `;
        break;

      case 'error':
        this.container.innerHTML = `
          ${title}
          ${this.renderPickers(result.playerNames, result.playerA, result.playerB)}
          <div class="notice notice-error" role="alert">${escapeHtml(result.message)}</div>
        `;
        break;

      case 'ready':
        this.container.innerHTML = `
          ${title}
          ${this.renderPickers(result.playerNames, result.playerA, result.playerB)}
          <h3 class="chart-title">Comparison: ${escapeHtml(result.playerA)} vs. ${escapeHtml(result.playerB)}</h3>
          ${this.renderTable(result.comparison)}
          <p class="chart-help">
            <strong>How to Read:</strong> Higher values are generally better for performance metrics;
            the leader in each row is highlighted.
          </p>
        `;
        break;
    }

    this.attachEventListeners();
  }

  private renderPickers(playerNames: string[], playerA: string, playerB: string | null): string {
    const optionsA = playerNames.map((name) => ({ value: name, label: name }));
    const optionsB = playerNames.filter((name) => name !== playerA).map((name) => ({ value: name, label: name }));

    return `
      <div class="comparison-pickers">
        <label class="control-label">Select Player 1
          <select id="compare-player-a" class="control-select">${renderOptions(optionsA, playerA)}</select>
        </label>
        <label class="control-label">Select Player 2
          <select id="compare-player-b" class="control-select" ${optionsB.length === 0 ? 'disabled' : ''}>
            ${renderOptions(optionsB, playerB)}
          </select>
        </label>
      </div>
    `;
  }

  private renderTable(comparison: PlayerComparison): string {
    const [a, b] = comparison.profiles;

    const identityRows = [
      this.renderIdentityRow('Squad', a.team, b.team),
      this.renderIdentityRow('Pos', this.positionText(a), this.positionText(b)),
      this.renderIdentityRow('Age', String(a.age), String(b.age)),
      this.renderIdentityRow('Min', String(a.minutes), String(b.minutes)),
    ].join('');

    const metricRows = comparison.rows
      .map((row) => {
        const cells = row.values
          .map((value, index) => {
            const leaderClass = row.leader === index ? ' is-leader' : '';
            return `<td class="num${leaderClass}">${formatMetricValue(row.metric, value)}</td>`;
          })
          .join('');
        return `<tr data-metric="${row.metric.key}"><th scope="row">${escapeHtml(row.metric.label)}</th>${cells}</tr>`;
      })
      .join('');

    return `
      <table class="data-table comparison-table">
        <thead>
          <tr><th>Metric</th><th>${escapeHtml(a.name)}</th><th>${escapeHtml(b.name)}</th></tr>
        </thead>
        <tbody>
          ${identityRows}
          ${metricRows}
        </tbody>
      </table>
    `;
  }

  private renderIdentityRow(label: string, valueA: string, valueB: string): string {
    return `<tr><th scope="row">${label}</th><td>${escapeHtml(valueA)}</td><td>${escapeHtml(valueB)}</td></tr>`;
  }

  private positionText(profile: PlayerProfile): string {
    return profile.positions.length > 0 ? profile.positions.join(',') : profile.position;
  }

  private attachEventListeners(): void {
    const selectA = this.container.querySelector<HTMLSelectElement>('#compare-player-a');
    const selectB = this.container.querySelector<HTMLSelectElement>('#compare-player-b');
    if (!selectA) return;

    selectA.addEventListener('change', () => {
      // Player 2 list depends on player 1; let the controller pick a fresh default
      const playerB = selectB && selectB.value !== selectA.value ? selectB.value : null;
      this.onPlayersChange(selectA.value, playerB || null);
    });

    selectB?.addEventListener('change', () => {
      this.onPlayersChange(selectA.value, selectB.value || null);
    });
  }
}
