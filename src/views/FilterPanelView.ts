import { AnalysisMode, ANALYSIS_MODES } from '../controllers/DashboardController';
import { Position, getPositionLabel, isPosition } from '../models/Player';
import { escapeHtml } from '../utils/html';

export interface FilterPanelViewOptions {
  seasonLabel: string;
  positions: Position[];
  selectedPositions: Position[];
  maxMinutes: number;
  minutesStep: number;
  minMinutes: number;
  mode: AnalysisMode;
  onPositionsChange: (positions: Position[]) => void;
  onMinMinutesChange: (minMinutes: number) => void;
  onModeChange: (mode: AnalysisMode) => void;
}

/**
 * Sidebar with the session-wide filters and the analysis mode switch.
 */
export class FilterPanelView {
  private container: HTMLElement;
  private options: FilterPanelViewOptions;
  private minutesInput!: HTMLInputElement;
  private minutesValue!: HTMLElement;

  constructor(container: HTMLElement, options: FilterPanelViewOptions) {
    this.container = container;
    this.options = options;
    this.render();
    this.attachEventListeners();
  }

  private render(): void {
    const { seasonLabel, positions, selectedPositions, maxMinutes, minutesStep, minMinutes, mode } = this.options;
    // Keep the default threshold reachable even on a thin dataset
    const sliderMax = Math.max(maxMinutes, minMinutes);

    const positionItems = positions
      .map((position) => `
        <label class="filter-check" title="${getPositionLabel(position)}">
          <input type="checkbox" name="position" value="${position}" ${selectedPositions.includes(position) ? 'checked' : ''} />
          <span>${position}</span>
        </label>
      `)
      .join('');

    const modeItems = ANALYSIS_MODES
      .map((item) => `
        <label class="filter-radio">
          <input type="radio" name="analysis-mode" value="${item.id}" ${item.id === mode ? 'checked' : ''} />
          <span>${escapeHtml(item.label)}</span>
        </label>
      `)
      .join('');

    this.container.innerHTML = `
      <aside class="filter-panel">
        <h2 class="filter-panel-title">Filters</h2>

        <label class="filter-label" for="season-select">Select Season</label>
        <select id="season-select" class="filter-select">
          <option value="${escapeHtml(seasonLabel)}">${escapeHtml(seasonLabel)}</option>
        </select>

        <fieldset class="filter-group">
          <legend>Filter by Position(s)</legend>
          ${positionItems}
        </fieldset>

        <label class="filter-label" for="min-minutes">
          Filter by Minimum Minutes Played: <span id="min-minutes-value">${minMinutes}</span>
        </label>
        <input type="range" id="min-minutes" class="filter-range"
          min="0" max="${sliderMax}" step="${minutesStep}" value="${minMinutes}" />

        <fieldset class="filter-group">
          <legend>Select Analysis Mode</legend>
          ${modeItems}
        </fieldset>
      </aside>
    `;

    this.minutesInput = this.container.querySelector('#min-minutes')!;
    this.minutesValue = this.container.querySelector('#min-minutes-value')!;
  }

  private attachEventListeners(): void {
    this.container.querySelectorAll<HTMLInputElement>('input[name="position"]').forEach((input) => {
      input.addEventListener('change', () => this.options.onPositionsChange(this.getSelectedPositions()));
    });

    this.minutesInput.addEventListener('input', () => {
      this.minutesValue.textContent = this.minutesInput.value;
    });
    this.minutesInput.addEventListener('change', () => {
      this.options.onMinMinutesChange(parseInt(this.minutesInput.value, 10) || 0);
    });

    this.container.querySelectorAll<HTMLInputElement>('input[name="analysis-mode"]').forEach((input) => {
      input.addEventListener('change', () => {
        const selected = ANALYSIS_MODES.find((item) => item.id === input.value);
        if (input.checked && selected) {
          this.options.onModeChange(selected.id);
        }
      });
    });
  }

  private getSelectedPositions(): Position[] {
    const positions: Position[] = [];
    this.container.querySelectorAll<HTMLInputElement>('input[name="position"]:checked').forEach((input) => {
      if (isPosition(input.value)) {
        positions.push(input.value);
      }
    });
    return positions;
  }
}
