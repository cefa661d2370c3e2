import './styles.css';
import { DashboardConfig, createDashboardConfig } from './config/dashboard';
import { ANALYSIS_MODES, AnalysisMode, DashboardController, StorageLike } from './controllers';
import { Dataset } from './models';
import { fetchDataset } from './services/DatasetService';
import { escapeHtml } from './utils/html';
import { ComparisonView, ErrorView, FilterPanelView, LoadingView, OpponentView, TopPerformersView } from './views';

const MODE_PANEL_IDS: Record<AnalysisMode, string> = {
  'top-performers': 'mode-top-performers',
  'player-comparison': 'mode-player-comparison',
  'opponent-analysis': 'mode-opponent-analysis',
};

function modeLabel(mode: AnalysisMode): string {
  return ANALYSIS_MODES.find((item) => item.id === mode)?.label ?? mode;
}

function resolveStorage(): StorageLike | null {
  try {
    return window.localStorage;
  } catch (error) {
    console.warn('⚠️ localStorage unavailable, mode preference will not persist:', error);
    return null;
  }
}

class App {
  private readonly root: HTMLElement;
  private readonly dataset: Dataset;
  private readonly config: Readonly<DashboardConfig>;
  private readonly controller: DashboardController;
  private errorView!: ErrorView;
  private topPerformersView!: TopPerformersView;
  private comparisonView!: ComparisonView;
  private opponentView!: OpponentView;

  constructor(root: HTMLElement, dataset: Dataset, config: Readonly<DashboardConfig>) {
    this.root = root;
    this.dataset = dataset;
    this.config = config;
    this.controller = new DashboardController(dataset, config, resolveStorage());

    this.initializeDOM();
    this.initializeViews();
    this.bindController();
    this.controller.refresh();
  }

  /**
   * Load the dataset, then build the dashboard. A load failure is fatal:
   * the page shows the error and nothing else.
   */
  static async init(): Promise<App | null> {
    const root = document.querySelector<HTMLDivElement>('#app');
    if (!root) throw new Error('App container not found');

    const config = createDashboardConfig();
    const loadingView = new LoadingView(root);
    loadingView.show(`Loading ${__DATASET_URL__}...`);

    try {
      const dataset = await fetchDataset(__DATASET_URL__);
      loadingView.hide();
      return new App(root, dataset, config);
    } catch (error) {
      loadingView.hide();
      const err = error instanceof Error ? error : new Error(String(error));
      console.error('❌ Dataset load failed:', err);
      new ErrorView(root).show(err, { fatal: true });
      return null;
    }
  }

  private initializeDOM(): void {
    const title = `${this.config.leagueName} Player Performance Dashboard`;
    document.title = title;

    this.root.innerHTML = `
      <div class="app-layout">
        <div id="filter-panel-container" class="sidebar"></div>
        <main class="main-panel">
          <header class="app-header">
            <h1 class="app-title">${escapeHtml(title)}</h1>
            <p class="app-subtitle" id="session-summary"></p>
            <p class="app-filters" id="filter-summary"></p>
          </header>
          <hr class="divider" />
          <div id="error-container"></div>
          <section id="${MODE_PANEL_IDS['top-performers']}" class="mode-panel"></section>
          <section id="${MODE_PANEL_IDS['player-comparison']}" class="mode-panel"></section>
          <section id="${MODE_PANEL_IDS['opponent-analysis']}" class="mode-panel"></section>
          <footer class="app-footer">
            ${this.dataset.size} players from ${escapeHtml(this.dataset.source)} · build ${escapeHtml(__APP_VERSION__)}
          </footer>
        </main>
      </div>
    `;
  }

  private initializeViews(): void {
    const state = this.controller.getState();
    const metrics = this.controller.getMetrics();

    new FilterPanelView(this.getElement('filter-panel-container'), {
      seasonLabel: this.config.seasonLabel,
      positions: this.dataset.positions(),
      selectedPositions: state.positions,
      maxMinutes: this.dataset.maxMinutes(),
      minutesStep: this.config.minutesStep,
      minMinutes: state.minMinutes,
      mode: state.mode,
      onPositionsChange: (positions) => this.controller.setPositions(positions),
      onMinMinutesChange: (minMinutes) => this.controller.setMinMinutes(minMinutes),
      onModeChange: (mode) => this.controller.setMode(mode),
    });

    this.errorView = new ErrorView(this.getElement('error-container'));

    this.topPerformersView = new TopPerformersView(this.getElement(MODE_PANEL_IDS['top-performers']), {
      metrics,
      onScatterMetricsChange: (xKey, yKey) => this.controller.setScatterMetrics(xKey, yKey),
      onBarMetricChange: (key) => this.controller.setBarMetric(key),
    });

    this.comparisonView = new ComparisonView(this.getElement(MODE_PANEL_IDS['player-comparison']), {
      onPlayersChange: (playerA, playerB) => this.controller.selectPlayers(playerA, playerB),
    });

    this.opponentView = new OpponentView(this.getElement(MODE_PANEL_IDS['opponent-analysis']), {
      metrics,
      onTeamChange: (team) => this.controller.setOpponentTeam(team),
      onMetricChange: (key) => this.controller.setSquadMetric(key),
    });
  }

  private bindController(): void {
    this.controller.setCallbacks({
      onStateChange: (state, summary) => {
        this.errorView.hide();
        this.getElement('session-summary').textContent =
          `Season: ${this.config.seasonLabel} | Mode: ${modeLabel(state.mode)}`;
        this.getElement('filter-summary').textContent = summary;
        this.showModePanel(state.mode);
      },
      onTopPerformers: (result) => {
        const state = this.controller.getState();
        this.topPerformersView.render(result, {
          scatterXMetric: state.scatterXMetric,
          scatterYMetric: state.scatterYMetric,
          barMetric: state.barMetric,
        });
      },
      onComparison: (result) => this.comparisonView.render(result),
      onOpponent: (result) => this.opponentView.render(result),
      onError: (error) => {
        console.error('❌ Dashboard update failed:', error);
        this.errorView.show(error);
      },
    });
  }

  private showModePanel(mode: AnalysisMode): void {
    for (const [panelMode, panelId] of Object.entries(MODE_PANEL_IDS)) {
      this.getElement(panelId).classList.toggle('active', panelMode === mode);
    }
    if (mode !== 'top-performers') {
      // Charts hold resize listeners; drop them when their panel is hidden
      this.topPerformersView.destroy();
    }
  }

  private getElement(id: string): HTMLElement {
    const element = document.getElementById(id);
    if (!element) throw new Error(`Element #${id} not found`);
    return element;
  }
}

App.init().catch((error: unknown) => {
  console.error('❌ Dashboard failed to start:', error);
});
