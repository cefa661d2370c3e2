import { escapeHtml } from '../utils/html';

export class LoadingView {
  private container: HTMLElement;
  private overlay: HTMLElement | null = null;

  constructor(container: HTMLElement) {
    this.container = container;
  }

  show(message = 'Loading player data...'): void {
    if (this.overlay) {
      this.setMessage(message);
      return;
    }

    this.overlay = document.createElement('div');
    this.overlay.className = 'loading-overlay';
    this.overlay.innerHTML = `
      <div class="loading-spinner"></div>
      <div class="loading-message" role="status" aria-live="polite">
        <span class="loading-text">${escapeHtml(message)}</span>
      </div>
    `;
    this.container.appendChild(this.overlay);
  }

  setMessage(message: string): void {
    const text = this.overlay?.querySelector('.loading-text');
    if (text) {
      text.textContent = message;
    }
  }

  hide(): void {
    this.overlay?.remove();
    this.overlay = null;
  }
}
