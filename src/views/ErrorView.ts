import { DatasetLoadError, ParseError, PlayerNotFoundError, SchemaError } from '../models/Errors';
import { escapeHtml } from '../utils/html';

export interface ErrorViewOptions {
  /** Fatal errors stay on screen: there is nothing to go back to */
  fatal?: boolean;
}

export function describeError(error: Error): { title: string; details: string[] } {
  if (error instanceof SchemaError) {
    return {
      title: 'The dataset is missing required columns',
      details: error.missingColumns.map((column) => `Missing column: ${column}`),
    };
  }
  if (error instanceof ParseError) {
    return {
      title: 'The dataset contains a value that could not be read',
      details: [`Row ${error.row}, column "${error.column}": "${error.value}"`],
    };
  }
  if (error instanceof DatasetLoadError) {
    return { title: 'The dataset could not be loaded', details: [error.message] };
  }
  if (error instanceof PlayerNotFoundError) {
    return { title: 'Player not found', details: [error.message] };
  }
  return { title: 'Something went wrong', details: [error.message] };
}

export class ErrorView {
  private container: HTMLElement;

  constructor(container: HTMLElement) {
    this.container = container;
  }

  show(error: Error, options: ErrorViewOptions = {}): void {
    const { title, details } = describeError(error);
    const detailItems = details.map((detail) => `<li>${escapeHtml(detail)}</li>`).join('');
    const dismiss = options.fatal ? '' : '<button class="error-dismiss">Dismiss</button>';

    this.container.innerHTML = `
      <div class="error-container" role="alert">
        <p class="error-message">${escapeHtml(title)}</p>
        <ul class="error-details">${detailItems}</ul>
        ${dismiss}
      </div>
    `;

    const dismissBtn = this.container.querySelector('.error-dismiss');
    dismissBtn?.addEventListener('click', () => this.hide());
  }

  hide(): void {
    this.container.innerHTML = '';
  }
}
