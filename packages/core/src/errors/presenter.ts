/**
 * ErrorPresenter - pure presentation layer for ChoicetapeError instances
 * - No business logic; formats into environment-specific view objects
 */

import type { ErrorCode } from './codes.js';
import type {
  ChoicetapeError,
  ErrorContext,
  SerializedError,
} from '../types/errors.js';
import { MultipleFailures, PropertyFailed } from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
  redactKeys?: string[];
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  excerpt?: string;
  details: string[];
  workaround?: string;
  colors: boolean;
  terminalWidth: number;
}

export type ProductionView = SerializedError;

const DEFAULT_REDACT_KEYS = ['password', 'apiKey', 'secret', 'token'];

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: ChoicetapeError): CLIErrorView {
    return {
      title: this.#formatTitle(error),
      code: error.errorCode,
      location: this.#formatLocation(error),
      excerpt: error.context?.valueExcerpt,
      details: this.#formatDetails(error),
      workaround: this.#formatWorkaround(error),
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.#getTerminalWidth(this.options.terminalWidth),
    };
  }

  formatForProduction(error: ChoicetapeError): ProductionView {
    // Delegate to the error's safe serializer, then apply the presenter's keys
    return this.#applyAdditionalRedaction(error.toJSON('prod'));
  }

  // Helpers
  #formatTitle(error: ChoicetapeError): string {
    return `Error ${error.errorCode}: ${error.message}`;
  }

  #formatLocation(error: ChoicetapeError): string | undefined {
    if (error instanceof PropertyFailed) {
      return `Origin: ${error.origin.kind} at ${error.origin.location}`;
    }
    const setting = error.context?.setting;
    return setting ? `Setting: ${setting}` : undefined;
  }

  #formatDetails(error: ChoicetapeError): string[] {
    if (error instanceof MultipleFailures) {
      return error.failures.map(
        (f, i) =>
          `#${i + 1} ${f.origin.kind} at ${f.origin.location}: ${f.message}`
      );
    }
    if (error instanceof PropertyFailed && error.output.length > 0) {
      return error.output.split('\n');
    }
    return [];
  }

  #formatWorkaround(error: ChoicetapeError): string | undefined {
    if (Array.isArray(error.suggestions) && error.suggestions.length > 0) {
      return error.suggestions[0];
    }
    return error.context?.suggestion;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    // Default to enabling colors in dev when not specified
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }

  #getTerminalWidth(opt?: number): number {
    return opt || process.stdout?.columns || 80;
  }

  #applyAdditionalRedaction(view: SerializedError): SerializedError {
    const keys = new Set(this.options.redactKeys ?? DEFAULT_REDACT_KEYS);
    const redactor = (val: unknown): unknown => {
      if (val && typeof val === 'object') {
        if (Array.isArray(val)) return val.map(redactor);
        const out: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(val)) {
          out[k] = keys.has(k) ? '[REDACTED]' : redactor(v);
        }
        return out;
      }
      return val;
    };
    if (view.context && 'value' in view.context) {
      const context: ErrorContext = {
        ...view.context,
        value: redactor(view.context.value),
      };
      // Clone shallowly to avoid mutation of original
      return { ...view, context };
    }
    return view;
  }
}

export default ErrorPresenter;
