/**
 * ErrorPresenter - pure presentation layer for CompilerError instances
 * - No business logic; formats into environment-specific view objects
 */

import type { ErrorCode } from './codes.js';
import type {
  CompilerError,
  SerializedError,
  UserError,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  ref?: string;
  workaround?: string;
  details?: string[];
  colors: boolean;
  terminalWidth: number;
}

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  /**
   * @param related Further failures of the same run (collected errors),
   * listed as details under the primary error
   */
  formatForCLI(
    error: CompilerError,
    related: readonly CompilerError[] = []
  ): CLIErrorView {
    const user = error.toUserError();
    return {
      title: this.#formatTitle(user),
      code: user.code,
      location: this.#formatLocation(user),
      ref: user.ref,
      workaround: this.#formatWorkaround(error),
      details: this.#formatDetails(related),
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.#getTerminalWidth(this.options.terminalWidth),
    };
  }

  /** Log payload; the stack is kept outside prod */
  formatForLog(error: CompilerError): SerializedError {
    return error.toJSON(this._env);
  }

  #formatTitle(user: UserError): string {
    return `Error ${user.code}: ${user.message}`;
  }

  #formatLocation(user: UserError): string | undefined {
    return user.schemaPath ? `Location: ${user.schemaPath}` : undefined;
  }

  #formatWorkaround(error: CompilerError): string | undefined {
    if (Array.isArray(error.suggestions) && error.suggestions.length > 0) {
      return error.suggestions[0];
    }
    return error.context?.suggestion;
  }

  #formatDetails(related: readonly CompilerError[]): string[] | undefined {
    if (related.length === 0) return undefined;
    return related
      .map((other) => other.toUserError())
      .map((user) => `${user.code} ${user.schemaPath ?? '#'}: ${user.message}`);
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }

  #getTerminalWidth(opt?: number): number {
    return opt || process.stdout?.columns || 80;
  }
}

export default ErrorPresenter;
