/**
 * Spinner - Progress spinners
 *
 * Animated spinners for compression runs and kernel passes. Spinners
 * write to stderr so stdout carries only command output.
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';

export interface SpinnerOptions {
  text?: string;
  color?: 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'gray';
  /** Whether to animate (default: interactive stderr outside CI) */
  enabled?: boolean;
}

/**
 * Spinner wrapper for consistent CLI feedback
 */
export class Spinner {
  private readonly spinner: Ora;
  private readonly enabled: boolean;

  constructor(options: SpinnerOptions = {}) {
    this.enabled = options.enabled ?? (!process.env['CI'] && process.stderr.isTTY === true);

    const baseOptions = {
      color: options.color ?? 'cyan',
      isEnabled: this.enabled,
      isSilent: !this.enabled,
    } as const;

    this.spinner = options.text ? ora({ ...baseOptions, text: options.text }) : ora(baseOptions);
  }

  start(text?: string): this {
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  succeed(text?: string): this {
    this.spinner.succeed(text);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }
}

export function createSpinner(textOrOptions?: string | SpinnerOptions): Spinner {
  if (typeof textOrOptions === 'string') {
    return new Spinner({ text: textOrOptions });
  }
  return new Spinner(textOrOptions);
}

/**
 * Run an async operation with a spinner
 */
export async function withSpinner<T>(
  text: string,
  operation: () => Promise<T>,
  options?: {
    successText?: string | ((result: T) => string);
    enabled?: boolean;
  }
): Promise<T> {
  const spinner = createSpinner({ text, ...(options?.enabled !== undefined ? { enabled: options.enabled } : {}) });
  spinner.start();

  try {
    const result = await operation();
    const successText =
      typeof options?.successText === 'function' ? options.successText(result) : options?.successText;
    spinner.succeed(successText);
    return result;
  } catch (error) {
    spinner.fail(error instanceof Error ? error.message : String(error));
    throw error;
  }
}

/**
 * Status indicators for non-spinner output, on stderr
 */
export const status = {
  success(message: string): void {
    process.stderr.write(`${chalk.green('✔')} ${message}\n`);
  },
};
