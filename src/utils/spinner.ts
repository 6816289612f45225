/**
 * Ora-backed spinner for the plain CLI output adapter.
 * Ora writes to stderr and stays silent when stderr is not a TTY, so
 * piped result lines on stdout are never interleaved with frames.
 */

import ora, { type Ora } from 'ora';

export class Spinner {
  private spinner: Ora;

  constructor(message: string = 'Loading...') {
    this.spinner = ora({ text: message, spinner: 'dots' });
  }

  start(): void {
    this.spinner.start();
  }

  update(message: string): void {
    this.spinner.text = message;
  }

  /**
   * Stop the spinner (clears the line)
   */
  stop(): void {
    this.spinner.stop();
  }

  succeed(message: string): void {
    this.spinner.succeed(message);
  }
}
