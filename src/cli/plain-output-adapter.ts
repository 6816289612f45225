/**
 * Plain Output Adapter
 *
 * CLI implementation of OutputPort. Result lines go to stdout verbatim;
 * status messages are colored with picocolors (which turns itself off for
 * non-TTY output and NO_COLOR); errors go to stderr.
 */

import pc from 'picocolors';
import { Spinner } from '../utils/spinner.js';
import type { OutputPort, UnifiedSpinner } from '../core/ports/output.js';

export function createPlainOutput(): OutputPort {
  return {
    info(message: string): void {
      console.log(message);
    },

    message(message: string): void {
      console.log(message);
    },

    success(message: string): void {
      console.log(`${pc.green('✓')} ${message}`);
    },

    error(message: string): void {
      console.error(`${pc.red('✗')} ${message}`);
    },

    warn(message: string): void {
      console.log(`${pc.yellow('⚠')} ${message}`);
    },

    note(content: string, title?: string): void {
      if (title) {
        console.log(`\n${pc.bold(title)}\n${content}`);
      } else {
        console.log(`\n${content}`);
      }
    },

    spinner(): UnifiedSpinner {
      let s: Spinner | null = null;

      return {
        start(message: string) {
          s = new Spinner(message);
          s.start();
        },
        stop(finalMessage?: string) {
          if (s) {
            if (finalMessage) {
              s.succeed(finalMessage);
            } else {
              s.stop();
            }
            s = null;
          }
        },
        message(text: string) {
          if (s) {
            s.update(text);
          }
        },
      };
    },
  };
}
