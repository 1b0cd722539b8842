/**
 * Diagnostics logger. Everything goes to stderr: stdout is reserved for the
 * generated document so it can be redirected to a file.
 */
export class Logger {
  private verbose = false;
  private quiet = false;

  setVerbose(verbose: boolean) {
    this.verbose = verbose;
  }

  setQuiet(quiet: boolean) {
    this.quiet = quiet;
  }

  info(message: string, ...args: unknown[]) {
    if (!this.quiet) {
      console.error(message, ...args);
    }
  }

  success(message: string, ...args: unknown[]) {
    if (!this.quiet) {
      console.error(`✓ ${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]) {
    if (!this.quiet) {
      console.error(`⚠ ${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]) {
    console.error(`✗ ${message}`, ...args);
  }

  debug(message: string, ...args: unknown[]) {
    if (this.verbose) {
      console.error(`[DEBUG] ${message}`, ...args);
    }
  }
}

export const logger = new Logger();
