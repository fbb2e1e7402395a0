/**
 * Progress lines for the CLI while documents load.
 *
 * Everything goes to stderr so stdout stays clean for query output.
 */

import { LoadSummary } from './store';

export interface StatusReporter {
  /** A document is about to be read. */
  loading(source: string): void;
  /** A document was merged into the store. */
  loaded(source: string, summary: LoadSummary): void;
  /** A document was rejected; the store is unchanged. */
  failed(source: string, error: Error): void;
}

export class TerminalStatusReporter implements StatusReporter {
  private isTTY: boolean;

  constructor() {
    this.isTTY = Boolean(process.stderr.isTTY);
  }

  loading(source: string): void {
    if (this.isTTY) {
      // Replaced in place by the loaded/failed line
      process.stderr.write(`  ◌ Loading ${source}`);
      return;
    }
    process.stderr.write(`  ◌ Loading ${source}\n`);
  }

  loaded(source: string, summary: LoadSummary): void {
    this.clearLine();
    const count = summary.namespaces.length;
    process.stderr.write(
      `  ✔ ${source}: ${count} namespace${count === 1 ? '' : 's'}, ${summary.variables} declaration${summary.variables === 1 ? '' : 's'}\n`,
    );
  }

  failed(source: string, error: Error): void {
    this.clearLine();
    process.stderr.write(`  ✖ ${source}: ${error.message}\n`);
  }

  private clearLine(): void {
    if (this.isTTY) {
      // \r moves to column 0, \x1b[K clears to end of line
      process.stderr.write('\r\x1b[K');
    }
  }
}

/**
 * Silent reporter for testing or when --quiet is used.
 */
export class SilentStatusReporter implements StatusReporter {
  loading(_source: string): void {}
  loaded(_source: string, _summary: LoadSummary): void {}
  failed(_source: string, _error: Error): void {}
}
