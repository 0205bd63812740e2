import type { TapRunState } from '@tapsmith/core';
import { consoleWriter, type OutputFormatter, type Writer } from './formatter.js';

/** Prints nothing while running; the final run state or error as JSON. */
export class JsonFormatter implements OutputFormatter {
  constructor(private readonly writer: Writer = consoleWriter) {}

  renderRunStart(): void {}
  renderStepStart(): void {}
  renderStepFinish(): void {}
  renderStepSkipped(): void {}
  renderStepFailed(): void {}
  renderStepLog(): void {}
  renderCommandOutput(): void {}
  renderWarning(): void {}
  renderSummary(): void {}

  renderComplete(state: TapRunState): void {
    this.writer.out(JSON.stringify(state, null, 2));
  }

  renderError(error: string, runId?: string): void {
    this.writer.err(JSON.stringify(runId ? { error, runId } : { error }));
  }
}
