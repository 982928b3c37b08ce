import type { RunReport, UploadOutcome } from '@edgeprobe/core';

export interface OutputFormatter {
  renderComplete(report: RunReport): void;
  renderUpload(outcome: UploadOutcome): void;
  renderError(error: string): void;
}
