import type { RunReport, UploadOutcome } from '@edgeprobe/core';
import type { OutputFormatter } from './formatter.js';

export function reportToJson(report: RunReport) {
  return {
    mode: report.session.settings.mode,
    startedAt: report.session.startedAt.toISOString(),
    resultFile: report.resultFile ?? null,
    proxyListFile: report.proxyListFile ?? null,
    records: report.records,
    upload: report.upload ?? null,
    rerunCommand: report.rerunCommand,
  };
}

export class JsonFormatter implements OutputFormatter {
  renderComplete(report: RunReport): void {
    console.log(JSON.stringify(reportToJson(report), null, 2));
  }

  renderUpload(outcome: UploadOutcome): void {
    console.log(JSON.stringify(outcome, null, 2));
  }

  renderError(error: string): void {
    console.error(JSON.stringify({ error }));
  }
}
