import { describeUploadOutcome, isUploadSuccess, type RunReport, type UploadOutcome } from '@edgeprobe/core';
import type { OutputFormatter } from './formatter.js';
import { DISPLAY_LIMIT, formatEndpoint, formatLatency, formatThroughput } from '../ui/format.js';

export class PlainFormatter implements OutputFormatter {
  renderComplete(report: RunReport): void {
    if (report.proxyListFile) {
      console.log(`Proxy list: ${report.records.length} entries written to ${report.proxyListFile}`);
    } else if (report.records.length === 0) {
      console.log('No IPs met the thresholds.');
    } else {
      console.log(`Results (${report.records.length}) from ${report.resultFile ?? 'result file'}:`);
      for (const record of report.records.slice(0, DISPLAY_LIMIT)) {
        console.log(
          `  ${formatEndpoint(record).padEnd(24)} ${formatThroughput(record.throughputMBps).padStart(12)}  ${formatLatency(record.latency).padStart(10)}  ${record.regionName}`,
        );
      }
    }

    if (report.upload) this.renderUpload(report.upload);
    console.log(`\nRe-run with:\n  ${report.rerunCommand}`);
  }

  renderUpload(outcome: UploadOutcome): void {
    const icon = isUploadSuccess(outcome) ? '✓' : '✗';
    console.log(`${icon} ${describeUploadOutcome(outcome)}`);
  }

  renderError(error: string): void {
    console.error(`Error: ${error}`);
  }
}
