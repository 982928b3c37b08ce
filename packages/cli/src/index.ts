import {
  RunSession,
  type RunMode,
  type RunReport,
  type Thresholds,
  type IpVersion,
  type UploadFlags,
} from '@edgeprobe/core';
import { createCallbackEventBridge, type EventHandler } from './adapters/callback-event-bridge.js';
import { createServices } from './adapters/service-factory.js';
import { rerunEntry, resolveThresholds } from './commands/run.js';

export interface SpeedtestOptions {
  mode?: RunMode;
  ipVersion?: IpVersion;
  thresholds?: Partial<Thresholds>;
  region?: string;
  csvFile?: string;
  upload?: UploadFlags;
  workDir?: string;
  abortSignal?: AbortSignal;
  onProgress?: EventHandler;
}

/**
 * Runs one speed test end to end. Upload settings resolve the same way as on
 * the command line: explicit values, then environment, then saved credentials.
 */
export async function speedtest(options: SpeedtestOptions = {}): Promise<RunReport> {
  const workDir = options.workDir ?? process.cwd();
  const mode = options.mode ?? 'beginner';
  const services = await createServices(workDir, createCallbackEventBridge(options.onProgress ?? {}));

  const upload = mode === 'proxy' || !options.upload
    ? undefined
    : await services.config.resolveUploadTarget(options.upload);

  const session = new RunSession(
    {
      mode,
      ipVersion: options.ipVersion ?? 'ipv4',
      thresholds: resolveThresholds({
        count: options.thresholds?.count,
        speed: options.thresholds?.speedLimit,
        delay: options.thresholds?.latencyLimit,
        thread: options.thresholds?.threads,
      }),
      region: options.region,
      csvFile: options.csvFile,
      upload,
    },
    rerunEntry(),
  );

  return services.speedtest.run(session, { abortSignal: options.abortSignal });
}

export { createCallbackEventBridge, type EventHandler } from './adapters/callback-event-bridge.js';
export { createServices, type Services } from './adapters/service-factory.js';

// Re-export everything from core for advanced usage
export * from '@edgeprobe/core';
