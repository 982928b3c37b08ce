import React from 'react';
import { render as inkRender } from 'ink';
import { InvalidArgumentError, type Command } from 'commander';
import {
  DEFAULT_THRESHOLDS,
  MEASUREMENT_TIMEOUT_SECONDS,
  PRESET_THRESHOLDS,
  RunSession,
  isUploadSuccess,
  setLogLevel,
  type RunMode,
  type RunReport,
  type SpeedtestEvents,
  type SpeedtestRunOptions,
  type Thresholds,
  type UploadMethod,
} from '@edgeprobe/core';
import { createCallbackEventBridge } from '../adapters/callback-event-bridge.js';
import { createServices } from '../adapters/service-factory.js';
import { JsonFormatter } from '../formatters/json.js';
import { PlainFormatter } from '../formatters/plain.js';
import { App } from '../ui/App.js';
import { speedtestReducer, initialState, type Action, type SpeedtestState } from '../ui/speedtest-state.js';
import {
  applyLogFlags,
  fail,
  parseInteger,
  parseNumber,
  parseUploadMethod,
  resolveWorkDir,
  type CommonOptions,
} from './options.js';

type Preset = keyof typeof PRESET_THRESHOLDS;

interface RunOptions extends CommonOptions {
  mode: RunMode;
  preset?: Preset;
  count?: number;
  speed?: number;
  delay?: number;
  thread?: number;
  ipv6?: boolean;
  region?: string;
  csv?: string;
  upload?: UploadMethod;
  workerDomain?: string;
  uuid?: string;
  clear?: boolean;
  token?: string;
  repo?: string;
  filePath?: string;
  uploadCount?: number;
  remember: boolean;
  timeout?: number;
  json?: boolean;
}

function parseMode(value: string): RunMode {
  if (value === 'beginner' || value === 'normal' || value === 'proxy') return value;
  throw new InvalidArgumentError('Expected one of: beginner, normal, proxy.');
}

function parsePreset(value: string): Preset {
  if (value === 'quick' || value === 'standard' || value === 'quality') return value;
  throw new InvalidArgumentError('Expected one of: quick, standard, quality.');
}

export function resolveThresholds(opts: Pick<RunOptions, 'preset' | 'count' | 'speed' | 'delay' | 'thread'>): Thresholds {
  const base = opts.preset ? PRESET_THRESHOLDS[opts.preset] : DEFAULT_THRESHOLDS;
  return {
    count: opts.count ?? base.count,
    speedLimit: opts.speed ?? base.speedLimit,
    latencyLimit: opts.delay ?? base.latencyLimit,
    threads: opts.thread ?? base.threads,
  };
}

/** argv prefix that starts this process again, loader flags included. */
export function rerunEntry(): string[] {
  const script = process.argv[1];
  return script ? [process.execPath, ...process.execArgv, script] : [process.execPath];
}

async function execute(
  opts: RunOptions,
  workDir: string,
  events: SpeedtestEvents,
  runOptions: SpeedtestRunOptions,
): Promise<RunReport> {
  const services = await createServices(workDir, events);
  const upload = opts.mode === 'proxy' ? undefined : await services.config.resolveUploadTarget(opts);
  const session = new RunSession(
    {
      mode: opts.mode,
      ipVersion: opts.ipv6 ? 'ipv6' : 'ipv4',
      thresholds: resolveThresholds(opts),
      region: opts.region,
      csvFile: opts.csv,
      upload,
    },
    rerunEntry(),
  );

  const report = await services.speedtest.run(session, runOptions);
  if (upload && opts.remember && report.upload && isUploadSuccess(report.upload)) {
    await services.config.remember(upload);
  }
  return report;
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run a speed test and optionally upload the fastest IPs')
    .option('-m, --mode <mode>', 'beginner (all IPs), normal (one region) or proxy (list only)', parseMode, 'beginner')
    .option('--preset <name>', 'Threshold preset: quick, standard, quality', parsePreset)
    .option('-c, --count <n>', 'Number of IPs that get a download test', parseInteger)
    .option('-s, --speed <mbps>', 'Minimum download speed in MB/s', parseNumber)
    .option('-d, --delay <ms>', 'Maximum average latency in ms', parseNumber)
    .option('-t, --thread <n>', 'Latency test concurrency (1-1000)', parseInteger)
    .option('--ipv6', 'Test IPv6 ranges instead of IPv4')
    .option('-r, --region <code>', 'Colo code to test in normal mode (e.g. HKG)')
    .option('--csv <file>', 'Result CSV to convert in proxy mode')
    .option('-u, --upload <method>', 'Upload results: api, github, none', parseUploadMethod)
    .option('--worker-domain <domain>', 'Preferred-IP API domain')
    .option('--uuid <uuid>', 'Preferred-IP API path secret')
    .option('--clear', 'Clear the registry before uploading')
    .option('--token <token>', 'Repository access token')
    .option('--repo <owner/repo>', 'Target repository')
    .option('--file-path <path>', 'File path inside the repository')
    .option('--upload-count <n>', 'Number of IPs to upload', parseInteger)
    .option('--no-remember', "Don't save credentials after a successful upload")
    .option('--timeout <seconds>', `Abort the measurement after this many seconds (default: ${MEASUREMENT_TIMEOUT_SECONDS})`, parseInteger)
    .option('--work-dir <path>', 'Directory holding the binary, IP lists and results')
    .option('--json', 'Output the report as JSON to stdout')
    .option('--verbose', 'Debug logging')
    .option('--quiet', 'Minimal output')
    .action(async (opts: RunOptions) => {
      applyLogFlags(opts);
      const workDir = resolveWorkDir(opts);
      const isJson = opts.json ?? false;
      const isQuiet = opts.quiet ?? false;
      const isInteractive = process.stdout.isTTY && !isJson && !isQuiet;

      const controller = new AbortController();
      process.once('SIGINT', () => controller.abort());

      // --- Interactive mode: Ink UI ---
      if (isInteractive) {
        // Log lines would corrupt Ink's rendering.
        if (!opts.verbose) setLogLevel('error');

        let state: SpeedtestState = { ...initialState };
        const ink = inkRender(React.createElement(App, { state }));
        const dispatch = (action: Action) => {
          state = speedtestReducer(state, action);
          ink.rerender(React.createElement(App, { state }));
        };

        const events = createCallbackEventBridge({
          onStageChange: (stage, summary) => dispatch({ type: 'STAGE_CHANGE', stage, summary }),
          onRecords: (records) => dispatch({ type: 'RECORDS', records }),
          onUploadComplete: (outcome) => dispatch({ type: 'UPLOAD_COMPLETE', outcome }),
          onComplete: (report) => dispatch({ type: 'COMPLETE', report }),
          onError: (error) => dispatch({ type: 'ERROR', error }),
        });

        try {
          const report = await execute(opts, workDir, events, {
            abortSignal: controller.signal,
            timeoutSeconds: opts.timeout,
          });
          if (report.upload && !isUploadSuccess(report.upload)) process.exitCode = 1;
          // Brief delay so the final frame renders before unmount
          setTimeout(() => ink.unmount(), 100);
          await ink.waitUntilExit();
        } catch (err) {
          ink.unmount();
          fail(err);
        }
        return;
      }

      // --- Non-interactive mode: plain console output (JSON / quiet / no TTY) ---
      const formatter = isJson ? new JsonFormatter() : new PlainFormatter();
      const events = createCallbackEventBridge({
        onStageChange: (_stage, summary) => {
          if (!isJson && !isQuiet) console.log(`▶ ${summary}`);
        },
      });

      try {
        const report = await execute(opts, workDir, events, {
          abortSignal: controller.signal,
          inheritOutput: !isJson && !isQuiet,
          timeoutSeconds: opts.timeout,
        });
        if (!isQuiet || isJson) formatter.renderComplete(report);
        if (report.upload && !isUploadSuccess(report.upload)) process.exitCode = 1;
      } catch (err) {
        fail(err, isJson);
      }
    });
}
