import type { IpVersion } from '../measurement/ip-source.js';
import type { Thresholds } from '../measurement/measurement-options.js';
import type { UploadTarget } from '../upload/upload-target.js';

export type RunMode = 'beginner' | 'normal' | 'proxy';

export interface RunSettings {
  mode: RunMode;
  ipVersion: IpVersion;
  thresholds: Thresholds;
  /** Colo code, `normal` mode only. */
  region?: string;
  /** Source CSV, `proxy` mode only. */
  csvFile?: string;
  upload?: UploadTarget;
}

/**
 * Per-invocation context. Carries the settings of one run and hands the
 * equivalent non-interactive command back to whoever schedules re-runs.
 */
export class RunSession {
  readonly startedAt = new Date();

  /**
   * @param entry argv prefix that launches this tool, e.g. `[node, script]`
   */
  constructor(
    readonly settings: RunSettings,
    private readonly entry: readonly string[],
  ) {}

  rerunCommand(): string[] {
    return [...this.entry, ...buildRerunArgs(this.settings)];
  }

  rerunCommandLine(): string {
    return this.rerunCommand().map(shellQuote).join(' ');
  }
}

export function buildRerunArgs(settings: RunSettings): string[] {
  const args = ['run', '--mode', settings.mode];
  if (settings.ipVersion === 'ipv6') args.push('--ipv6');

  if (settings.mode === 'proxy') {
    if (settings.csvFile) args.push('--csv', settings.csvFile);
    return args;
  }

  const t = settings.thresholds;
  args.push(
    '--count', String(t.count),
    '--speed', String(t.speedLimit),
    '--delay', String(t.latencyLimit),
    '--thread', String(t.threads),
  );
  if (settings.mode === 'normal' && settings.region) args.push('--region', settings.region);

  const upload = settings.upload;
  if (upload?.kind === 'api') {
    args.push(
      '--upload', 'api',
      '--worker-domain', upload.workerDomain,
      '--uuid', upload.uuid,
      '--upload-count', String(upload.maxCount),
    );
    if (upload.clearFirst) args.push('--clear');
  } else if (upload?.kind === 'repository') {
    args.push(
      '--upload', 'github',
      '--token', upload.token,
      '--repo', `${upload.owner}/${upload.repo}`,
      '--file-path', upload.filePath,
      '--upload-count', String(upload.maxCount),
    );
  }
  return args;
}

export function shellQuote(arg: string): string {
  if (/^[\w@%+=:,./-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}
