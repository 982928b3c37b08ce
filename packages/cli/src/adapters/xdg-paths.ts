import { join } from 'node:path';
import { homedir } from 'node:os';

export function getConfigDir(): string {
  return process.env.XDG_CONFIG_HOME
    ? join(process.env.XDG_CONFIG_HOME, 'edgeprobe')
    : join(homedir(), '.config', 'edgeprobe');
}
