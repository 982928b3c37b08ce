import { EdgeprobeError } from '../../shared/errors.js';

export type OsType = 'win' | 'darwin' | 'linux';
export type ArchType = 'amd64' | 'arm64' | 'arm' | '386';

export interface PlatformInfo {
  os: OsType;
  arch: ArchType;
}

export const BINARY_RELEASE_URL = 'https://github.com/byJoey/CloudflareSpeedTest/releases/download/v1.0';

export class UnsupportedPlatformError extends EdgeprobeError {
  constructor(message: string) {
    super(message, 'UNSUPPORTED_PLATFORM');
    this.name = 'UnsupportedPlatformError';
  }
}

export function detectPlatform(
  platform: NodeJS.Platform = process.platform,
  arch: string = process.arch,
): PlatformInfo {
  let os: OsType;
  switch (platform) {
    case 'win32':
      os = 'win';
      break;
    case 'darwin':
      os = 'darwin';
      break;
    case 'linux':
      os = 'linux';
      break;
    default:
      throw new UnsupportedPlatformError(`Unsupported operating system: ${platform}`);
  }

  let archType: ArchType;
  switch (arch) {
    case 'x64':
      archType = 'amd64';
      break;
    case 'arm64':
      archType = 'arm64';
      break;
    case 'arm':
      archType = 'arm';
      break;
    case 'ia32':
      archType = '386';
      break;
    default:
      throw new UnsupportedPlatformError(`Unsupported architecture: ${arch}`);
  }

  return { os, arch: archType };
}

export function executableName(info: PlatformInfo): string {
  const base = `CloudflareST_proxy_${info.os}_${info.arch}`;
  return info.os === 'win' ? `${base}.exe` : base;
}

/** Release archive for the platform. Builds not published upstream fall back to the closest one. */
export function archiveName(info: PlatformInfo): string {
  switch (info.os) {
    case 'win':
      return info.arch === 'amd64' ? 'CloudflareST_proxy_windows_amd64.zip' : 'CloudflareST_proxy_windows_386.zip';
    case 'darwin':
      return info.arch === 'amd64' ? 'CloudflareST_proxy_darwin_amd64.zip' : 'CloudflareST_proxy_darwin_arm64.zip';
    case 'linux':
      if (info.arch === 'amd64') return 'CloudflareST_proxy_linux_amd64.tar.gz';
      if (info.arch === '386') return 'CloudflareST_proxy_linux_386.tar.gz';
      return 'CloudflareST_proxy_linux_arm64.tar.gz';
  }
}

export function archiveUrl(info: PlatformInfo): string {
  return `${BINARY_RELEASE_URL}/${archiveName(info)}`;
}
