// Domain types
export type { HttpMethod, RequestOptions } from './domain/http/request-outcome.js';
export { RequestOutcome, isRecord } from './domain/http/request-outcome.js';

export type { MeasurementRecord, UploadBatchEntry } from './domain/measurement/measurement-record.js';
export {
  DEFAULT_PORT,
  UNKNOWN_LATENCY,
  UNKNOWN_COLO,
  UNKNOWN_REGION_NAME,
  formatDisplayName,
  toBatchEntry,
  formatRepositoryLine,
  buildRepositoryContent,
  selectTop,
} from './domain/measurement/measurement-record.js';
export type { ColoInfo } from './domain/measurement/colo-table.js';
export { ColoTable, REGION_ORDER, parseColoJson, loadColoTable } from './domain/measurement/colo-table.js';
export type { MeasurementOptions, Thresholds } from './domain/measurement/measurement-options.js';
export {
  DEFAULT_TEST_URL,
  DEFAULT_RESULT_FILE,
  REGION_SCAN_FILE,
  MAX_THREADS,
  DEFAULT_THRESHOLDS,
  PRESET_THRESHOLDS,
  validateThresholds,
  buildMeasurementArgs,
  regionScanOptions,
} from './domain/measurement/measurement-options.js';
export type { IpVersion } from './domain/measurement/ip-source.js';
export { IPV4_LIST_URL, ipListFile } from './domain/measurement/ip-source.js';

export type { OsType, ArchType, PlatformInfo } from './domain/platform/platform.js';
export { UnsupportedPlatformError, detectPlatform, executableName, archiveName, archiveUrl } from './domain/platform/platform.js';

export type { RunMode, RunSettings } from './domain/session/run-session.js';
export { RunSession, buildRerunArgs, shellQuote } from './domain/session/run-session.js';

export type { ApiUploadTarget, RepositoryUploadTarget, UploadTarget } from './domain/upload/upload-target.js';
export { DEFAULT_UPLOAD_COUNT, DEFAULT_REPOSITORY_FILE, preferredIpsUrl, parseRepoInfo } from './domain/upload/upload-target.js';
export type { ApiUploadOutcome, RepositoryUploadOutcome, UploadOutcome } from './domain/upload/upload-outcome.js';
export { isUploadSuccess, describeUploadOutcome } from './domain/upload/upload-outcome.js';

// Port interfaces
export type { HttpTransport } from './ports/http-transport.js';
export type { CommandSpec, ProcessRunOptions, ProcessResult, ProcessRunner } from './ports/process-runner.js';
export type { CredentialStore, SavedCredentialConfig } from './ports/credential-store.js';
export type { ResultReader } from './ports/result-reader.js';
export type { MeasurementRunner, MeasureRunOptions } from './ports/measurement-runner.js';
export type { IpListSource } from './ports/ip-list-source.js';
export type { ApiUploader, RepositoryUploader } from './ports/uploader.js';
export type { SpeedtestEvents, SpeedtestStage } from './ports/speedtest-events.js';

// Adapters
export { ChildProcessRunner } from './adapters/child-process-runner.js';
export { FetchTransport } from './adapters/fetch-transport.js';
export type { FetchTransportOptions } from './adapters/fetch-transport.js';
export { CurlTransport } from './adapters/curl-transport.js';
export { FallbackHttpClient, createHttpClient } from './adapters/fallback-http-client.js';
export { AssetFetcher, defaultDownloadStrategies, DOWNLOAD_TIMEOUT_SECONDS } from './adapters/asset-fetcher.js';
export type { DownloadStrategy, AssetFetcherOptions } from './adapters/asset-fetcher.js';
export { CsvResultReader, parseResultCsv } from './adapters/csv-result-reader.js';
export { JsonCredentialStore } from './adapters/json-credential-store.js';
export { PreferredIpApiUploader } from './adapters/preferred-ip-api-uploader.js';
export { GitHubContentUploader } from './adapters/github-content-uploader.js';
export type { GitHubContentUploaderOptions } from './adapters/github-content-uploader.js';
export { BinaryInstaller, SpeedtestBinary } from './adapters/speedtest-binary.js';
export { IpListProvider } from './adapters/ip-list-provider.js';

// Application services
export { SpeedtestService, MEASUREMENT_TIMEOUT_SECONDS } from './services/speedtest-service.js';
export type { RunReport, SpeedtestDeps, SpeedtestRunOptions } from './services/speedtest-service.js';
export { RegionService, DEFAULT_REGION_CODES, REGION_SCAN_TIMEOUT_SECONDS } from './services/region-service.js';
export type { RegionSummary, RegionScanOptions, RegionServiceDeps } from './services/region-service.js';
export { PROXY_LIST_FILE, generateProxyList } from './services/proxy-list.js';
export { ConfigService, maskSecret, isUploadMethod } from './services/config-service.js';
export type { UploadFlags, UploadMethod, CredentialSummary } from './services/config-service.js';

// Shared
export { fileExists, isNonEmptyFile, writeFileAtomic } from './shared/files.js';
export { createLogger, setLogLevel, getLogLevel, parseLogLevel, errorMessage } from './shared/logger.js';
export type { Logger, LogLevel } from './shared/logger.js';
export {
  EdgeprobeError,
  CapabilityUnavailableError,
  ToolNotFoundError,
  NetworkError,
  LocalIoError,
  ConfigError,
  MeasurementError,
  UserCancelledError,
} from './shared/errors.js';
