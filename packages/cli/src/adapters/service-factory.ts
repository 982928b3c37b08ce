import {
  AssetFetcher,
  BinaryInstaller,
  ChildProcessRunner,
  ConfigService,
  CsvResultReader,
  GitHubContentUploader,
  IpListProvider,
  JsonCredentialStore,
  PreferredIpApiUploader,
  RegionService,
  SpeedtestBinary,
  SpeedtestService,
  createHttpClient,
  defaultDownloadStrategies,
  detectPlatform,
  loadColoTable,
  type ColoTable,
  type SpeedtestEvents,
} from '@edgeprobe/core';
import { getConfigDir } from './xdg-paths.js';

export interface Services {
  colos: ColoTable;
  reader: CsvResultReader;
  ipLists: IpListProvider;
  regions: RegionService;
  speedtest: SpeedtestService;
  config: ConfigService;
}

const noopEvents: SpeedtestEvents = {
  onStageChange: () => {},
  onRecords: () => {},
  onUploadComplete: () => {},
  onComplete: () => {},
  onError: () => {},
};

/** Wires the core adapters for one working directory. */
export async function createServices(workDir: string, events: SpeedtestEvents = noopEvents): Promise<Services> {
  const runner = new ChildProcessRunner();
  const client = createHttpClient(runner);
  const fetcher = new AssetFetcher(defaultDownloadStrategies(client, runner));
  const colos = await loadColoTable(process.env.EDGEPROBE_COLO_FILE);
  const reader = new CsvResultReader(colos);

  // Created on first use: detectPlatform throws on unsupported hosts.
  let installer: BinaryInstaller | undefined;
  const getInstaller = (): BinaryInstaller => {
    installer ??= new BinaryInstaller(fetcher, runner, workDir, detectPlatform());
    return installer;
  };
  const measurement = new SpeedtestBinary(runner, () => getInstaller().ensure(), workDir);

  const ipLists = new IpListProvider(fetcher, workDir);
  const regions = new RegionService({ measurement, reader, colos, workDir });
  const speedtest = new SpeedtestService({
    ipLists,
    measurement,
    reader,
    regions,
    apiUploader: new PreferredIpApiUploader(client),
    repositoryUploader: new GitHubContentUploader(client),
    events,
    workDir,
  });

  return {
    colos,
    reader,
    ipLists,
    regions,
    speedtest,
    config: new ConfigService(new JsonCredentialStore(getConfigDir())),
  };
}
