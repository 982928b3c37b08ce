import type { MeasurementRecord } from '../domain/measurement/measurement-record.js';
import type { UploadOutcome } from '../domain/upload/upload-outcome.js';
import type { RunReport } from '../services/speedtest-service.js';

export type SpeedtestStage = 'prepare' | 'measure' | 'read' | 'upload';

export interface SpeedtestEvents {
  onStageChange(stage: SpeedtestStage, summary: string): void;
  onRecords(records: readonly MeasurementRecord[]): void;
  onUploadComplete(outcome: UploadOutcome): void;
  onComplete(report: RunReport): void;
  onError(error: string): void;
}
