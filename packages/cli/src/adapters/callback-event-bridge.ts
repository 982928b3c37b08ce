import type {
  MeasurementRecord,
  RunReport,
  SpeedtestEvents,
  SpeedtestStage,
  UploadOutcome,
} from '@edgeprobe/core';

export type EventHandler = {
  onStageChange?: (stage: SpeedtestStage, summary: string) => void;
  onRecords?: (records: readonly MeasurementRecord[]) => void;
  onUploadComplete?: (outcome: UploadOutcome) => void;
  onComplete?: (report: RunReport) => void;
  onError?: (error: string) => void;
};

export function createCallbackEventBridge(handlers: EventHandler): SpeedtestEvents {
  return {
    onStageChange: (stage, summary) => handlers.onStageChange?.(stage, summary),
    onRecords: (records) => handlers.onRecords?.(records),
    onUploadComplete: (outcome) => handlers.onUploadComplete?.(outcome),
    onComplete: (report) => handlers.onComplete?.(report),
    onError: (error) => handlers.onError?.(error),
  };
}
