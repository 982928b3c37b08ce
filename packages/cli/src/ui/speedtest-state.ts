import type { MeasurementRecord, RunReport, SpeedtestStage, UploadOutcome } from '@edgeprobe/core';

export interface SpeedtestState {
  stage: SpeedtestStage | null;
  stageSummary: string;
  completedStages: SpeedtestStage[];
  records: readonly MeasurementRecord[];
  upload: UploadOutcome | null;
  report: RunReport | null;
  error: string | null;
  done: boolean;
}

export type Action =
  | { type: 'STAGE_CHANGE'; stage: SpeedtestStage; summary: string }
  | { type: 'RECORDS'; records: readonly MeasurementRecord[] }
  | { type: 'UPLOAD_COMPLETE'; outcome: UploadOutcome }
  | { type: 'COMPLETE'; report: RunReport }
  | { type: 'ERROR'; error: string };

export function speedtestReducer(state: SpeedtestState, action: Action): SpeedtestState {
  switch (action.type) {
    case 'STAGE_CHANGE': {
      const completedStages =
        state.stage && state.stage !== action.stage && !state.completedStages.includes(state.stage)
          ? [...state.completedStages, state.stage]
          : state.completedStages;
      return { ...state, stage: action.stage, stageSummary: action.summary, completedStages };
    }

    case 'RECORDS':
      return { ...state, records: action.records };

    case 'UPLOAD_COMPLETE':
      return { ...state, upload: action.outcome };

    case 'COMPLETE': {
      const completedStages =
        state.stage && !state.completedStages.includes(state.stage)
          ? [...state.completedStages, state.stage]
          : state.completedStages;
      return {
        ...state,
        completedStages,
        report: action.report,
        records: action.report.records,
        upload: action.report.upload ?? state.upload,
        done: true,
      };
    }

    case 'ERROR':
      return { ...state, error: action.error, done: true };

    default:
      return state;
  }
}

export const initialState: SpeedtestState = {
  stage: null,
  stageSummary: '',
  completedStages: [],
  records: [],
  upload: null,
  report: null,
  error: null,
  done: false,
};
