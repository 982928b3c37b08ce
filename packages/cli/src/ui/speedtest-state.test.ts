import { describe, expect, it } from 'vitest';
import { DEFAULT_THRESHOLDS, RunSession, type MeasurementRecord, type RunReport } from '@edgeprobe/core';
import { initialState, speedtestReducer, type Action } from './speedtest-state.js';

const record: MeasurementRecord = {
  ip: '104.16.1.1',
  port: 443,
  throughputMBps: 2.5,
  latency: '120',
  regionCode: 'HKG',
  regionName: '香港',
};

function replay(actions: Action[]) {
  return actions.reduce(speedtestReducer, initialState);
}

describe('speedtestReducer', () => {
  it('should mark the previous stage complete on a stage change', () => {
    const state = replay([
      { type: 'STAGE_CHANGE', stage: 'prepare', summary: 'Preparing IP list' },
      { type: 'STAGE_CHANGE', stage: 'prepare', summary: 'Scanning regions' },
      { type: 'STAGE_CHANGE', stage: 'measure', summary: 'Measuring' },
    ]);

    expect(state.stage).toBe('measure');
    expect(state.stageSummary).toBe('Measuring');
    expect(state.completedStages).toEqual(['prepare']);
  });

  it('should take records and upload outcome from the final report', () => {
    const report: RunReport = {
      session: new RunSession({ mode: 'beginner', ipVersion: 'ipv4', thresholds: DEFAULT_THRESHOLDS }, ['edgeprobe']),
      records: [record],
      upload: { target: 'api', kind: 'success', added: 1, skipped: 0, failed: 0, uploaded: 1 },
      rerunCommand: 'edgeprobe run',
    };

    const state = replay([
      { type: 'STAGE_CHANGE', stage: 'read', summary: 'Reading results' },
      { type: 'COMPLETE', report },
    ]);

    expect(state.done).toBe(true);
    expect(state.completedStages).toEqual(['read']);
    expect(state.records).toEqual([record]);
    expect(state.upload?.kind).toBe('success');
  });

  it('should finish with the error message', () => {
    const state = replay([
      { type: 'STAGE_CHANGE', stage: 'measure', summary: 'Measuring' },
      { type: 'ERROR', error: 'Measurement binary exited with code 1' },
    ]);

    expect(state).toMatchObject({ done: true, error: 'Measurement binary exited with code 1', completedStages: [] });
  });
});
