import type { MeasurementRecord } from '../domain/measurement/measurement-record.js';

export interface ResultReader {
  /** Re-reads `path` on every call; rows arrive in file order. */
  readRecords(path: string): Promise<MeasurementRecord[]>;
}
