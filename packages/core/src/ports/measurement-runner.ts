import type { MeasurementOptions } from '../domain/measurement/measurement-options.js';

export interface MeasureRunOptions {
  timeoutSeconds?: number;
  abortSignal?: AbortSignal;
  /** Show the binary's own progress output on the terminal. */
  inheritOutput?: boolean;
}

export interface MeasurementRunner {
  /** Resolves once the output CSV is complete; rejects with `MeasurementError` otherwise. */
  measure(options: MeasurementOptions, runOptions?: MeasureRunOptions): Promise<void>;
}
