import type { MeasurementRecord } from '../domain/measurement/measurement-record.js';
import type { ApiUploadTarget, RepositoryUploadTarget } from '../domain/upload/upload-target.js';
import type { ApiUploadOutcome, RepositoryUploadOutcome } from '../domain/upload/upload-outcome.js';

export interface ApiUploader {
  upload(records: readonly MeasurementRecord[], target: Omit<ApiUploadTarget, 'kind'>): Promise<ApiUploadOutcome>;
}

export interface RepositoryUploader {
  upload(records: readonly MeasurementRecord[], target: Omit<RepositoryUploadTarget, 'kind'>): Promise<RepositoryUploadOutcome>;
}
