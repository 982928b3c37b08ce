export type ApiUploadOutcome =
  | { kind: 'success'; added: number; skipped: number; failed: number; uploaded: number }
  | { kind: 'unauthorized'; statusCode: 403 }
  | { kind: 'rejected'; statusCode: number; message: string }
  | { kind: 'network-error'; message: string }
  | { kind: 'no-records' };

export type RepositoryUploadOutcome =
  | { kind: 'success'; rawContentUrl: string; htmlUrl?: string; uploaded: number }
  | { kind: 'unauthorized'; statusCode: 401 }
  | { kind: 'not-found'; statusCode: 404 }
  | { kind: 'rejected'; statusCode: number; message: string }
  | { kind: 'network-error'; message: string }
  | { kind: 'no-records' };

export type UploadOutcome =
  | ({ target: 'api' } & ApiUploadOutcome)
  | ({ target: 'repository' } & RepositoryUploadOutcome);

export function isUploadSuccess(outcome: UploadOutcome): boolean {
  return outcome.kind === 'success';
}

export function describeUploadOutcome(outcome: UploadOutcome): string {
  switch (outcome.kind) {
    case 'success':
      return outcome.target === 'api'
        ? `Uploaded ${outcome.uploaded}: ${outcome.added} added, ${outcome.skipped} skipped, ${outcome.failed} failed`
        : `Uploaded ${outcome.uploaded} to ${outcome.rawContentUrl}`;
    case 'unauthorized':
      return outcome.target === 'api'
        ? 'Authorization failed (HTTP 403): check the UUID/path and that API management is enabled'
        : 'Authorization failed (HTTP 401): check the token and its repo scope';
    case 'not-found':
      return 'Repository not found or token lacks write access (HTTP 404)';
    case 'rejected':
      return `Upload rejected (HTTP ${outcome.statusCode}): ${outcome.message}`;
    case 'network-error':
      return `Network error: ${outcome.message}`;
    case 'no-records':
      return 'No valid measurement results to upload';
  }
}
