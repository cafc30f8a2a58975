import type { DriverArch, DriverPlatform, VersionRecord } from './driver';

export interface DownloadRequest {
  downloadUrl: string;
  outputDirectory: string;
  version: string;
  platform: DriverPlatform;
  arch: DriverArch;
  isLegacy: boolean;
}

/**
 * Fetches and unpacks one archive. The download counts as failed when the
 * promise rejects or resolves to `false`; any other value is a success.
 */
export type DownloadCollaborator = (request: DownloadRequest) => Promise<unknown>;

export interface MissingDriver {
  versionDir: string;
  record: VersionRecord;
}

export interface DownloadOutcome {
  versionDir: string;
  record: VersionRecord;
  success: boolean;
  error?: string;
}

export interface DownloadSummary {
  succeeded: number;
  failed: number;
  outcomes: DownloadOutcome[];
}

export interface ReconcileOptions {
  candidates: VersionRecord[];
  root: string;
  downloader?: DownloadCollaborator;
}

export interface ReconcileReport {
  root: string;
  present: string[];
  missing: MissingDriver[];
  downloads?: DownloadSummary;
}
