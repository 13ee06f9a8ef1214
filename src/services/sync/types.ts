import type { RecordKind } from '../../utils/errors.js';

export interface ItemError {
  kind: RecordKind;
  ref: string;
  error: string;
}

export interface SyncReport {
  created: number;
  updated: number;
  removed: number;
  errors: ItemError[];
}

export interface MirrorReport {
  added: number;
  alreadyPresent: number;
  remotePlaylistId: string;
  createdRemote: boolean;
}

export type RunState = 'idle' | 'fetching' | 'reconciling' | 'mirror_updating' | 'done' | 'failed';

export interface RunOptions {
  /** Whether to run the mirror playlist step; defaults to the configured value. */
  mirror?: boolean;
  signal?: AbortSignal;
}

export interface RunResult {
  runId: string;
  state: 'done' | 'failed';
  sync: SyncReport | null;
  mirror: MirrorReport | null;
  /** Set when the mirror step ran and failed; the run itself still completes. */
  mirrorError: string | null;
  /** Set when the run failed. */
  error: string | null;
  startedAt: string;
  finishedAt: string;
}

export type StateListener = (state: RunState, runId: string) => void;

export function emptyReport(): SyncReport {
  return { created: 0, updated: 0, removed: 0, errors: [] };
}
