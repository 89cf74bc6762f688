/**
 * Lifecycle of one recording within a transfer run.
 *
 * Pending → Downloading → Downloaded → Uploading → Uploaded → Notifying → Cleaning → Done
 *    ↘ Skipped          ↘ DownloadFailed         ↘ UploadFailed
 */

import { StateTransitionError } from '../common/errors';

export type RecordingState =
  | 'Pending'
  | 'Skipped'
  | 'Downloading'
  | 'Downloaded'
  | 'DownloadFailed'
  | 'Uploading'
  | 'Uploaded'
  | 'UploadFailed'
  | 'Notifying'
  | 'Cleaning'
  | 'Done';

export interface RecordingStateTransition {
  from: RecordingState;
  to: RecordingState;
  timestamp: Date;
  reason?: string;
}

const validTransitions: Record<RecordingState, ReadonlySet<RecordingState>> = {
  Pending: new Set<RecordingState>(['Downloading', 'Skipped']),
  Downloading: new Set<RecordingState>(['Downloaded', 'DownloadFailed']),
  Downloaded: new Set<RecordingState>(['Uploading']),
  Uploading: new Set<RecordingState>(['Uploaded', 'UploadFailed']),
  Uploaded: new Set<RecordingState>(['Notifying']),
  Notifying: new Set<RecordingState>(['Cleaning']),
  Cleaning: new Set<RecordingState>(['Done']),
  Skipped: new Set<RecordingState>(),
  DownloadFailed: new Set<RecordingState>(),
  UploadFailed: new Set<RecordingState>(),
  Done: new Set<RecordingState>(),
};

export function isValidTransition(from: RecordingState, to: RecordingState): boolean {
  return validTransitions[from].has(to);
}

export class RecordingStateMachine {
  private current: RecordingState = 'Pending';
  private readonly history: RecordingStateTransition[] = [];

  constructor(private readonly recording: string) {}

  get state(): RecordingState {
    return this.current;
  }

  get transitions(): readonly RecordingStateTransition[] {
    return this.history;
  }

  transition(to: RecordingState, reason?: string): void {
    if (!isValidTransition(this.current, to)) {
      throw new StateTransitionError(this.recording, this.current, to);
    }
    this.history.push({ from: this.current, to, timestamp: new Date(), reason });
    this.current = to;
  }
}
