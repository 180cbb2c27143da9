export type ScanStatus = 'running' | 'success' | 'partial' | 'failed';
export type ScanTrigger = 'scheduled' | 'manual';
export type SchedulerState = 'idle' | 'running';

export interface ScanRecord {
  id: number;
  trigger: ScanTrigger;
  status: ScanStatus;
  startedAt: Date;
  finishedAt: Date | null;
  businessesFetched: number;
  newCount: number;
  changedCount: number;
  removedCount: number;
  malformedCount: number;
  errorCode: string | null;
  errorMessage: string | null;
}

export interface SchedulerStatus {
  state: SchedulerState;
  enabled: boolean;
  currentScanId: number | null;
  lastFireAt: Date | null;
  nextDueAt: Date | null;
  lastScan: ScanRecord | null;
  skippedCycles: number;
}
