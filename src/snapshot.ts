export interface ClientSnapshot {
  queued: number;      // submitted, not yet bound
  bound: number;       // connections carrying a request
  free: number;
  capacity: number;
  timerArmed: boolean;
  closed: boolean;
}
