export type GateOptions = {
  capacity: number;
  admissionTimeoutMs: number;
};

export type AcquireOptions = {
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type GateSlot = {
  readonly id: number;
  readonly acquiredAt: number;
};

export type GateStats = {
  capacity: number;
  inFlight: number;
  queued: number;
  peakInFlight: number;
  admitted: number;
  rejected: number;
  cancelled: number;
};
