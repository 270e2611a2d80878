export type ReportingMode = 'realtime' | 'batch';

export interface DeviceActivity {
  lastSeenMs: number; // monotonic clock
  mode: ReportingMode;
  hitsSent: number;
}

export interface ActiveDevicesSnapshot {
  readonly total: number;
  readonly realtime: number;
  readonly batch: number;
  readonly windowSeconds: number;
}

export interface StatsSnapshot {
  readonly uptimeSeconds: number;
  readonly hitsReceived: number;
  readonly hitsStored: number;
  readonly hitsRejected: number;
  readonly bytesReceived: number;
  readonly bytesStored: number;
  readonly batchesReceived: number;
  readonly heartbeatsReceived: number;
  readonly storageErrors: number;
  readonly queueDepth: number;
  readonly queueMaxDepth: number;
  readonly activeDevices: ActiveDevicesSnapshot;
}
