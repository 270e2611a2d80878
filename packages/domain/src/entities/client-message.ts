import type { Hit } from './hit.js';

export interface Heartbeat {
  readonly timestampMs: number;
  readonly pendingHits: number;
}

/**
 * One decoded request from a mobile client. `hit`, `hits` and `heartbeat`
 * are mutually exclusive in practice; the processor picks the first present
 * in the order heartbeat, hit, hits.
 */
export interface ClientMessage {
  readonly protocolVersion: number;
  readonly deviceId: string;
  readonly appVersion: number;
  readonly hit?: Hit;
  readonly hits?: readonly Hit[];
  readonly heartbeat?: Heartbeat;
}
