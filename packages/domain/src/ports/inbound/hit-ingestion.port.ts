import type { ClientMessage } from '../../entities/client-message.js';

// ---------------------------------------------------------------------------
// Result of admitting one client message
// ---------------------------------------------------------------------------

/**
 * `storedCount` counts hits that were enqueued. A later write failure in the
 * storage consumer does not change it: acceptance is best-effort durability.
 */
export interface ProcessResult {
  accepted: boolean;
  error: string;
  storedCount: number;
}

/** Marker carried by the error text when the protocol version is below the minimum. */
export const PROTOCOL_TOO_OLD_MARKER = 'too old';

// ---------------------------------------------------------------------------
// Port
// ---------------------------------------------------------------------------

export interface HitIngestionPort {
  process(message: ClientMessage, sizeBytes: number): Promise<ProcessResult>;
}
