/* -------------------------------------------------------------------------------------------------
 * Domain types shared by the acquisition pipeline and the browse mode
 * ------------------------------------------------------------------------------------------------- */

/** Server-defined identifier of one addressable value, e.g. `ns=1;s=G1_pressure`. */
export type DataPointId = string;

export type SecurityMode = 'None' | 'Sign' | 'SignAndEncrypt';

export type SecurityPolicyName =
  | 'None'
  | 'Basic128Rsa15'
  | 'Basic256'
  | 'Basic256Sha256'
  | 'Aes128_Sha256_RsaOaep'
  | 'Aes256_Sha256_RsaPss';

/**
 * Immutable descriptor of the remote server. Created once from configuration.
 */
export interface Endpoint {
  readonly address: string; // opc.tcp://host:port[/path]
  readonly securityMode: SecurityMode;
  readonly securityPolicy: SecurityPolicyName;
  readonly username?: string;
  readonly password?: string;
}

export type SessionState = 'disconnected' | 'connecting' | 'connected' | 'closing';

export interface SessionStateChange {
  from: SessionState;
  to: SessionState;
  reason?: string;
}

/** A live negotiated connection. Only the SessionManager creates these. */
export interface Session<H> {
  readonly id: number;
  readonly endpoint: Endpoint;
  readonly handle: H;
  readonly connectedAt: Date;
}

export type ReadingStatus = { kind: 'ok' } | { kind: 'failed'; reason: string };

/**
 * One poll result. Failed readings carry `NaN` as value and an empty unit.
 */
export interface Reading {
  readonly timestamp: Date;
  readonly value: number;
  readonly unit: string;
  readonly status: ReadingStatus;
}

export interface CatalogNode {
  readonly id: DataPointId;
  readonly displayName: string;
  readonly children: readonly CatalogNode[];
}

/** One row of the flattened catalog listing. */
export interface CatalogEntry {
  id: DataPointId;
  displayName: string;
  /** display names joined with '/', starting below the browse root */
  path: string;
  depth: number;
}

/** JSON shape used by the status API, Socket.IO and MQTT. */
export type ReadingPayload = {
  timestamp: string;
  value: number | null;
  unit: string;
  status: 'ok' | 'failed';
  reason?: string;
};

export const okReading = (timestamp: Date, value: number, unit: string): Reading => {
  const reading: Reading = { timestamp, value, unit, status: { kind: 'ok' } };
  return Object.freeze(reading);
};

export const failedReading = (timestamp: Date, reason: string): Reading => {
  const reading: Reading = {
    timestamp,
    value: Number.NaN,
    unit: '',
    status: { kind: 'failed', reason },
  };
  return Object.freeze(reading);
};

export const toReadingPayload = (reading: Reading): ReadingPayload =>
  reading.status.kind === 'ok'
    ? {
        timestamp: reading.timestamp.toISOString(),
        value: Number.isFinite(reading.value) ? reading.value : null,
        unit: reading.unit,
        status: 'ok',
      }
    : {
        timestamp: reading.timestamp.toISOString(),
        value: null,
        unit: '',
        status: 'failed',
        reason: reading.status.reason,
      };
