import type { DataPointId, Endpoint } from '../types/telemetry';

export interface ReadResult {
  value: number;
  unit: string;
}

export interface ChildReference {
  id: DataPointId;
  displayName: string;
}

/**
 * Session-oriented remote data-point protocol, consumed as an opaque capability.
 * `H` is the implementation's connection handle.
 *
 * Implementations throw ConnectError / ReadError / BrowseError with the
 * transient/fatal classification already applied; anything else is treated
 * as transient by the callers.
 */
export interface ProtocolClient<H> {
  /** Top of the server's address space, used when browsing without an explicit root. */
  readonly rootId: DataPointId;
  connect(endpoint: Endpoint): Promise<H>;
  readValue(handle: H, id: DataPointId): Promise<ReadResult>;
  browseChildren(handle: H, id: DataPointId): Promise<ChildReference[]>;
  close(handle: H): Promise<void>;
  /** Liveness check; handles are assumed alive when not implemented. */
  isAlive?(handle: H): boolean;
}
