import type {
  ChildReference,
  ProtocolClient,
  ReadResult,
} from '../../services/ProtocolClient';
import type { DataPointId, Endpoint } from '../../types/telemetry';

export interface FakeHandle {
  id: number;
  alive: boolean;
}

const endpoint: Endpoint = {
  address: 'opc.tcp://plc.test:4840',
  securityMode: 'None',
  securityPolicy: 'None',
};

export const TEST_ENDPOINT = Object.freeze(endpoint);

/**
 * In-process stand-in for a protocol server. Outcomes are scripted per call:
 * `connectOutcomes` / `readOutcomes` are consumed front to back, and when a
 * queue is empty the call succeeds with the defaults.
 */
export class FakeProtocolClient implements ProtocolClient<FakeHandle> {
  readonly rootId: DataPointId = 'i=85';

  connectOutcomes: Array<Error | undefined> = [];
  readOutcomes: Array<number | Error> = [];
  defaultValue = 1;
  unit = 'mbar';
  tree: Record<DataPointId, ChildReference[]> = {};
  browseFailures: Record<DataPointId, Error> = {};
  /** runs at the start of every read, e.g. to advance a fake clock */
  onRead?: (call: number) => void;
  onBrowse?: (id: DataPointId) => void;

  connectCalls = 0;
  readCalls = 0;
  browseCalls: DataPointId[] = [];
  closed: number[] = [];
  handles: FakeHandle[] = [];

  async connect(_endpoint: Endpoint): Promise<FakeHandle> {
    this.connectCalls++;
    const outcome = this.connectOutcomes.shift();
    if (outcome) throw outcome;
    const handle = { id: this.handles.length + 1, alive: true };
    this.handles.push(handle);
    return handle;
  }

  async readValue(_handle: FakeHandle, _id: DataPointId): Promise<ReadResult> {
    this.readCalls++;
    this.onRead?.(this.readCalls);
    const outcome = this.readOutcomes.shift();
    if (outcome instanceof Error) throw outcome;
    return { value: outcome ?? this.defaultValue, unit: this.unit };
  }

  async browseChildren(_handle: FakeHandle, id: DataPointId): Promise<ChildReference[]> {
    this.browseCalls.push(id);
    this.onBrowse?.(id);
    const failure = this.browseFailures[id];
    if (failure) throw failure;
    return this.tree[id] ?? [];
  }

  async close(handle: FakeHandle): Promise<void> {
    handle.alive = false;
    this.closed.push(handle.id);
  }

  isAlive(handle: FakeHandle): boolean {
    return handle.alive;
  }
}
