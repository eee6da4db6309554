/**
 * OPC UA binding of the ProtocolClient capability, built on node-opcua.
 *
 * The built-in reconnection of OPCUAClient is switched off: the SessionManager
 * owns retries and backoff, this class only reports the outcome of one attempt
 * and flags the handle dead on 'connection_lost'.
 */
import {
  AttributeIds,
  BrowseDescriptionOptions,
  BrowseDirection,
  ClientSession,
  MessageSecurityMode,
  OPCUAClient,
  ReadValueIdOptions,
  resolveNodeId,
  SecurityPolicy,
  UserIdentityInfo,
  UserTokenType,
} from 'node-opcua';
import { BrowseError, ConnectError, ReadError, describeError } from '../../errors/CustomError';
import type {
  DataPointId,
  Endpoint,
  SecurityMode,
  SecurityPolicyName,
} from '../../types/telemetry';
import type { ChildReference, ProtocolClient, ReadResult } from '../ProtocolClient';
import {
  classifyFailure,
  toBrowseError,
  toConnectError,
  toReadError,
} from './failureClassifier';

interface StatusLike {
  isGood(): boolean;
  name: string;
}

export interface DataValueLike {
  statusCode: StatusLike;
  value: { value: unknown };
}

export interface ReferenceLike {
  nodeId: { toString(): string };
  displayName: { text?: string | null };
  browseName: { toString(): string };
}

export interface BrowsePage {
  statusCode: StatusLike;
  continuationPoint?: Buffer | null;
  references?: ReferenceLike[] | null;
}

/** The part of a node-opcua ClientSession this binding calls. */
export interface OpcUaSession {
  read(nodeToRead: ReadValueIdOptions): Promise<DataValueLike>;
  browse(nodeToBrowse: BrowseDescriptionOptions): Promise<BrowsePage>;
  browseNext(continuationPoint: Buffer, releaseContinuationPoints: boolean): Promise<BrowsePage>;
  close(): Promise<void>;
}

export interface OpcUaConnection {
  disconnect(): Promise<void>;
}

export interface OpcUaHandle {
  client: OpcUaConnection;
  session: OpcUaSession;
  alive: boolean;
}

interface ConnectionEvents {
  on(event: 'connection_lost', listener: () => void): unknown;
}

/** Flags the handle dead once the secure channel drops. */
export function markDeadOnConnectionLost(client: ConnectionEvents, handle: OpcUaHandle): void {
  client.on('connection_lost', () => {
    handle.alive = false;
  });
}

export interface OpcUaClientOptions {
  /** unit written next to every value read */
  unit: string;
  applicationName?: string;
}

const ENDPOINT_PATTERN = /^opc\.tcp:\/\/[^\s/:]+(:\d{1,5})?(\/\S*)?$/;

/** ns=0;i=84, the address space root */
const ROOT_FOLDER = 'i=84';

const SECURITY_MODES: Record<SecurityMode, MessageSecurityMode> = {
  None: MessageSecurityMode.None,
  Sign: MessageSecurityMode.Sign,
  SignAndEncrypt: MessageSecurityMode.SignAndEncrypt,
};

const SECURITY_POLICIES: Record<SecurityPolicyName, SecurityPolicy> = {
  None: SecurityPolicy.None,
  Basic128Rsa15: SecurityPolicy.Basic128Rsa15,
  Basic256: SecurityPolicy.Basic256,
  Basic256Sha256: SecurityPolicy.Basic256Sha256,
  Aes128_Sha256_RsaOaep: SecurityPolicy.Aes128_Sha256_RsaOaep,
  Aes256_Sha256_RsaPss: SecurityPolicy.Aes256_Sha256_RsaPss,
};

const identityOf = (endpoint: Endpoint): UserIdentityInfo =>
  endpoint.username
    ? {
        type: UserTokenType.UserName,
        userName: endpoint.username,
        password: endpoint.password ?? '',
      }
    : { type: UserTokenType.Anonymous };

export class OpcUaProtocolClient implements ProtocolClient<OpcUaHandle> {
  readonly rootId: DataPointId = ROOT_FOLDER;

  constructor(private readonly options: OpcUaClientOptions) {}

  async connect(endpoint: Endpoint): Promise<OpcUaHandle> {
    if (!ENDPOINT_PATTERN.test(endpoint.address)) {
      throw new ConnectError(`malformed endpoint address: ${endpoint.address}`, 'fatal');
    }

    const client = OPCUAClient.create({
      applicationName: this.options.applicationName ?? 'opcua-telemetry-logger',
      endpointMustExist: false,
      securityMode: SECURITY_MODES[endpoint.securityMode],
      securityPolicy: SECURITY_POLICIES[endpoint.securityPolicy],
      keepSessionAlive: true,
      connectionStrategy: { maxRetry: 0, initialDelay: 1000, maxDelay: 1000 },
    });

    try {
      await client.connect(endpoint.address);
    } catch (err) {
      await this.disconnectQuietly(client);
      throw toConnectError(err);
    }

    let session: ClientSession;
    try {
      session = await client.createSession(identityOf(endpoint));
    } catch (err) {
      await this.disconnectQuietly(client);
      throw toConnectError(err);
    }

    const handle: OpcUaHandle = { client, session, alive: true };
    markDeadOnConnectionLost(client, handle);
    return handle;
  }

  async readValue(handle: OpcUaHandle, id: DataPointId): Promise<ReadResult> {
    const nodeId = this.nodeIdOf(id, message => new ReadError(message, 'fatal'));
    let dataValue: DataValueLike;
    try {
      dataValue = await handle.session.read({ nodeId, attributeId: AttributeIds.Value });
    } catch (err) {
      throw toReadError(err);
    }

    const { statusCode } = dataValue;
    if (!statusCode.isGood()) {
      throw new ReadError(statusCode.name, classifyFailure(statusCode.name));
    }
    const raw: unknown = dataValue.value.value;
    if (typeof raw === 'number') return { value: raw, unit: this.options.unit };
    if (typeof raw === 'boolean') return { value: raw ? 1 : 0, unit: this.options.unit };
    throw new ReadError(`non-numeric value of type ${typeof raw} at ${id}`, 'fatal');
  }

  async browseChildren(handle: OpcUaHandle, id: DataPointId): Promise<ChildReference[]> {
    const nodeId = this.nodeIdOf(id, message => new BrowseError(message, 'fatal'));
    const references: ReferenceLike[] = [];
    try {
      let result: BrowsePage = await handle.session.browse({
        nodeId,
        browseDirection: BrowseDirection.Forward,
        referenceTypeId: 'HierarchicalReferences',
        includeSubtypes: true,
        nodeClassMask: 0,
        resultMask: 0x3f,
      });
      for (;;) {
        if (!result.statusCode.isGood()) {
          throw new BrowseError(result.statusCode.name, classifyFailure(result.statusCode.name));
        }
        references.push(...(result.references ?? []));
        const continuationPoint = result.continuationPoint;
        if (!continuationPoint || continuationPoint.length === 0) break;
        result = await handle.session.browseNext(continuationPoint, false);
      }
    } catch (err) {
      throw toBrowseError(err);
    }

    return references.map(ref => ({
      id: ref.nodeId.toString(),
      displayName: ref.displayName.text ?? ref.browseName.toString(),
    }));
  }

  async close(handle: OpcUaHandle): Promise<void> {
    handle.alive = false;
    try {
      await handle.session.close();
    } finally {
      await handle.client.disconnect();
    }
  }

  isAlive(handle: OpcUaHandle): boolean {
    return handle.alive;
  }

  private nodeIdOf(id: DataPointId, invalid: (message: string) => Error) {
    try {
      return resolveNodeId(id);
    } catch (err) {
      throw invalid(`malformed data point id ${id}: ${describeError(err)}`);
    }
  }

  private async disconnectQuietly(client: OPCUAClient): Promise<void> {
    try {
      await client.disconnect();
    } catch (err) {
      console.warn(`[OPC UA] Disconnect after failed connect: ${describeError(err)}`);
    }
  }
}
