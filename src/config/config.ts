/* eslint-disable spaced-comment */
import { ValidationError } from '../errors/CustomError';
import { validationErrorType } from '../types/errorType';
import type {
  DataPointId,
  Endpoint,
  SecurityMode,
  SecurityPolicyName,
} from '../types/telemetry';
import * as dotenv from 'dotenv';
import path from 'path';

const envPath = path.join(process.cwd(), '.env');

dotenv.config({ path: envPath });

const getEnvVariable = (key: string, defaultValue?: string): string => {
  const value = process.env[key];
  if (!value) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ValidationError(`Missing environment variable: ${key}`, [
      { field: key, message: 'is required' },
    ]);
  }
  return value;
};

/** `disabled`, `none`, `off` and empty values switch an optional surface off. */
const isDisabled = (raw: string): boolean =>
  raw === '' || /^(disabled|none|off)$/i.test(raw);

export const MODE = getEnvVariable('NODE_ENV', 'development');

export interface AcquisitionConfig {
  endpoint: Endpoint;
  dataPointId: DataPointId;
  unit: string;
  logFilePath: string;
  pollIntervalMs: number;
  connectTimeoutMs: number;
  readTimeoutMs: number;
  maxBrowseDepth: number;
  browseRootId: DataPointId;
  backoff: { baseMs: number; capMs: number };
  /** null when the status API is disabled */
  statusPort: number | null;
  mqtt: { broker: string; topic: string } | null;
  liveEmitEnabled: boolean;
}

const SECURITY_MODES: readonly SecurityMode[] = ['None', 'Sign', 'SignAndEncrypt'];

const SECURITY_POLICIES: readonly SecurityPolicyName[] = [
  'None',
  'Basic128Rsa15',
  'Basic256',
  'Basic256Sha256',
  'Aes128_Sha256_RsaOaep',
  'Aes256_Sha256_RsaPss',
];

/** Seconds to whole milliseconds; any positive duration stays at least 1 ms. */
const toMs = (seconds: number): number => Math.max(1, Math.round(seconds * 1000));

const isSecurityMode = (v: string): v is SecurityMode =>
  (SECURITY_MODES as readonly string[]).includes(v);

const isSecurityPolicy = (v: string): v is SecurityPolicyName =>
  (SECURITY_POLICIES as readonly string[]).includes(v);

/**
 * Reads and validates the acquisition settings from the environment.
 * All problems are collected and reported together in one ValidationError.
 *
 * The endpoint address itself is not validated here: a malformed address is
 * reported by the protocol client as a fatal connect error.
 */
export function loadConfig(): AcquisitionConfig {
  const details: validationErrorType[] = [];

  const positive = (key: string, fallback: string): number => {
    const raw = getEnvVariable(key, fallback);
    const n = Number(raw);
    if (!Number.isFinite(n) || n <= 0) {
      details.push({ field: key, message: 'must be a number > 0', value: raw });
      return Number(fallback);
    }
    return n;
  };

  const positiveInt = (key: string, fallback: string): number => {
    const n = positive(key, fallback);
    if (!Number.isInteger(n)) {
      details.push({ field: key, message: 'must be an integer', value: String(n) });
      return Number(fallback);
    }
    return n;
  };

  const securityMode = getEnvVariable('SECURITY_MODE', 'None');
  if (!isSecurityMode(securityMode)) {
    details.push({
      field: 'SECURITY_MODE',
      message: `must be one of ${SECURITY_MODES.join(', ')}`,
      value: securityMode,
    });
  }
  const securityPolicy = getEnvVariable('SECURITY_POLICY', 'None');
  if (!isSecurityPolicy(securityPolicy)) {
    details.push({
      field: 'SECURITY_POLICY',
      message: `must be one of ${SECURITY_POLICIES.join(', ')}`,
      value: securityPolicy,
    });
  }

  const username = process.env.OPCUA_USERNAME || undefined;
  // an empty password is a valid credential
  const password = process.env.OPCUA_PASSWORD;
  if (username && password === undefined) {
    details.push({ field: 'OPCUA_PASSWORD', message: 'is required with OPCUA_USERNAME' });
  }

  const pollIntervalSeconds = positive('POLL_INTERVAL_SECONDS', '10');
  const connectTimeoutSeconds = positive('CONNECT_TIMEOUT_SECONDS', '10');
  const readTimeoutSeconds = positive('READ_TIMEOUT_SECONDS', '5');
  const maxBrowseDepth = positiveInt('MAX_BROWSE_DEPTH', '8');
  const baseMs = positiveInt('RECONNECT_BASE_MS', '1000');
  const capMs = positiveInt('RECONNECT_CAP_MS', '30000');
  if (capMs < baseMs) {
    details.push({
      field: 'RECONNECT_CAP_MS',
      message: 'must not be lower than RECONNECT_BASE_MS',
      value: String(capMs),
    });
  }

  const rawStatusPort = getEnvVariable('STATUS_PORT', 'disabled');
  let statusPort: number | null = null;
  if (!isDisabled(rawStatusPort)) {
    const port = Number(rawStatusPort);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      details.push({ field: 'STATUS_PORT', message: 'must be a TCP port', value: rawStatusPort });
    } else {
      statusPort = port;
    }
  }

  const broker = getEnvVariable('MQTT_BROKER', 'disabled');
  const topic = getEnvVariable('MQTT_TOPIC', 'telemetry/readings');

  const liveEmitRaw = getEnvVariable('LIVE_EMIT_ENABLED', '1').toLowerCase();

  if (details.length > 0 || !isSecurityMode(securityMode) || !isSecurityPolicy(securityPolicy)) {
    throw new ValidationError('Invalid configuration', details);
  }

  const endpoint: Endpoint = Object.freeze({
    address: getEnvVariable('ENDPOINT_ADDRESS', 'opc.tcp://localhost:4840'),
    securityMode,
    securityPolicy,
    username,
    password,
  });

  return {
    endpoint,
    dataPointId: getEnvVariable('DATA_POINT_ID', 'ns=1;s=G1_pressure'),
    unit: process.env.DATA_POINT_UNIT ?? 'mbar',
    logFilePath: getEnvVariable('LOG_FILE_PATH', 'pressure_log.txt'),
    pollIntervalMs: toMs(pollIntervalSeconds),
    connectTimeoutMs: toMs(connectTimeoutSeconds),
    readTimeoutMs: toMs(readTimeoutSeconds),
    maxBrowseDepth,
    browseRootId: getEnvVariable('BROWSE_ROOT_ID', 'i=85'),
    backoff: { baseMs, capMs },
    statusPort,
    mqtt: isDisabled(broker) ? null : { broker, topic },
    liveEmitEnabled: !['0', 'false', 'off', 'no'].includes(liveEmitRaw),
  };
}
