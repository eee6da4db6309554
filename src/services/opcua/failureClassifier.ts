import {
  BrowseError,
  ConnectError,
  describeError,
  FailureKind,
  ReadError,
} from '../../errors/CustomError';

/**
 * Failures that need an operator: identity, security and certificate problems,
 * addressing mistakes and type errors. Matched against OPC UA status code names
 * and against the messages node-opcua puts on thrown errors.
 */
const FATAL_PATTERNS: readonly RegExp[] = [
  /BadIdentityToken(Invalid|Rejected)/,
  /BadUserAccessDenied/,
  /BadCertificate/,
  /BadSecurity(Checks|Policy|Mode)/,
  /BadNodeId(Unknown|Invalid)/,
  /BadAttributeIdInvalid/,
  /BadNotReadable/,
  /BadTypeMismatch/,
  /BadTcpEndpointUrlInvalid/,
  /Invalid endpoint/i,
  /malformed/i,
];

/** Everything that is not fatal is transient (timeouts, resets, busy or halted servers). */
export function classifyFailure(nameOrMessage: string): FailureKind {
  return FATAL_PATTERNS.some(p => p.test(nameOrMessage)) ? 'fatal' : 'transient';
}

export function toConnectError(err: unknown): ConnectError {
  if (err instanceof ConnectError) return err;
  const text = describeError(err);
  return new ConnectError(text, classifyFailure(text));
}

export function toReadError(err: unknown): ReadError {
  if (err instanceof ReadError) return err;
  const text = describeError(err);
  return new ReadError(text, classifyFailure(text));
}

export function toBrowseError(err: unknown): BrowseError {
  if (err instanceof BrowseError) return err;
  const text = describeError(err);
  return new BrowseError(text, classifyFailure(text));
}
