/**
 * Error taxonomy for the gateway link and startup configuration.
 *
 * ConnectError and LinkError are retried by the reconnect loop, AuthError is
 * retried after a cooldown, ProtocolError abandons a single request and
 * ConfigError is fatal at startup.
 */

export class BridgeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** TCP connect failed, timed out or the peer hung up before login completed */
export class ConnectError extends BridgeError {}

/** Gateway rejected the login code */
export class AuthError extends BridgeError {}

/** Session broke mid-request, or no session is available */
export class LinkError extends BridgeError {}

/** Gateway answered with something we cannot interpret */
export class ProtocolError extends BridgeError {}

export class ConfigError extends BridgeError {}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
