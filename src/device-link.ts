import * as net from 'net';
import { StringDecoder } from 'string_decoder';
import { delay } from './delay';
import { AuthError, ConnectError, LinkError, ProtocolError, describeError } from './errors';
import {
  GET_DEVICES_COMMAND,
  encodeFrame,
  getNameCommand,
  isLoginOk,
  loginCommand,
  parseDeviceList,
  parseName,
  takeFrame,
} from './protocol';
import { GatewayConfig, LinkState } from './types';

/** The part of net.Socket the link relies on */
export interface LinkSocket {
  write(data: string): boolean;
  end(): void;
  destroy(): void;
  setKeepAlive(enable: boolean, initialDelay: number): void;
  on(event: 'data', listener: (chunk: Buffer) => void): void;
  on(event: 'error', listener: (error: Error) => void): void;
  on(event: 'close', listener: () => void): void;
  once(event: 'connect', listener: () => void): void;
}

export type SocketFactory = (host: string, port: number) => LinkSocket;

export type LinkStateListener = (state: LinkState, previous: LinkState) => void;

/** Serialized request/response access to the gateway */
export interface DeviceChannel {
  request<T>(command: string, parse: (frame: string) => T): Promise<T>;
}

interface PendingRead {
  resolve: (frame: string) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

interface Session {
  socket: LinkSocket;
  authenticated: boolean;
  lastSentAt: number | null;
  buffer: string;
  // Keeps multi-byte characters intact across TCP chunks
  decoder: StringDecoder;
  reader: PendingRead | null;
  onConnectFailed: ((error: ConnectError) => void) | null;
  closed: boolean;
}

const defaultSocketFactory: SocketFactory = (host, port) => net.createConnection({ host, port });

export class DeviceLink implements DeviceChannel {
  private session: Session | null = null;
  private connecting: Session | null = null;
  private state: LinkState = 'idle';
  private lane: Promise<void> = Promise.resolve();
  private reconnecting = false;
  private connectFailures = 0;
  private authFailures = 0;
  private protocolErrors = 0;
  private listeners: LinkStateListener[] = [];
  private shutdown = new AbortController();

  constructor(
    private config: GatewayConfig,
    private createSocket: SocketFactory = defaultSocketFactory
  ) {}

  getState(): LinkState {
    return this.state;
  }

  isConnected(): boolean {
    return this.session !== null && this.session.authenticated;
  }

  onStateChange(listener: LinkStateListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  /** Begin connecting in the background; retries until logged in or closed */
  start(): void {
    this.scheduleReconnect();
  }

  /**
   * Open a socket and log in. One attempt only.
   * Throws ConnectError for network trouble and AuthError when the code is refused.
   */
  async connect(): Promise<void> {
    if (this.state === 'closed') {
      throw new ConnectError('Link is closed');
    }

    const previous = this.session;
    this.session = null;
    if (previous) {
      this.endSession(previous, new LinkError('Replaced by a new session'), true);
    }

    this.setState('connecting');
    const { host, port, code } = this.config;
    console.log(`[Link] Connecting to gateway at ${host}:${port}...`);

    let session: Session;
    try {
      session = await this.openSocket();
    } catch (error) {
      this.connecting = null;
      this.markIdle();
      throw error;
    }

    let response: string;
    try {
      response = await this.exchange(session, loginCommand(code));
    } catch (error) {
      this.endSession(session, new ConnectError('Login exchange failed'));
      this.markIdle();
      throw new ConnectError(`Login exchange failed: ${describeError(error)}`, { cause: error });
    } finally {
      this.connecting = null;
    }

    if (!isLoginOk(response)) {
      this.endSession(session, new AuthError('Login rejected'));
      this.markIdle();
      throw new AuthError(`Gateway rejected login code (response: ${JSON.stringify(response)})`);
    }

    session.authenticated = true;
    this.session = session;
    this.protocolErrors = 0;
    this.setState('authenticated');
  }

  /**
   * Send one frame and wait for its answer. Requests are queued so only one
   * is on the wire at a time, and frame starts are at least cmdGapMs apart.
   */
  sendCommand(command: string): Promise<string> {
    return this.exclusive(async () => {
      const session = this.session;
      if (!session || !session.authenticated) {
        throw new LinkError(`Not connected to gateway, dropping "${command}"`);
      }

      const wait = this.remainingGap(session);
      if (wait > 0) {
        const elapsed = await delay(wait, this.shutdown.signal);
        if (!elapsed) {
          throw new LinkError(`Link closed before "${command}" was sent`);
        }
      }
      if (session !== this.session || session.closed) {
        throw new LinkError(`Session lost before "${command}" was sent`);
      }

      return this.exchange(session, command);
    });
  }

  async request<T>(command: string, parse: (frame: string) => T): Promise<T> {
    const frame = await this.sendCommand(command);
    try {
      const result = parse(frame);
      this.protocolErrors = 0;
      return result;
    } catch (error) {
      if (!(error instanceof ProtocolError)) {
        throw error;
      }
      this.protocolErrors += 1;
      if (this.protocolErrors < this.config.maxProtocolErrors) {
        throw error;
      }
      this.protocolErrors = 0;
      const linkError = new LinkError(
        `${this.config.maxProtocolErrors} consecutive malformed responses, resetting session`,
        { cause: error }
      );
      const session = this.session;
      if (session) {
        this.endSession(session, linkError);
      }
      throw linkError;
    }
  }

  listDevices(): Promise<string[]> {
    return this.request(GET_DEVICES_COMMAND, parseDeviceList);
  }

  async getName(id: string): Promise<string> {
    const name = await this.request(getNameCommand(id), parseName);
    return name ?? `Device_${id}`;
  }

  /** Stop reconnecting, cancel waits and close the socket */
  close(): void {
    if (this.state === 'closed') {
      return;
    }
    this.setState('closed');
    this.shutdown.abort();

    const session = this.session;
    this.session = null;
    if (session) {
      this.endSession(session, new LinkError('Link closed'), true);
    }
    if (this.connecting) {
      this.endSession(this.connecting, new ConnectError('Link closed'));
      this.connecting = null;
    }
    console.log('[Link] Closed');
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.lane.then(task);
    this.lane = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private remainingGap(session: Session): number {
    if (session.lastSentAt === null) {
      return 0;
    }
    return session.lastSentAt + this.config.cmdGapMs - Date.now();
  }

  private openSocket(): Promise<Session> {
    const { host, port, socketTimeoutMs, keepAliveMs } = this.config;

    return new Promise((resolve, reject) => {
      let socket: LinkSocket;
      try {
        socket = this.createSocket(host, port);
      } catch (error) {
        reject(new ConnectError(`Cannot open socket to ${host}:${port}: ${describeError(error)}`, { cause: error }));
        return;
      }

      const timer = setTimeout(() => {
        this.endSession(session, new ConnectError(`Connect to ${host}:${port} timed out after ${socketTimeoutMs}ms`));
      }, socketTimeoutMs);

      const session: Session = {
        socket,
        authenticated: false,
        lastSentAt: null,
        buffer: '',
        decoder: new StringDecoder('utf8'),
        reader: null,
        onConnectFailed: (error) => {
          clearTimeout(timer);
          reject(error);
        },
        closed: false,
      };
      this.connecting = session;

      socket.on('data', (chunk) => this.onData(session, chunk));
      socket.on('error', (error) => {
        const reason = session.onConnectFailed
          ? new ConnectError(`Connect to ${host}:${port} failed: ${error.message}`, { cause: error })
          : new LinkError(`Socket error: ${error.message}`, { cause: error });
        this.endSession(session, reason);
      });
      socket.on('close', () => {
        const reason = session.onConnectFailed
          ? new ConnectError(`Gateway closed the connection during connect`)
          : new LinkError('Gateway closed the connection');
        this.endSession(session, reason);
      });
      socket.once('connect', () => {
        clearTimeout(timer);
        session.onConnectFailed = null;
        socket.setKeepAlive(true, keepAliveMs);
        resolve(session);
      });
    });
  }

  private exchange(session: Session, command: string): Promise<string> {
    return new Promise((resolve, reject) => {
      if (session.closed) {
        reject(new LinkError('Session is closed'));
        return;
      }

      const timer = setTimeout(() => {
        this.endSession(
          session,
          new LinkError(`No response to "${command}" within ${this.config.socketTimeoutMs}ms`)
        );
      }, this.config.socketTimeoutMs);

      session.buffer = '';
      session.reader = { resolve, reject, timer };
      session.lastSentAt = Date.now();

      try {
        session.socket.write(encodeFrame(command));
      } catch (error) {
        this.endSession(session, new LinkError(`Write failed: ${describeError(error)}`, { cause: error }));
      }
    });
  }

  private onData(session: Session, chunk: Buffer): void {
    if (session.closed) {
      return;
    }
    const text = session.decoder.write(chunk);
    const reader = session.reader;
    if (!reader) {
      if (text) {
        console.warn(`[Link] Ignoring unsolicited data: ${JSON.stringify(text.slice(0, 80))}`);
      }
      return;
    }
    session.buffer += text;
    const taken = takeFrame(session.buffer);
    if (!taken) {
      return;
    }
    session.buffer = taken.rest;
    session.reader = null;
    clearTimeout(reader.timer);
    reader.resolve(taken.frame);
  }

  private endSession(session: Session, reason: Error, graceful = false): void {
    if (session.closed) {
      return;
    }
    session.closed = true;
    session.authenticated = false;

    if (graceful) {
      session.socket.end();
    } else {
      session.socket.destroy();
    }

    if (session.onConnectFailed) {
      const onConnectFailed = session.onConnectFailed;
      session.onConnectFailed = null;
      onConnectFailed(reason instanceof ConnectError ? reason : new ConnectError(reason.message, { cause: reason }));
    }

    if (session.reader) {
      const reader = session.reader;
      session.reader = null;
      clearTimeout(reader.timer);
      reader.reject(reason);
    }

    if (this.session === session) {
      this.session = null;
      console.warn(`[Link] Session lost: ${reason.message}`);
      this.markIdle();
      this.scheduleReconnect();
    }
  }

  private scheduleReconnect(): void {
    if (this.reconnecting || this.state === 'closed' || this.session) {
      return;
    }
    this.reconnecting = true;
    this.runReconnectLoop().catch((error) => {
      console.error('[Link] Reconnect loop failed:', error);
    });
  }

  private async runReconnectLoop(): Promise<void> {
    try {
      // Re-checks the session after every login: it may already be gone again
      while (!this.isClosed() && !this.session) {
        try {
          await this.connect();
          this.connectFailures = 0;
          this.authFailures = 0;
          console.log(`[Link] Logged in to gateway at ${this.config.host}:${this.config.port}`);
        } catch (error) {
          if (this.isClosed()) {
            return;
          }
          const wait = this.nextRetryDelay(error);
          const elapsed = await delay(wait, this.shutdown.signal);
          if (!elapsed) {
            return;
          }
        }
      }
    } finally {
      this.reconnecting = false;
    }
  }

  private nextRetryDelay(error: unknown): number {
    if (error instanceof AuthError) {
      this.authFailures += 1;
      const factor = 2 ** Math.min(this.authFailures - 1, 2);
      const wait = this.config.authCooldownMs * factor;
      console.error(
        `[Link] ${error.message}. Check ZENSE_CODE; waiting ${Math.round(wait / 1000)}s before the next login to avoid a lockout`
      );
      this.setState('cooldown');
      return wait;
    }

    this.connectFailures += 1;
    const exponent = Math.min(this.connectFailures - 1, 16);
    const wait = Math.min(this.config.reconnectMinMs * 2 ** exponent, this.config.reconnectMaxMs);
    console.warn(`[Link] ${describeError(error)}; retrying in ${wait}ms (attempt ${this.connectFailures})`);
    this.setState('backoff');
    return wait;
  }

  private isClosed(): boolean {
    return this.state === 'closed';
  }

  private markIdle(): void {
    if (this.state !== 'closed') {
      this.setState('idle');
    }
  }

  private setState(next: LinkState): void {
    const previous = this.state;
    if (previous === next) {
      return;
    }
    this.state = next;
    console.log(`[Link] ${previous} -> ${next}`);
    for (const listener of this.listeners) {
      listener(next, previous);
    }
  }
}
