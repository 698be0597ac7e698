// Probe binary API session: one TCP connection, strictly one request in flight
import { Socket } from "net";
import type { ProbeConfig } from "../config.js";
import { createDebugLog, type DebugLog } from "../utils/log.js";
import { decodeStatus, describeFrame, encodeCommand } from "./codec.js";
import { ProbeError, hexByte, withOperation } from "./errors.js";
import {
  API_VERSION,
  type ByteSource,
  type CommandFrame,
  type ConnectionState,
  type FrameLink,
  type SessionState,
  type StatusResponse,
} from "./types.js";

interface PendingRead {
  length: number;
  resolve: (data: Buffer) => void;
  reject: (error: ProbeError) => void;
  timer: NodeJS.Timeout;
}

const RECONNECT_SUGGESTION = "The session is closed. Use connect() to start a new one";

export class ProbeSession implements FrameLink {
  private socket: Socket | null = null;
  private rxBuffer = Buffer.alloc(0);
  private pendingRead: PendingRead | null = null;
  private lock: Promise<void> = Promise.resolve();
  private state: SessionState = "disconnected";
  private version: number | null = null;
  private host: string;
  private port: number;
  private readonly log: DebugLog;

  // Unlocked views handed to the codec and to exclusive() callers
  private readonly source: ByteSource = { readExact: (length) => this.readExact(length) };
  private readonly link: FrameLink = { transact: (frame) => this.exchange(frame) };

  constructor(private readonly config: ProbeConfig) {
    this.host = config.host;
    this.port = config.port;
    this.log = createDebugLog(config.debug);
  }

  getState(): ConnectionState {
    return {
      state: this.state,
      connected: this.state === "connected",
      host: this.host,
      port: this.port,
      version: this.version,
    };
  }

  async connect(host = this.config.host, port = this.config.port): Promise<void> {
    if (this.state !== "disconnected") {
      throw new ProbeError("ALREADY_CONNECTED", `Already connected to probe at ${this.host}:${this.port}`, {
        operation: "Connect",
        suggestion: "Use disconnect() first if you want to reconnect",
      });
    }

    this.state = "handshaking";
    this.host = host;
    this.port = port;

    const socket = new Socket();
    this.socket = socket;
    try {
      await this.open(socket, host, port);
      this.ensureCurrent(socket, host, port);
    } catch (error) {
      this.release(socket);
      throw error;
    }

    // The probe speaks first: one version byte, which we echo back
    let version: number;
    try {
      [version] = await this.readExact(1);
      this.ensureCurrent(socket, host, port);
    } catch (error) {
      this.release(socket);
      if (error instanceof ProbeError && error.code === "HANDSHAKE_FAILED") throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new ProbeError("HANDSHAKE_FAILED", `Handshake with ${host}:${port} failed: ${reason}`, {
        operation: "Handshake",
        suggestion: "Check that the probe's binary API is enabled and no other client holds the connection",
        cause: error,
      });
    }

    if (version !== API_VERSION) {
      this.release(socket);
      throw new ProbeError(
        "HANDSHAKE_FAILED",
        `Probe at ${host}:${port} offered API version ${hexByte(version)}, expected ${hexByte(API_VERSION)}`,
        {
          operation: "Handshake",
          status: version,
          suggestion: "Update the probe firmware or this client so both speak the same binary API version",
        }
      );
    }

    try {
      await this.writeBytes(Buffer.from([version]));
      this.ensureCurrent(socket, host, port);
    } catch (error) {
      this.release(socket);
      if (error instanceof ProbeError && error.code === "HANDSHAKE_FAILED") throw error;
      throw new ProbeError("HANDSHAKE_FAILED", `Could not acknowledge API version to ${host}:${port}`, {
        operation: "Handshake",
        cause: error,
      });
    }

    this.version = version;
    this.state = "connected";
    this.log(`Connected to ${host}:${port}, API version ${hexByte(version)}`);
  }

  /**
   * Send the disconnect opcode and release the socket.
   *
   * The acknowledgement byte is best effort; the socket is released whatever
   * happens. Safe to call on a session that is already disconnected. During a
   * handshake the socket is dropped without the opcode and the pending
   * connect() rejects.
   */
  async disconnect(): Promise<void> {
    if (this.state === "disconnected") {
      return;
    }
    if (this.state !== "connected") {
      this.teardown();
      return;
    }

    await this.exclusive(async () => {
      if (this.state !== "connected") return;
      this.state = "disconnecting";
      try {
        await this.writeBytes(encodeCommand({ op: "disconnect" }));
        const [ack] = await this.readExact(1);
        this.log(`Disconnect acknowledged with ${hexByte(ack)}`);
      } catch (error) {
        this.log("Disconnect not acknowledged", error instanceof Error ? error.message : error);
      } finally {
        this.teardown();
      }
    });
  }

  /** One command/response exchange, queued behind any exclusive section. */
  transact(frame: CommandFrame): Promise<StatusResponse> {
    return this.exclusive((link) => link.transact(frame));
  }

  /**
   * Run `fn` with sole use of the session.
   *
   * Frames sent through `link` cannot be interleaved with frames from any other
   * caller. Calling {@link transact} on the session itself from inside `fn`
   * deadlocks; use `link`.
   */
  exclusive<T>(fn: (link: FrameLink) => Promise<T>): Promise<T> {
    const run = this.lock.then(() => fn(this.link));
    this.lock = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async exchange(frame: CommandFrame): Promise<StatusResponse> {
    const operation = describeFrame(frame);

    if (this.state !== "connected" || !this.socket) {
      throw new ProbeError("NOT_CONNECTED", `${operation}: not connected to probe`, {
        operation,
        suggestion: "Use connect() first to establish connection",
      });
    }
    if (frame.op === "disconnect") {
      throw new ProbeError("INVALID_ARGUMENT", "Use disconnect() to end the session", { operation });
    }

    const bytes = encodeCommand(frame);
    try {
      await this.writeBytes(bytes);
      const response = await decodeStatus(this.source, frame);
      this.log(`${operation} -> ${hexByte(response.status)}`);
      return response;
    } catch (error) {
      throw withOperation(error, operation);
    }
  }

  // Settles exactly once: connected, failed, timed out, or destroyed by a disconnect()
  private open(socket: Socket, host: string, port: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const settle = (error?: ProbeError) => {
        clearTimeout(timeout);
        socket.off("error", onError);
        socket.off("close", onClose);
        socket.off("connect", onConnect);
        if (error) reject(error);
        else resolve();
      };

      const onError = (err: Error) => {
        settle(
          new ProbeError("CONNECTION_FAILED", `Failed to connect to ${host}:${port}: ${err.message}`, {
            operation: "Connect",
            suggestion: "Check the probe is powered, on the network, and serving the binary API on this port",
            cause: err,
          })
        );
      };

      const onClose = () => {
        settle(
          new ProbeError("CONNECTION_FAILED", `Connection to ${host}:${port} was closed before it opened`, {
            operation: "Connect",
            suggestion: RECONNECT_SUGGESTION,
          })
        );
      };

      const onConnect = () => {
        socket.setNoDelay(true);
        this.listen(socket);
        settle();
      };

      const timeout = setTimeout(() => {
        settle(
          new ProbeError("TIMEOUT", `Connection to ${host}:${port} timed out after ${this.config.timeoutMs} ms`, {
            operation: "Connect",
            suggestion: "Check the probe address and that it is reachable from this host",
          })
        );
        socket.destroy();
      }, this.config.timeoutMs);

      socket.once("error", onError);
      socket.once("close", onClose);
      socket.once("connect", onConnect);
      socket.connect(port, host);
    });
  }

  private ensureCurrent(socket: Socket, host: string, port: number): void {
    if (this.socket !== socket) {
      throw new ProbeError("HANDSHAKE_FAILED", `Handshake with ${host}:${port} was interrupted by disconnect()`, {
        operation: "Handshake",
        suggestion: RECONNECT_SUGGESTION,
      });
    }
  }

  // Only tear the session down if `socket` is still the one it holds
  private release(socket: Socket): void {
    if (this.socket === socket) this.teardown();
    else socket.destroy();
  }

  // Handlers only act while `socket` is still the session's live socket
  private listen(socket: Socket): void {
    socket.on("data", (data: Buffer) => {
      if (this.socket === socket) this.handleData(data);
    });

    socket.on("error", (err) => {
      if (this.socket !== socket) {
        this.log(`Error on released socket: ${err.message}`);
        return;
      }
      this.fail(
        new ProbeError("IO_ERROR", `Socket error: ${err.message}`, {
          suggestion: RECONNECT_SUGGESTION,
          cause: err,
        })
      );
    });

    socket.on("close", () => {
      if (this.socket !== socket) return;
      this.fail(
        new ProbeError("CONNECTION_CLOSED", "Connection to probe closed unexpectedly", {
          suggestion: "The probe may have reset or dropped the link. Try reconnecting.",
        })
      );
    });
  }

  private handleData(data: Buffer): void {
    this.log("Received data", data);
    this.rxBuffer = Buffer.concat([this.rxBuffer, data]);

    const pending = this.pendingRead;
    if (pending && this.rxBuffer.length >= pending.length) {
      this.pendingRead = null;
      clearTimeout(pending.timer);
      pending.resolve(this.take(pending.length));
    }
  }

  private take(length: number): Buffer {
    const out = Buffer.from(this.rxBuffer.subarray(0, length));
    this.rxBuffer = this.rxBuffer.subarray(length);
    return out;
  }

  private readExact(length: number): Promise<Buffer> {
    if (!this.socket) {
      return Promise.reject(
        new ProbeError("NOT_CONNECTED", "Not connected to probe", { suggestion: RECONNECT_SUGGESTION })
      );
    }
    if (this.pendingRead) {
      return Promise.reject(new ProbeError("IO_ERROR", "A read is already outstanding on this session"));
    }
    if (this.rxBuffer.length >= length) {
      return Promise.resolve(this.take(length));
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.fail(
          new ProbeError("TIMEOUT", `No response from probe within ${this.config.timeoutMs} ms`, {
            suggestion: "The probe or target is unresponsive. Reconnect and retry",
          })
        );
      }, this.config.timeoutMs);
      this.pendingRead = { length, resolve, reject, timer };
    });
  }

  private writeBytes(data: Buffer): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return Promise.reject(
        new ProbeError("NOT_CONNECTED", "Not connected to probe", { suggestion: RECONNECT_SUGGESTION })
      );
    }

    this.log("Sending", data);
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        const error = new ProbeError("TIMEOUT", `Write to probe did not complete within ${this.config.timeoutMs} ms`, {
          suggestion: RECONNECT_SUGGESTION,
        });
        if (this.socket === socket) this.fail(error);
        reject(error);
      }, this.config.timeoutMs);

      socket.write(data, (err) => {
        clearTimeout(timer);
        if (!err) {
          resolve();
          return;
        }
        const error = new ProbeError("IO_ERROR", `Failed to send to probe: ${err.message}`, {
          suggestion: RECONNECT_SUGGESTION,
          cause: err,
        });
        if (this.socket === socket) this.fail(error);
        reject(error);
      });
    });
  }

  // Any I/O failure ends the session; the outstanding read, if any, gets the error
  private fail(error: ProbeError): void {
    this.log(`Session failed: ${error.message}`);
    this.teardown(error);
  }

  private teardown(reason?: ProbeError): void {
    const socket = this.socket;
    const pending = this.pendingRead;
    this.socket = null;
    this.pendingRead = null;
    this.rxBuffer = Buffer.alloc(0);
    this.state = "disconnected";
    this.version = null;
    socket?.destroy();
    if (pending) {
      clearTimeout(pending.timer);
      pending.reject(
        reason ??
          new ProbeError("CONNECTION_CLOSED", "Session closed while waiting for the probe", {
            suggestion: RECONNECT_SUGGESTION,
          })
      );
    }
  }
}

/**
 * Open a session, run `fn`, and disconnect on every exit path.
 */
export async function withSession<T>(
  config: ProbeConfig,
  fn: (session: ProbeSession) => Promise<T>
): Promise<T> {
  const session = new ProbeSession(config);
  await session.connect();
  try {
    return await fn(session);
  } finally {
    await session.disconnect();
  }
}
