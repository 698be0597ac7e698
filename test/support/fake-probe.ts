/**
 * In-process stand-in for the probe's binary API.
 *
 * Speaks the version handshake, parses command frames with the real codec and
 * models enough of an ADIv5 DP/MEM-AP to drive the client: sticky faults,
 * power-up acknowledgement, TAR/DRW memory access with auto-increment, and a
 * target that stops answering after a system reset while VC_CORERESET is armed.
 */
import { createServer, type Server, type Socket } from "net";
import { decodeCommand, encodeStatus } from "../../src/protocol/codec.js";
import { API_VERSION, type CommandFrame, type StatusResponse } from "../../src/protocol/types.js";

const AIRCR = 0xe000ed0c;
const DHCSR = 0xe000edf0;
const DEMCR = 0xe000edfc;
const SYSRESETREQ = 0x05fa0004;
const S_RESET_ST = 0x02000000;
const POWER_UP_REQUEST = 0x50000000;
const POWER_UP_ACK = 0xa0000000;
const STICKYERR = 0x20;
const STKERRCLR = 0x04;
const SWD_ERROR = 0x82;

// What to send instead of the modelled response
export type FrameOverride = number | "close" | "silent" | Buffer;

export interface FakeProbeOptions {
  // Version byte offered in the handshake
  version?: number;
  // Never send the version byte; a function picks connections by their 1-based number
  silentHandshake?: boolean | ((connection: number) => boolean);
  // CTRL/STAT reads needed before the power-up acks appear
  powerUpAfterReads?: number;
  // "vectorCatch": lock up on reset only while DEMCR.VC_CORERESET is set
  lockupOnReset?: "always" | "never" | "vectorCatch";
  idcode?: number;
  memory?: Record<number, number>;
  override?: (frame: CommandFrame, index: number) => FrameOverride | undefined;
}

export class FakeProbe {
  readonly frames: CommandFrame[] = [];
  readonly handshakeAcks: number[] = [];
  readonly memory = new Map<number, number>();
  connections = 0;

  private server: Server | null = null;
  private readonly sockets = new Set<Socket>();
  private readonly options: FakeProbeOptions;

  // Target state
  private sticky = false;
  private ctrlStatRequest = 0;
  private ctrlStatReads = 0;
  private csw = 0;
  private tar = 0;
  private lockedUp = false;

  constructor(options: FakeProbeOptions = {}) {
    this.options = options;
    for (const [address, value] of Object.entries(options.memory ?? {})) {
      this.memory.set(Number(address), value);
    }
  }

  get stickyFault(): boolean {
    return this.sticky;
  }

  get isLockedUp(): boolean {
    return this.lockedUp;
  }

  /** Ops of every frame received so far, in order. */
  get ops(): string[] {
    return this.frames.map((f) => f.op);
  }

  /** Start listening on an ephemeral port and return it. */
  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = createServer((socket) => this.accept(socket));
      this.server = server;
      server.once("error", reject);
      server.listen(0, "127.0.0.1", () => {
        const address = server.address();
        if (address === null || typeof address === "string") {
          reject(new Error("Fake probe has no TCP address"));
          return;
        }
        resolve(address.port);
      });
    });
  }

  stop(): Promise<void> {
    for (const socket of this.sockets) socket.destroy();
    this.sockets.clear();
    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();
    return new Promise((resolve) => server.close(() => resolve()));
  }

  private accept(socket: Socket): void {
    this.connections++;
    this.sockets.add(socket);
    socket.on("close", () => this.sockets.delete(socket));
    socket.on("error", () => socket.destroy());

    let handshaken = false;
    let buffer = Buffer.alloc(0);

    const silent = this.options.silentHandshake;
    if (!(typeof silent === "function" ? silent(this.connections) : silent)) {
      socket.write(Buffer.from([this.options.version ?? API_VERSION]));
    }

    socket.on("data", (data: Buffer) => {
      buffer = Buffer.concat([buffer, data]);

      if (!handshaken) {
        if (buffer.length < 1) return;
        this.handshakeAcks.push(buffer[0]);
        buffer = buffer.subarray(1);
        handshaken = true;
      }

      while (buffer.length > 0) {
        let parsed: ReturnType<typeof decodeCommand>;
        try {
          parsed = decodeCommand(buffer);
        } catch {
          // Unparseable: reply with a command error and drop what we have
          buffer = Buffer.alloc(0);
          socket.write(Buffer.from([0x81]));
          return;
        }
        if (!parsed) return;
        buffer = buffer.subarray(parsed.length);
        if (!this.handle(socket, parsed.frame)) return;
      }
    });
  }

  // Returns false once the connection should stop processing input
  private handle(socket: Socket, frame: CommandFrame): boolean {
    const index = this.frames.length;
    this.frames.push(frame);

    if (frame.op === "disconnect") {
      socket.end(Buffer.from([0x00]));
      return false;
    }

    const override = this.options.override?.(frame, index);
    if (override !== undefined) {
      if (override === "close") {
        socket.destroy();
        return false;
      }
      if (override === "silent") return true;
      socket.write(typeof override === "number" ? Buffer.from([override]) : override);
      return true;
    }

    socket.write(encodeStatus(frame, this.execute(frame)));
    return true;
  }

  private execute(frame: CommandFrame): StatusResponse {
    const ok = { kind: "ok", status: 0 } as const;
    const fault: StatusResponse = { kind: "error", status: SWD_ERROR, code: SWD_ERROR & 0x7f };

    switch (frame.op) {
      case "ping":
      case "setSpeed":
      case "disconnect":
        return ok;
      case "lineReset":
        return this.lockedUp ? fault : ok;
      case "dpRead":
        if (this.lockedUp) return fault;
        return { ...ok, data: this.dpRead(frame.select) };
      case "dpWrite":
        if (this.lockedUp) return fault;
        this.dpWrite(frame.select, frame.value);
        return ok;
      case "multiRegWrite":
        if (this.lockedUp) return fault;
        for (const w of frame.writes) {
          if (w.file === "dp") {
            this.dpWrite(w.select, w.value);
          } else if (!this.apWrite(w.select, w.value)) {
            return fault;
          }
        }
        return ok;
      default:
        break;
    }

    if (!this.apAvailable()) return fault;

    switch (frame.op) {
      case "apRead":
        return { ...ok, data: this.apRead(frame.select) };
      case "apWrite":
        return this.apWrite(frame.select, frame.value) ? ok : fault;
      case "apBulkRead": {
        const block: number[] = [];
        for (let i = 0; i < frame.count; i++) block.push(this.apRead(frame.select));
        return { ...ok, block };
      }
      case "apBulkWrite":
        for (const v of frame.values) {
          if (!this.apWrite(frame.select, v)) return fault;
        }
        return ok;
      default:
        return ok;
    }
  }

  // AP access needs a powered-up domain, no latched fault and a live target
  private apAvailable(): boolean {
    if (this.lockedUp || this.sticky) return false;
    if ((this.ctrlStatRequest & POWER_UP_REQUEST) !== POWER_UP_REQUEST) {
      this.sticky = true;
      return false;
    }
    return true;
  }

  private dpRead(select: number): number {
    switch (select) {
      case 0x00:
        return this.options.idcode ?? 0x2ba01477;
      case 0x04: {
        this.ctrlStatReads++;
        let value = this.ctrlStatRequest;
        const requested = (this.ctrlStatRequest & POWER_UP_REQUEST) === POWER_UP_REQUEST;
        if (requested && this.ctrlStatReads >= (this.options.powerUpAfterReads ?? 1)) {
          value |= POWER_UP_ACK;
        }
        if (this.sticky) value |= STICKYERR;
        return value >>> 0;
      }
      default:
        return 0;
    }
  }

  private dpWrite(select: number, value: number): void {
    if (select === 0x00 && value & STKERRCLR) {
      this.sticky = false;
    } else if (select === 0x04) {
      this.ctrlStatRequest = value;
      this.ctrlStatReads = 0;
    }
  }

  private apRead(select: number): number {
    switch (select) {
      case 0x00:
        return this.csw;
      case 0x04:
        return this.tar;
      case 0x0c: {
        const value = this.memory.get(this.tar) ?? 0;
        this.advance();
        return value;
      }
      case 0xfc:
        return 0x24770011;
      default:
        return 0;
    }
  }

  // Returns false if the write hit a target that is no longer answering
  private apWrite(select: number, value: number): boolean {
    if (!this.apAvailable()) return false;
    switch (select) {
      case 0x00:
        this.csw = value;
        break;
      case 0x04:
        this.tar = value;
        break;
      case 0x0c:
        this.store(this.tar, value);
        this.advance();
        break;
      default:
        break;
    }
    return true;
  }

  private store(address: number, value: number): void {
    if (address === DHCSR) {
      // DBGKEY is write-only
      this.memory.set(DHCSR, value & 0x0000ffff);
    } else if (address === AIRCR && value === SYSRESETREQ) {
      this.reset();
    } else {
      this.memory.set(address, value);
    }
  }

  private reset(): void {
    const mode = this.options.lockupOnReset ?? "vectorCatch";
    const vectorCatch = ((this.memory.get(DEMCR) ?? 0) & 0x1) !== 0;
    if (mode === "always" || (mode === "vectorCatch" && vectorCatch)) {
      this.lockedUp = true;
      return;
    }
    this.memory.set(DHCSR, ((this.memory.get(DHCSR) ?? 0) | S_RESET_ST) >>> 0);
  }

  // CSW.AddrInc == single
  private advance(): void {
    if (((this.csw >>> 4) & 0x3) === 0x1) {
      this.tar = (this.tar + 4) >>> 0;
    }
  }
}
