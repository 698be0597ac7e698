// Binary API frame encoding/decoding
import { ProbeError, hexByte } from "./errors.js";
import {
  type ByteSource,
  Command,
  type CommandFrame,
  MAX_BULK_WORDS,
  type RegisterWrite,
  type ResponseShape,
  Speed,
  STATUS_ERROR_BIT,
  STATUS_OK,
  type StatusResponse,
} from "./types.js";

const DP_SELECTS = new Set([0x00, 0x04, 0x08, 0x0c]);

// Human-readable operation names, used in logs and error messages
export function describeFrame(frame: CommandFrame): string {
  switch (frame.op) {
    case "lineReset":
      return "Line Reset";
    case "ping":
      return "Ping";
    case "disconnect":
      return "Disconnect";
    case "setSpeed":
      return `Set Speed ${Speed[frame.speed]}`;
    case "dpRead":
      return `DP Read ${hexByte(frame.select)}`;
    case "dpWrite":
      return `DP Write ${hexByte(frame.select)}=${hexWord(frame.value)}`;
    case "apRead":
      return `AP Read ${hexByte(frame.select)}`;
    case "apWrite":
      return `AP Write ${hexByte(frame.select)}=${hexWord(frame.value)}`;
    case "apBulkRead":
      return `AP Bulk Read ${hexByte(frame.select)} x${frame.count}`;
    case "apBulkWrite":
      return `AP Bulk Write ${hexByte(frame.select)} x${frame.values.length}`;
    case "multiRegWrite":
      return `Multi Register Write x${frame.writes.length}`;
  }
}

export function hexWord(value: number): string {
  return `0x${value.toString(16).padStart(8, "0")}`;
}

export function responseShape(frame: CommandFrame): ResponseShape {
  switch (frame.op) {
    case "dpRead":
    case "apRead":
      return "word";
    case "apBulkRead":
      return "block";
    default:
      return "status";
  }
}

function checkWord(value: number, what: string): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
    throw new ProbeError("INVALID_ARGUMENT", `${what} ${value} is not a 32-bit unsigned word`, {
      suggestion: "Values must be integers in 0x00000000-0xFFFFFFFF",
    });
  }
}

function checkSelect(file: "dp" | "ap", select: number): void {
  if (file === "dp" ? !DP_SELECTS.has(select) : !Number.isInteger(select) || select < 0 || select > 0xfc || select % 4 !== 0) {
    throw new ProbeError("INVALID_ARGUMENT", `Invalid ${file.toUpperCase()} register select ${select}`, {
      suggestion:
        file === "dp"
          ? "DP selects are 0x00, 0x04, 0x08 or 0x0C"
          : "AP selects are word-aligned offsets 0x00-0xFC within the bank chosen by DP SELECT",
    });
  }
}

function checkCount(count: number): void {
  if (!Number.isInteger(count) || count < 1 || count > MAX_BULK_WORDS) {
    throw new ProbeError("INVALID_ARGUMENT", `Word count ${count} is outside 1-${MAX_BULK_WORDS}`);
  }
}

function checkFrame(frame: CommandFrame): void {
  switch (frame.op) {
    case "dpRead":
      checkSelect("dp", frame.select);
      break;
    case "dpWrite":
      checkSelect("dp", frame.select);
      checkWord(frame.value, "Operand");
      break;
    case "apRead":
      checkSelect("ap", frame.select);
      break;
    case "apWrite":
      checkSelect("ap", frame.select);
      checkWord(frame.value, "Operand");
      break;
    case "apBulkRead":
      checkSelect("ap", frame.select);
      checkCount(frame.count);
      break;
    case "apBulkWrite":
      checkSelect("ap", frame.select);
      checkCount(frame.values.length);
      frame.values.forEach((v) => checkWord(v, "Operand"));
      break;
    case "multiRegWrite":
      checkCount(frame.writes.length);
      for (const w of frame.writes) {
        checkSelect(w.file, w.select);
        checkWord(w.value, "Operand");
      }
      break;
    case "setSpeed":
      if (Speed[frame.speed] === undefined) {
        throw new ProbeError("INVALID_ARGUMENT", `Unknown speed ${frame.speed}`);
      }
      break;
    default:
      break;
  }
}

export function encodeCommand(frame: CommandFrame): Buffer {
  checkFrame(frame);

  switch (frame.op) {
    case "lineReset":
      return Buffer.from([Command.LineReset]);
    case "ping":
      return Buffer.from([Command.Ping]);
    case "disconnect":
      return Buffer.from([Command.Disconnect]);
    case "setSpeed":
      return Buffer.from([Command.SetSpeed, frame.speed]);
    case "dpRead":
      return Buffer.from([Command.DpRead, frame.select]);
    case "apRead":
      return Buffer.from([Command.ApRead, frame.select]);
    case "dpWrite":
    case "apWrite": {
      // opcode(1) + select(1) + value(4)
      const buf = Buffer.alloc(6);
      buf[0] = frame.op === "dpWrite" ? Command.DpWrite : Command.ApWrite;
      buf[1] = frame.select;
      buf.writeUInt32LE(frame.value, 2);
      return buf;
    }
    case "apBulkRead": {
      // opcode(1) + select(1) + count(2)
      const buf = Buffer.alloc(4);
      buf[0] = Command.ApBulkRead;
      buf[1] = frame.select;
      buf.writeUInt16LE(frame.count, 2);
      return buf;
    }
    case "apBulkWrite": {
      // opcode(1) + select(1) + count(2) + [value(4)]...
      const buf = Buffer.alloc(4 + frame.values.length * 4);
      buf[0] = Command.ApBulkWrite;
      buf[1] = frame.select;
      buf.writeUInt16LE(frame.values.length, 2);
      frame.values.forEach((v, i) => buf.writeUInt32LE(v, 4 + i * 4));
      return buf;
    }
    case "multiRegWrite": {
      // opcode(1) + count(2) + [type(1) + select(1) + value(4)]...
      const buf = Buffer.alloc(3 + frame.writes.length * 6);
      buf[0] = Command.MultiRegWrite;
      buf.writeUInt16LE(frame.writes.length, 1);
      frame.writes.forEach((w, i) => {
        const offset = 3 + i * 6;
        buf[offset] = w.file === "dp" ? 0x00 : 0x01;
        buf[offset + 1] = w.select;
        buf.writeUInt32LE(w.value, offset + 2);
      });
      return buf;
    }
  }
}

function malformed(message: string): ProbeError {
  return new ProbeError("MALFORMED_FRAME", message);
}

/**
 * Parse one command frame from the front of `bytes`.
 *
 * Returns null while the buffer holds only part of a frame. The inverse of
 * {@link encodeCommand}; probe-side code and test peers parse with it.
 */
export function decodeCommand(bytes: Buffer): { frame: CommandFrame; length: number } | null {
  if (bytes.length < 1) return null;
  const opcode = bytes[0];

  switch (opcode) {
    case Command.LineReset:
      return { frame: { op: "lineReset" }, length: 1 };
    case Command.Ping:
      return { frame: { op: "ping" }, length: 1 };
    case Command.Disconnect:
      return { frame: { op: "disconnect" }, length: 1 };
    case Command.SetSpeed: {
      if (bytes.length < 2) return null;
      const speed = bytes[1];
      if (!isSpeed(speed)) throw malformed(`Invalid speed byte ${hexByte(speed)}`);
      return { frame: { op: "setSpeed", speed }, length: 2 };
    }
    case Command.DpRead:
    case Command.ApRead: {
      if (bytes.length < 2) return null;
      const op = opcode === Command.DpRead ? "dpRead" : "apRead";
      return { frame: { op, select: bytes[1] }, length: 2 };
    }
    case Command.DpWrite:
    case Command.ApWrite: {
      if (bytes.length < 6) return null;
      const op = opcode === Command.DpWrite ? "dpWrite" : "apWrite";
      return { frame: { op, select: bytes[1], value: bytes.readUInt32LE(2) }, length: 6 };
    }
    case Command.ApBulkRead: {
      if (bytes.length < 4) return null;
      const count = bytes.readUInt16LE(2);
      if (count > MAX_BULK_WORDS) throw malformed(`Bulk read count ${count} exceeds ${MAX_BULK_WORDS}`);
      return { frame: { op: "apBulkRead", select: bytes[1], count }, length: 4 };
    }
    case Command.ApBulkWrite: {
      if (bytes.length < 4) return null;
      const count = bytes.readUInt16LE(2);
      if (count > MAX_BULK_WORDS) throw malformed(`Bulk write count ${count} exceeds ${MAX_BULK_WORDS}`);
      const length = 4 + count * 4;
      if (bytes.length < length) return null;
      const values: number[] = [];
      for (let i = 0; i < count; i++) {
        values.push(bytes.readUInt32LE(4 + i * 4));
      }
      return { frame: { op: "apBulkWrite", select: bytes[1], values }, length };
    }
    case Command.MultiRegWrite: {
      if (bytes.length < 3) return null;
      const count = bytes.readUInt16LE(1);
      if (count > MAX_BULK_WORDS) throw malformed(`Multi-register count ${count} exceeds ${MAX_BULK_WORDS}`);
      const length = 3 + count * 6;
      if (bytes.length < length) return null;
      const writes: RegisterWrite[] = [];
      for (let i = 0; i < count; i++) {
        const offset = 3 + i * 6;
        const type = bytes[offset];
        if (type !== 0x00 && type !== 0x01) throw malformed(`Invalid register type ${hexByte(type)}`);
        writes.push({
          file: type === 0x00 ? "dp" : "ap",
          select: bytes[offset + 1],
          value: bytes.readUInt32LE(offset + 2),
        });
      }
      return { frame: { op: "multiRegWrite", writes }, length };
    }
    default:
      throw malformed(`Unknown command opcode ${hexByte(opcode)}`);
  }
}

function isSpeed(value: number): value is Speed {
  return Speed[value] !== undefined;
}

/**
 * Read one status response for `frame` from `source`.
 *
 * Error and unrecognized statuses are returned, not thrown; only a short read
 * (surfaced by the source as CONNECTION_CLOSED or TIMEOUT) throws.
 */
export async function decodeStatus(source: ByteSource, frame: CommandFrame): Promise<StatusResponse> {
  const [status] = await source.readExact(1);

  if (status & STATUS_ERROR_BIT) {
    return { kind: "error", status, code: status & 0x7f };
  }
  if (status !== STATUS_OK) {
    return { kind: "unrecognized", status };
  }

  switch (responseShape(frame)) {
    case "word": {
      const data = await source.readExact(4);
      return { kind: "ok", status: STATUS_OK, data: data.readUInt32LE(0) };
    }
    case "block": {
      // count(2) + [value(4)]...
      const header = await source.readExact(2);
      const count = header.readUInt16LE(0);
      const block: number[] = [];
      if (count > 0) {
        const data = await source.readExact(count * 4);
        for (let i = 0; i < count; i++) {
          block.push(data.readUInt32LE(i * 4));
        }
      }
      return { kind: "ok", status: STATUS_OK, block };
    }
    case "status":
      return { kind: "ok", status: STATUS_OK };
  }
}

// Response bytes a probe sends for `frame`; the inverse of decodeStatus.
export function encodeStatus(frame: CommandFrame, response: StatusResponse): Buffer {
  if (response.kind !== "ok") {
    return Buffer.from([response.status]);
  }
  switch (responseShape(frame)) {
    case "word": {
      if (response.data === undefined) throw malformed(`${describeFrame(frame)} succeeded without a data word`);
      const buf = Buffer.alloc(5);
      buf.writeUInt32LE(response.data, 1);
      return buf;
    }
    case "block": {
      const block = response.block;
      if (block === undefined) throw malformed(`${describeFrame(frame)} succeeded without a data block`);
      const buf = Buffer.alloc(3 + block.length * 4);
      buf.writeUInt16LE(block.length, 1);
      block.forEach((v, i) => buf.writeUInt32LE(v, 3 + i * 4));
      return buf;
    }
    case "status":
      return Buffer.from([STATUS_OK]);
  }
}
