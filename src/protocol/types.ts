// SWD Probe Binary API Types

// API Constants
export const API_VERSION = 0x01;
export const DEFAULT_PORT = 4146; // "AF" in hex
export const MAX_BULK_WORDS = 256;

// Command opcodes
export enum Command {
  // Single register access
  DpRead = 0x00,
  DpWrite = 0x01,
  ApRead = 0x02,
  ApWrite = 0x03,

  // Multi-word access
  ApBulkRead = 0x12,
  ApBulkWrite = 0x13,
  MultiRegWrite = 0x14,

  // Link control
  Ping = 0xf0,
  LineReset = 0xf1,
  SetSpeed = 0xf3,
  Disconnect = 0xff,
}

// Status codes. Anything with the high bit set is an error.
export const STATUS_OK = 0x00;
export const STATUS_ERROR_BIT = 0x80;

export enum ErrorStatus {
  Command = 0x81,
  Swd = 0x82, // NACK/FAULT/WAIT ack, parity or DP error on the target link
  Timeout = 0x83,
  Network = 0x84,
  Api = 0x85,
}

// SWD clock speed selector
export enum Speed {
  Turbo = 0, // 4 MHz
  Fast = 1, // 2 MHz
  Medium = 2, // 1 MHz
  Slow = 3, // 500 kHz
}

// DP register selects (A[3:2])
export enum DpRegister {
  Idcode = 0x00, // read
  Abort = 0x00, // write
  CtrlStat = 0x04,
  Select = 0x08,
  Rdbuff = 0x0c,
}

// MEM-AP register selects
export enum ApRegister {
  Csw = 0x00,
  Tar = 0x04,
  Drw = 0x0c,
  Idr = 0xfc,
}

export type RegisterFile = "dp" | "ap";

export interface RegisterWrite {
  file: RegisterFile;
  select: number;
  value: number;
}

export type CommandFrame =
  | { op: "lineReset" }
  | { op: "ping" }
  | { op: "disconnect" }
  | { op: "setSpeed"; speed: Speed }
  | { op: "dpRead"; select: number }
  | { op: "dpWrite"; select: number; value: number }
  | { op: "apRead"; select: number }
  | { op: "apWrite"; select: number; value: number }
  | { op: "apBulkRead"; select: number; count: number }
  | { op: "apBulkWrite"; select: number; values: number[] }
  | { op: "multiRegWrite"; writes: RegisterWrite[] };

// What follows a successful status byte
export type ResponseShape = "status" | "word" | "block";

export type StatusResponse =
  | { kind: "ok"; status: typeof STATUS_OK; data?: number; block?: number[] }
  | { kind: "error"; status: number; code: number }
  | { kind: "unrecognized"; status: number };

export type SessionState = "disconnected" | "handshaking" | "connected" | "disconnecting";

export interface ConnectionState {
  state: SessionState;
  connected: boolean;
  host: string;
  port: number;
  version: number | null;
}

// Anything that can carry one command/response exchange
export interface FrameLink {
  transact(frame: CommandFrame): Promise<StatusResponse>;
}

// Anything that yields exact byte counts from a stream
export interface ByteSource {
  readExact(length: number): Promise<Buffer>;
}
