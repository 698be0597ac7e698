// Ordered DP/AP procedures and status interpretation on top of DapCommands
import type { RegisterMap } from "../config.js";
import { hexWord } from "./codec.js";
import { DapCommands } from "./commands.js";
import { ProbeError, describeErrorStatus, getErrorSuggestion, hexByte, isProbeError } from "./errors.js";
import { ApRegister, DpRegister, type FrameLink, MAX_BULK_WORDS, type StatusResponse } from "./types.js";

// CDBGPWRUPACK (bit 29) | CSYSPWRUPACK (bit 31)
const POWER_UP_ACK = 0xa0000000;

// TAR auto-increment is only guaranteed within a 1 KiB block
const AUTO_INCREMENT_BLOCK = 0x400;

export type OkResponse = Extract<StatusResponse, { kind: "ok" }>;

// A session that can hand out exclusive sections (ProbeSession)
export interface ExclusiveLink extends FrameLink {
  exclusive<T>(fn: (link: FrameLink) => Promise<T>): Promise<T>;
}

export interface SequencerOptions {
  powerUpPolls?: number;
}

/** Turn a raw status into a value, or into PROTOCOL_ERROR / UNRECOGNIZED_STATUS. */
export function expectOk(response: StatusResponse, operation: string): OkResponse {
  switch (response.kind) {
    case "ok":
      return response;
    case "error":
      throw new ProbeError(
        "PROTOCOL_ERROR",
        `${operation} failed: probe returned ${hexByte(response.status)} (${describeErrorStatus(response.status)})`,
        { operation, status: response.status, suggestion: getErrorSuggestion(response.status) }
      );
    case "unrecognized":
      throw new ProbeError(
        "UNRECOGNIZED_STATUS",
        `${operation}: probe returned unrecognized status ${hexByte(response.status)}`,
        {
          operation,
          status: response.status,
          suggestion: "The probe firmware may be newer than this client",
        }
      );
  }
}

export function expectWord(response: StatusResponse, operation: string): number {
  const { data } = expectOk(response, operation);
  if (data === undefined) {
    throw new ProbeError("MALFORMED_FRAME", `${operation} succeeded without a data word`, { operation });
  }
  return data;
}

function checkAligned(address: number, operation: string): void {
  if (!Number.isInteger(address) || address < 0 || address > 0xffffffff || address % 4 !== 0) {
    throw new ProbeError("INVALID_ARGUMENT", `${operation}: address ${address} is not a word-aligned 32-bit address`, {
      operation,
      suggestion: "Memory access is 32 bits wide; use an address that is a multiple of 4",
    });
  }
}

export class TransactionSequencer {
  private readonly powerUpPolls: number;

  constructor(
    private readonly session: ExclusiveLink,
    private readonly registers: RegisterMap,
    options: SequencerOptions = {}
  ) {
    this.powerUpPolls = options.powerUpPolls ?? 10;
  }

  async lineReset(): Promise<void> {
    expectOk(await new DapCommands(this.session).lineReset(), "Line Reset");
  }

  async readIdcode(): Promise<number> {
    return expectWord(await new DapCommands(this.session).dpRead(DpRegister.Idcode), "DP Read IDCODE");
  }

  async readRdbuff(): Promise<number> {
    return expectWord(await new DapCommands(this.session).dpRead(DpRegister.Rdbuff), "DP Read RDBUFF");
  }

  /**
   * Write the ABORT clear mask. Needed after any faulted transaction, as the
   * sticky flags block every later access until cleared. Harmless when nothing
   * is latched.
   */
  async clearStickyFaults(): Promise<void> {
    const mask = this.registers.abortClearMask;
    expectOk(await new DapCommands(this.session).dpWrite(DpRegister.Abort, mask), `DP Write ABORT=${hexWord(mask)}`);
  }

  /**
   * Request debug and system power-up, then poll CTRL/STAT until both acks are
   * set. AP transactions against a powered-down domain fail.
   *
   * @returns the final CTRL/STAT value
   */
  powerUpDebugDomain(): Promise<number> {
    const request = this.registers.powerUpRequest;
    return this.session.exclusive(async (link) => {
      const dap = new DapCommands(link);
      expectOk(await dap.dpWrite(DpRegister.CtrlStat, request), `DP Write CTRL/STAT=${hexWord(request)}`);

      let ctrlStat = 0;
      for (let attempt = 0; attempt < this.powerUpPolls; attempt++) {
        ctrlStat = expectWord(await dap.dpRead(DpRegister.CtrlStat), "DP Read CTRL/STAT");
        if (((ctrlStat & POWER_UP_ACK) >>> 0) === POWER_UP_ACK) {
          return ctrlStat;
        }
      }

      throw new ProbeError(
        "POWER_UP_FAILED",
        `Debug domain did not acknowledge power-up after ${this.powerUpPolls} reads (CTRL/STAT=${hexWord(ctrlStat)})`,
        {
          operation: "Power Up Debug Domain",
          suggestion: "Check target power and reset lines, then line reset and retry",
        }
      );
    });
  }

  /** Write the MEM-AP CSW (transfer size / auto-increment). */
  async configureMemoryAccess(csw = this.registers.csw): Promise<void> {
    expectOk(await new DapCommands(this.session).apWrite(ApRegister.Csw, csw), `AP Write CSW=${hexWord(csw)}`);
  }

  /** TAR then DRW write, with nothing interleaved. DRW is never sent if TAR fails. */
  apRegisterWrite(address: number, value: number): Promise<void> {
    const operation = `Write ${hexWord(address)}=${hexWord(value)}`;
    return this.session.exclusive(async (link) => {
      const dap = new DapCommands(link);
      await this.stageAddress(dap, address, operation);
      expectOk(await dap.apWrite(ApRegister.Drw, value), `AP Write DRW=${hexWord(value)}`);
    });
  }

  /** TAR write then DRW read, with nothing interleaved. DRW is never read if TAR fails. */
  apRegisterRead(address: number): Promise<number> {
    const operation = `Read ${hexWord(address)}`;
    return this.session.exclusive(async (link) => {
      const dap = new DapCommands(link);
      await this.stageAddress(dap, address, operation);
      return expectWord(await dap.apRead(ApRegister.Drw), "AP Read DRW");
    });
  }

  /** Read `count` consecutive words, re-staging TAR at each 1 KiB boundary. */
  async readMemoryBlock(address: number, count: number): Promise<number[]> {
    const operation = `Read ${count} words at ${hexWord(address)}`;
    checkAligned(address, operation);
    return this.session.exclusive(async (link) => {
      const dap = new DapCommands(link);
      const words: number[] = [];
      for (const chunk of splitBlocks(address, count)) {
        await this.stageAddress(dap, chunk.address, operation);
        const { block } = expectOk(await dap.apBulkRead(ApRegister.Drw, chunk.count), `AP Bulk Read DRW x${chunk.count}`);
        if (block === undefined || block.length !== chunk.count) {
          throw new ProbeError(
            "MALFORMED_FRAME",
            `${operation}: probe returned ${block?.length ?? 0} words, expected ${chunk.count}`,
            { operation }
          );
        }
        words.push(...block);
      }
      return words;
    });
  }

  /** Write consecutive words, re-staging TAR at each 1 KiB boundary. */
  async writeMemoryBlock(address: number, values: number[]): Promise<void> {
    const operation = `Write ${values.length} words at ${hexWord(address)}`;
    checkAligned(address, operation);
    return this.session.exclusive(async (link) => {
      const dap = new DapCommands(link);
      let offset = 0;
      for (const chunk of splitBlocks(address, values.length)) {
        await this.stageAddress(dap, chunk.address, operation);
        const slice = values.slice(offset, offset + chunk.count);
        expectOk(await dap.apBulkWrite(ApRegister.Drw, slice), `AP Bulk Write DRW x${chunk.count}`);
        offset += chunk.count;
      }
    });
  }

  // Status failures on the TAR step become SEQUENCE_ABORTED; I/O failures pass through untouched
  private async stageAddress(dap: DapCommands, address: number, operation: string): Promise<void> {
    const step = `AP Write TAR=${hexWord(address)}`;
    try {
      expectOk(await dap.apWrite(ApRegister.Tar, address), step);
    } catch (error) {
      if (isProbeError(error) && (error.code === "PROTOCOL_ERROR" || error.code === "UNRECOGNIZED_STATUS")) {
        throw new ProbeError("SEQUENCE_ABORTED", `${operation} aborted: ${error.message}`, {
          operation,
          status: error.status,
          suggestion: error.suggestion,
          cause: error,
        });
      }
      throw error;
    }
  }
}

export function splitBlocks(address: number, count: number): Array<{ address: number; count: number }> {
  if (!Number.isInteger(count) || count < 1) {
    throw new ProbeError("INVALID_ARGUMENT", `Word count ${count} must be a positive integer`);
  }
  const chunks: Array<{ address: number; count: number }> = [];
  let next = address;
  let remaining = count;
  while (remaining > 0) {
    const untilBoundary = (AUTO_INCREMENT_BLOCK - (next % AUTO_INCREMENT_BLOCK)) / 4;
    const size = Math.min(remaining, untilBoundary, MAX_BULK_WORDS);
    chunks.push({ address: next, count: size });
    next += size * 4;
    remaining -= size;
  }
  return chunks;
}
