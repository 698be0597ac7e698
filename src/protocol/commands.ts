// DP/AP command layer: one method per wire operation, raw statuses back.
// No retries and no fault interpretation here - see TransactionSequencer.
import type { FrameLink, RegisterWrite, Speed, StatusResponse } from "./types.js";

export class DapCommands {
  constructor(private readonly link: FrameLink) {}

  lineReset(): Promise<StatusResponse> {
    return this.link.transact({ op: "lineReset" });
  }

  ping(): Promise<StatusResponse> {
    return this.link.transact({ op: "ping" });
  }

  setSpeed(speed: Speed): Promise<StatusResponse> {
    return this.link.transact({ op: "setSpeed", speed });
  }

  dpRead(select: number): Promise<StatusResponse> {
    return this.link.transact({ op: "dpRead", select });
  }

  dpWrite(select: number, value: number): Promise<StatusResponse> {
    return this.link.transact({ op: "dpWrite", select, value });
  }

  apRead(select: number): Promise<StatusResponse> {
    return this.link.transact({ op: "apRead", select });
  }

  apWrite(select: number, value: number): Promise<StatusResponse> {
    return this.link.transact({ op: "apWrite", select, value });
  }

  apBulkRead(select: number, count: number): Promise<StatusResponse> {
    return this.link.transact({ op: "apBulkRead", select, count });
  }

  apBulkWrite(select: number, values: number[]): Promise<StatusResponse> {
    return this.link.transact({ op: "apBulkWrite", select, values });
  }

  multiRegWrite(writes: RegisterWrite[]): Promise<StatusResponse> {
    return this.link.transact({ op: "multiRegWrite", writes });
  }
}
