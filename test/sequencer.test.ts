import { describe, it, expect, afterEach } from "vitest";
import { parseConfig, type ProbeConfig } from "../src/config.js";
import { ProbeClient } from "../src/protocol/client.js";
import { DapCommands } from "../src/protocol/commands.js";
import { expectOk, splitBlocks, TransactionSequencer } from "../src/protocol/sequencer.js";
import { ProbeSession } from "../src/protocol/session.js";
import { FakeProbe, type FakeProbeOptions } from "./support/fake-probe.js";

let probe: FakeProbe | null = null;
let session: ProbeSession | null = null;

async function connect(options: FakeProbeOptions = {}, config: Partial<ProbeConfig> = {}) {
  probe = new FakeProbe(options);
  const port = await probe.start();
  const cfg = parseConfig({ port, timeoutMs: 500, ...config });
  session = new ProbeSession(cfg);
  await session.connect();
  const sequencer = new TransactionSequencer(session, cfg.registers, { powerUpPolls: cfg.powerUpPolls });
  return { probe, session, sequencer };
}

afterEach(async () => {
  await session?.disconnect();
  await probe?.stop();
  session = null;
  probe = null;
});

describe("splitBlocks", () => {
  it("keeps a transfer inside one 1 KiB block when it fits", () => {
    expect(splitBlocks(0x20000000, 16)).toEqual([{ address: 0x20000000, count: 16 }]);
  });

  it("splits at 1 KiB boundaries", () => {
    expect(splitBlocks(0x200003f8, 4)).toEqual([
      { address: 0x200003f8, count: 2 },
      { address: 0x20000400, count: 2 },
    ]);
  });

  it("caps each chunk at 256 words", () => {
    expect(splitBlocks(0x20000000, 300)).toEqual([
      { address: 0x20000000, count: 256 },
      { address: 0x20000400, count: 44 },
    ]);
  });
});

describe("expectOk", () => {
  it("names the operation and status on an error", () => {
    expect(() => expectOk({ kind: "error", status: 0x82, code: 2 }, "AP Read DRW")).toThrow(
      "AP Read DRW failed: probe returned 0x82 (SWD error)"
    );
  });

  it("distinguishes unrecognized statuses", () => {
    let thrown: unknown;
    try {
      expectOk({ kind: "unrecognized", status: 0x05 }, "Ping");
    } catch (error) {
      thrown = error;
    }
    expect(thrown).toMatchObject({ code: "UNRECOGNIZED_STATUS", status: 0x05, operation: "Ping" });
  });
});

describe("TransactionSequencer", () => {
  it("clears sticky faults idempotently", async () => {
    const { probe, sequencer } = await connect();
    await expect(sequencer.apRegisterRead(0x20000000)).rejects.toMatchObject({ code: "SEQUENCE_ABORTED" });
    expect(probe.stickyFault).toBe(true);

    await sequencer.clearStickyFaults();
    await sequencer.clearStickyFaults();

    expect(probe.stickyFault).toBe(false);
    expect(probe.frames.slice(-2)).toEqual([
      { op: "dpWrite", select: 0x00, value: 0x1e },
      { op: "dpWrite", select: 0x00, value: 0x1e },
    ]);
  });

  it("powers up the debug domain and returns CTRL/STAT", async () => {
    const { probe, sequencer } = await connect({ powerUpAfterReads: 3 });

    await expect(sequencer.powerUpDebugDomain()).resolves.toBe(0xf0000000);

    expect(probe.frames).toEqual([
      { op: "dpWrite", select: 0x04, value: 0x50000000 },
      { op: "dpRead", select: 0x04 },
      { op: "dpRead", select: 0x04 },
      { op: "dpRead", select: 0x04 },
    ]);
  });

  it("gives up on power-up after the configured number of reads", async () => {
    const { sequencer } = await connect({ powerUpAfterReads: 5 }, { powerUpPolls: 2 });

    await expect(sequencer.powerUpDebugDomain()).rejects.toMatchObject({
      code: "POWER_UP_FAILED",
      message: "Debug domain did not acknowledge power-up after 2 reads (CTRL/STAT=0x50000000)",
    });
  });

  describe("after power-up", () => {
    async function attached(options: FakeProbeOptions = {}) {
      const ctx = await connect(options);
      await ctx.sequencer.powerUpDebugDomain();
      await ctx.sequencer.configureMemoryAccess();
      ctx.probe.frames.length = 0;
      return ctx;
    }

    it("writes TAR before DRW", async () => {
      const { probe, sequencer } = await attached();

      await sequencer.apRegisterWrite(0x20000010, 0xcafef00d);

      expect(probe.frames).toEqual([
        { op: "apWrite", select: 0x04, value: 0x20000010 },
        { op: "apWrite", select: 0x0c, value: 0xcafef00d },
      ]);
      expect(probe.memory.get(0x20000010)).toBe(0xcafef00d);
    });

    it("reads back through TAR then DRW", async () => {
      const { probe, sequencer } = await attached({ memory: { 0x20000020: 0x12345678 } });

      await expect(sequencer.apRegisterRead(0x20000020)).resolves.toBe(0x12345678);
      expect(probe.frames).toEqual([
        { op: "apWrite", select: 0x04, value: 0x20000020 },
        { op: "apRead", select: 0x0c },
      ]);
    });

    it("never sends DRW when the TAR write fails", async () => {
      const { probe, sequencer } = await attached({
        override: (frame) => (frame.op === "apWrite" && frame.select === 0x04 ? 0x82 : undefined),
      });

      await expect(sequencer.apRegisterWrite(0x20000000, 0x12345678)).rejects.toMatchObject({
        code: "SEQUENCE_ABORTED",
        status: 0x82,
        message: "Write 0x20000000=0x12345678 aborted: AP Write TAR=0x20000000 failed: probe returned 0x82 (SWD error)",
      });
      expect(probe.frames).toEqual([{ op: "apWrite", select: 0x04, value: 0x20000000 }]);
    });

    it("reports a DRW failure as a protocol error", async () => {
      const { sequencer } = await attached({
        override: (frame) => (frame.op === "apRead" ? 0x82 : undefined),
      });

      await expect(sequencer.apRegisterRead(0xe000edf0)).rejects.toMatchObject({
        code: "PROTOCOL_ERROR",
        operation: "AP Read DRW",
      });
    });

    it("passes I/O failures on the TAR step through unchanged", async () => {
      const { session, sequencer } = await attached({
        override: (frame) => (frame.op === "apWrite" && frame.select === 0x04 ? "close" : undefined),
      });

      await expect(sequencer.apRegisterRead(0x20000000)).rejects.toMatchObject({ code: "CONNECTION_CLOSED" });
      expect(session.getState().state).toBe("disconnected");
    });

    it("keeps each TAR/DRW pair together under concurrent use", async () => {
      const { probe, session, sequencer } = await attached();

      await Promise.all([
        sequencer.apRegisterWrite(0x20000000, 1),
        new DapCommands(session).ping(),
        sequencer.apRegisterRead(0x20000000),
      ]);

      expect(probe.ops).toEqual(["apWrite", "apWrite", "ping", "apWrite", "apRead"]);
    });

    it("reads a block across a 1 KiB boundary, re-staging TAR", async () => {
      const { probe, sequencer } = await attached({
        memory: { 0x200003f8: 1, 0x200003fc: 2, 0x20000400: 3, 0x20000404: 4 },
      });

      await expect(sequencer.readMemoryBlock(0x200003f8, 4)).resolves.toEqual([1, 2, 3, 4]);
      expect(probe.frames).toEqual([
        { op: "apWrite", select: 0x04, value: 0x200003f8 },
        { op: "apBulkRead", select: 0x0c, count: 2 },
        { op: "apWrite", select: 0x04, value: 0x20000400 },
        { op: "apBulkRead", select: 0x0c, count: 2 },
      ]);
    });

    it("writes a block with bulk transfers", async () => {
      const { probe, sequencer } = await attached();

      await sequencer.writeMemoryBlock(0x20000100, [0xa, 0xb, 0xc]);

      expect(probe.frames).toEqual([
        { op: "apWrite", select: 0x04, value: 0x20000100 },
        { op: "apBulkWrite", select: 0x0c, values: [0xa, 0xb, 0xc] },
      ]);
      expect([0x20000100, 0x20000104, 0x20000108].map((a) => probe.memory.get(a))).toEqual([0xa, 0xb, 0xc]);
    });

    it("rejects unaligned block addresses without sending anything", async () => {
      const { probe, sequencer } = await attached();

      await expect(sequencer.readMemoryBlock(0x20000002, 2)).rejects.toMatchObject({ code: "INVALID_ARGUMENT" });
      expect(probe.frames).toEqual([]);
    });
  });
});

describe("DapCommands", () => {
  it("sends a bring-up sequence as one multi-register write", async () => {
    const { probe, session } = await connect();
    const dap = new DapCommands(session);

    await expect(
      dap.multiRegWrite([
        { file: "dp", select: 0x04, value: 0x50000000 },
        { file: "ap", select: 0x00, value: 0x23000052 },
        { file: "ap", select: 0x04, value: 0x20000040 },
        { file: "ap", select: 0x0c, value: 0xdeadbeef },
      ])
    ).resolves.toEqual({ kind: "ok", status: 0 });

    expect(probe.ops).toEqual(["multiRegWrite"]);
    expect(probe.memory.get(0x20000040)).toBe(0xdeadbeef);
    await expect(dap.apRead(0x00)).resolves.toEqual({ kind: "ok", status: 0, data: 0x23000052 });
  });

  it("returns the fault status when an AP write in the batch fails", async () => {
    const { probe, session } = await connect();

    await expect(
      new DapCommands(session).multiRegWrite([
        { file: "ap", select: 0x04, value: 0x20000040 },
        { file: "ap", select: 0x0c, value: 0x1 },
      ])
    ).resolves.toEqual({ kind: "error", status: 0x82, code: 0x02 });

    expect(probe.stickyFault).toBe(true);
    expect(probe.memory.has(0x20000040)).toBe(false);
    expect(session.getState().connected).toBe(true);
  });
});

describe("ProbeClient", () => {
  it("attaches with line reset, IDCODE, ABORT, power-up and CSW", async () => {
    const fake = new FakeProbe({ idcode: 0x0bc11477 });
    probe = fake;
    const client = new ProbeClient(parseConfig({ port: await fake.start(), timeoutMs: 500 }));
    await client.connect();

    await expect(client.attach()).resolves.toEqual({ idcode: 0x0bc11477, ctrlStat: 0xf0000000 });
    await client.disconnect();

    expect(fake.frames).toEqual([
      { op: "lineReset" },
      { op: "dpRead", select: 0x00 },
      { op: "dpWrite", select: 0x00, value: 0x1e },
      { op: "dpWrite", select: 0x04, value: 0x50000000 },
      { op: "dpRead", select: 0x04 },
      { op: "apWrite", select: 0x00, value: 0x23000052 },
      { op: "disconnect" },
    ]);
  });

  it("reads DEMCR before issuing the reset", async () => {
    const fake = new FakeProbe();
    probe = fake;
    const client = new ProbeClient(parseConfig({ port: await fake.start(), timeoutMs: 500 }));
    await client.connect();
    await client.attach();
    fake.frames.length = 0;

    await client.resetTarget();
    await client.disconnect();

    expect(fake.frames).toEqual([
      { op: "apWrite", select: 0x04, value: 0xe000edfc },
      { op: "apRead", select: 0x0c },
      { op: "apWrite", select: 0x04, value: 0xe000ed0c },
      { op: "apWrite", select: 0x0c, value: 0x05fa0004 },
      { op: "apWrite", select: 0x04, value: 0xe000edf0 },
      { op: "apRead", select: 0x0c },
      { op: "disconnect" },
    ]);
  });

  it("reports whether the interface survives a reset", async () => {
    const fake = new FakeProbe();
    probe = fake;
    const client = new ProbeClient(parseConfig({ port: await fake.start(), timeoutMs: 500 }));
    await client.connect();
    await client.attach();

    await expect(client.resetTarget()).resolves.toEqual({
      resetIssued: true,
      interfaceAlive: true,
      demcr: 0,
      dhcsr: 0x02000000,
    });

    await client.writeMemory(0xe000edfc, 0x1);
    const result = await client.resetTarget();
    await client.disconnect();

    expect(result).toMatchObject({
      resetIssued: true,
      interfaceAlive: false,
      demcr: 0x1,
      error: { code: "SEQUENCE_ABORTED", status: "0x82" },
    });
  });
});
