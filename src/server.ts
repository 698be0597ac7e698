import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { wordSchema } from "./config.js";
import {
  findScenario,
  loadScenarios,
  parseScenario,
  runResetSurvival,
  runResetSurvivalSuite,
  DEFAULT_SCENARIO_FILE,
} from "./procedures/reset-survival.js";
import { hexWord } from "./protocol/codec.js";
import { hexByte, isProbeError, ProbeError } from "./protocol/errors.js";
import type { ProbeClient } from "./protocol/client.js";
import { Speed, type StatusResponse } from "./protocol/types.js";
import { decodeDemcr, decodeDhcsr, decodeIdcode, getAddressHint } from "./utils/cortexm.js";

export interface ServerOptions {
  scenarioFile?: string;
  settleMs?: number;
}

const SPEEDS = {
  turbo: Speed.Turbo,
  fast: Speed.Fast,
  medium: Speed.Medium,
  slow: Speed.Slow,
} as const;

const selectSchema = z
  .number()
  .int()
  .min(0)
  .max(0xfc)
  .describe("Register select byte (DP: 0x00 IDCODE/ABORT, 0x04 CTRL/STAT, 0x08 SELECT, 0x0C RDBUFF; AP: 0x00 CSW, 0x04 TAR, 0x0C DRW)");

function word(value: number) {
  return { value, hex: hexWord(value) };
}

// Raw statuses are passed through, not interpreted
function formatStatus(response: StatusResponse) {
  return {
    kind: response.kind,
    status: hexByte(response.status),
    ...(response.kind === "ok" && response.data !== undefined && { data: word(response.data) }),
    ...(response.kind === "error" && { code: hexByte(response.code) }),
  };
}

export function createServer(client: ProbeClient, options: ServerOptions = {}): McpServer {
  const scenarioFile = options.scenarioFile ?? DEFAULT_SCENARIO_FILE;

  const server = new McpServer({
    name: "swd-probe-mcp",
    version: "0.1.0",
  });

  // Helper to format tool responses with _meta context
  function formatResponse(data: object) {
    const state = client.getState();
    return {
      content: [
        {
          type: "text" as const,
          text: JSON.stringify(
            {
              ...data,
              _meta: {
                state: state.state,
                connected: state.connected,
                ...(state.connected && { host: state.host, port: state.port }),
              },
            },
            null,
            2
          ),
        },
      ],
    };
  }

  // Helper to format error responses
  function formatError(error: unknown) {
    const state = client.getState();
    const errorData = isProbeError(error)
      ? error.toJSON()
      : {
          error: true,
          code: "UNKNOWN_ERROR",
          message: error instanceof Error ? error.message : String(error),
        };

    return {
      content: [
        {
          type: "text" as const,
          text: JSON.stringify(
            {
              ...errorData,
              _meta: {
                state: state.state,
                connected: state.connected,
              },
            },
            null,
            2
          ),
        },
      ],
    };
  }

  // Tool: status - Get current connection state
  server.registerTool(
    "status",
    {
      description: `Get the current probe connection state.

Returns the session state (disconnected, handshaking, connected, disconnecting), host/port and negotiated API version.

Related tools: connect, disconnect`,
    },
    async () => {
      const state = client.getState();
      return formatResponse({
        ...state,
        hint: state.connected
          ? "Connected. Use attach() to bring up the debug link before AP or memory access."
          : "Not connected. Use connect() to open a session to the probe.",
      });
    }
  );

  // Tool: connect - Connect to the probe
  server.registerTool(
    "connect",
    {
      description: `Connect to the SWD probe's binary API and perform the version handshake.

Defaults come from PROBE_HOST / PROBE_PORT (port 4146 if unset).

Only one session can be open at a time. Related tools: status, disconnect, attach`,
      inputSchema: {
        host: z.string().optional().describe("Probe host address"),
        port: z.number().int().min(1).max(65535).optional().describe("Probe binary API port (default: 4146)"),
      },
    },
    async (args) => {
      const host = args.host || client.config.host;
      const port = args.port || client.config.port;

      try {
        await client.connect(host, port);
        return formatResponse({
          connected: true,
          host,
          port,
          message: `Connected to probe at ${host}:${port}`,
          hint: "Use attach() next: line reset, IDCODE, clear faults, power up and CSW setup.",
        });
      } catch (error) {
        return formatError(error);
      }
    }
  );

  // Tool: disconnect - Disconnect from the probe
  server.registerTool(
    "disconnect",
    {
      description: `Send the disconnect command and close the session.

Safe to call even if not connected. Related tools: connect, status`,
    },
    async () => {
      const wasConnected = client.getState().connected;
      try {
        await client.disconnect();
        return formatResponse({
          disconnected: true,
          wasConnected,
          message: wasConnected ? "Disconnected from probe" : "Was not connected",
        });
      } catch (error) {
        return formatError(error);
      }
    }
  );

  // Tool: attach - Bring up the debug link
  server.registerTool(
    "attach",
    {
      description: `Bring up the debug link: SWD line reset, read IDCODE, clear sticky faults, power up the debug domain and configure 32-bit memory access.

Run this after connect() and after anything that leaves the DP in a fault state.

Related tools: connect, clearStickyFaults, powerUp`,
    },
    async () => {
      try {
        const { idcode, ctrlStat } = await client.attach();
        return formatResponse({
          idcode: { ...word(idcode), ...decodeIdcode(idcode) },
          ctrlStat: word(ctrlStat),
          message: "Debug link up",
        });
      } catch (error) {
        return formatError(error);
      }
    }
  );

  // Tool: lineReset - SWD line reset
  server.registerTool(
    "lineReset",
    {
      description: `Issue an SWD line reset and reconnect the DP. Returns the raw status.

Related tools: attach, dpRead`,
    },
    async () => {
      try {
        return formatResponse(formatStatus(await client.commands.lineReset()));
      } catch (error) {
        return formatError(error);
      }
    }
  );

  // Tool: ping - Probe liveness
  server.registerTool(
    "ping",
    {
      description: `Ping the probe without touching the target. Returns the raw status.`,
    },
    async () => {
      try {
        return formatResponse(formatStatus(await client.commands.ping()));
      } catch (error) {
        return formatError(error);
      }
    }
  );

  // Tool: setSpeed - SWD clock speed
  server.registerTool(
    "setSpeed",
    {
      description: `Set the SWD clock: turbo (4 MHz), fast (2 MHz), medium (1 MHz) or slow (500 kHz).

Lower speeds help with long wires or marginal targets.`,
      inputSchema: {
        speed: z.enum(["turbo", "fast", "medium", "slow"]).describe("SWD clock speed"),
      },
    },
    async (args) => {
      try {
        return formatResponse({
          speed: args.speed,
          ...formatStatus(await client.commands.setSpeed(SPEEDS[args.speed])),
        });
      } catch (error) {
        return formatError(error);
      }
    }
  );

  // Tool: dpRead - Raw DP register read
  server.registerTool(
    "dpRead",
    {
      description: `Read a debug port register. Returns the raw status and, on success, the data word.

No fault handling is applied: an error status leaves the sticky flags set until clearStickyFaults().

Related tools: dpWrite, clearStickyFaults`,
      inputSchema: { select: selectSchema },
    },
    async (args) => {
      try {
        return formatResponse(formatStatus(await client.commands.dpRead(args.select)));
      } catch (error) {
        return formatError(error);
      }
    }
  );

  // Tool: dpWrite - Raw DP register write
  server.registerTool(
    "dpWrite",
    {
      description: `Write a debug port register. Returns the raw status.

Related tools: dpRead, clearStickyFaults`,
      inputSchema: { select: selectSchema, value: wordSchema },
    },
    async (args) => {
      try {
        return formatResponse(formatStatus(await client.commands.dpWrite(args.select, args.value)));
      } catch (error) {
        return formatError(error);
      }
    }
  );

  // Tool: apRead - Raw AP register read
  server.registerTool(
    "apRead",
    {
      description: `Read an access port register (bank selected by DP SELECT). Returns the raw status and, on success, the data word.

For memory, prefer readMemory which stages TAR for you.

Related tools: apWrite, readMemory`,
      inputSchema: { select: selectSchema },
    },
    async (args) => {
      try {
        return formatResponse(formatStatus(await client.commands.apRead(args.select)));
      } catch (error) {
        return formatError(error);
      }
    }
  );

  // Tool: apWrite - Raw AP register write
  server.registerTool(
    "apWrite",
    {
      description: `Write an access port register. Returns the raw status.

For memory, prefer writeMemory which stages TAR for you.

Related tools: apRead, writeMemory`,
      inputSchema: { select: selectSchema, value: wordSchema },
    },
    async (args) => {
      try {
        return formatResponse(formatStatus(await client.commands.apWrite(args.select, args.value)));
      } catch (error) {
        return formatError(error);
      }
    }
  );

  // Tool: multiRegWrite - Batched DP/AP register writes
  server.registerTool(
    "multiRegWrite",
    {
      description: `Send a list of DP and AP register writes as one frame. The probe applies them in order and stops at the first that fails; the single returned status covers the batch.

Useful for bring-up sequences, e.g. CTRL/STAT power-up request followed by CSW, TAR and DRW.

Related tools: dpWrite, apWrite`,
      inputSchema: {
        writes: z
          .array(
            z.object({
              file: z.enum(["dp", "ap"]).describe("Register file"),
              select: selectSchema,
              value: wordSchema,
            })
          )
          .min(1)
          .max(256)
          .describe("Writes in the order they are applied"),
      },
    },
    async (args) => {
      try {
        return formatResponse({
          writes: args.writes.length,
          ...formatStatus(await client.commands.multiRegWrite(args.writes)),
        });
      } catch (error) {
        return formatError(error);
      }
    }
  );

  // Tool: clearStickyFaults - ABORT write
  server.registerTool(
    "clearStickyFaults",
    {
      description: `Write the DP ABORT clear mask (0x1E) to clear latched sticky errors.

Needed after any failed transfer: the fault latch blocks every later access until cleared. Harmless when nothing is latched.`,
    },
    async () => {
      try {
        await client.sequencer.clearStickyFaults();
        return formatResponse({ cleared: true, mask: word(client.config.registers.abortClearMask) });
      } catch (error) {
        return formatError(error);
      }
    }
  );

  // Tool: powerUp - Debug domain power-up
  server.registerTool(
    "powerUp",
    {
      description: `Request debug and system power-up through DP CTRL/STAT and wait for both acknowledgements.

AP and memory access fail against a powered-down debug domain.`,
    },
    async () => {
      try {
        const ctrlStat = await client.sequencer.powerUpDebugDomain();
        return formatResponse({ poweredUp: true, ctrlStat: word(ctrlStat) });
      } catch (error) {
        return formatError(error);
      }
    }
  );

  // Tool: readMemory - Read target memory words
  server.registerTool(
    "readMemory",
    {
      description: `Read 32-bit words from target memory through the MEM-AP (TAR then DRW).

The address must be word aligned. Reads of more than one word use bulk transfers, re-staging TAR at each 1 KiB boundary.

Useful addresses:
- 0xE000ED0C: AIRCR
- 0xE000EDF0: DHCSR (debug halting control/status)
- 0xE000EDFC: DEMCR (vector catch)

Related tools: writeMemory, attach`,
      inputSchema: {
        address: wordSchema.describe("Word-aligned start address"),
        count: z.number().int().min(1).max(1024).optional().describe("Number of words to read (default: 1)"),
      },
    },
    async (args) => {
      const count = args.count ?? 1;
      try {
        const words =
          count === 1
            ? [await client.readMemory(args.address)]
            : await client.readMemoryBlock(args.address, count);
        return formatResponse({
          address: word(args.address),
          count: words.length,
          words: words.map((w, i) => ({ address: hexWord(args.address + i * 4), ...word(w) })),
          hint: getAddressHint(args.address),
        });
      } catch (error) {
        return formatError(error);
      }
    }
  );

  // Tool: writeMemory - Write target memory words
  server.registerTool(
    "writeMemory",
    {
      description: `Write 32-bit words to target memory through the MEM-AP (TAR then DRW).

DRW is never written if staging TAR fails. Writes to DHCSR need DBGKEY 0xA05F in the top half; AIRCR needs VECTKEY 0x05FA.

Related tools: readMemory, resetTarget`,
      inputSchema: {
        address: wordSchema.describe("Word-aligned start address"),
        values: z.array(wordSchema).min(1).max(1024).describe("Words to write"),
      },
    },
    async (args) => {
      try {
        if (args.values.length === 1) {
          await client.writeMemory(args.address, args.values[0]);
        } else {
          await client.sequencer.writeMemoryBlock(args.address, args.values);
        }
        return formatResponse({
          success: true,
          address: word(args.address),
          wordsWritten: args.values.length,
          message: `Wrote ${args.values.length} word(s) at ${hexWord(args.address)}`,
          hint: getAddressHint(args.address),
        });
      } catch (error) {
        return formatError(error);
      }
    }
  );

  // Tool: resetTarget - System reset through AIRCR
  server.registerTool(
    "resetTarget",
    {
      description: `Request a system reset (AIRCR = 0x05FA0004) and check the debug interface still answers by reading DHCSR.

DEMCR is read before the reset and returned decoded, since an armed VC_CORERESET is a common reason for losing the interface.

If the interface is lost the session usually needs a reconnect and attach().

Related tools: runResetSurvival, attach`,
    },
    async () => {
      try {
        const result = await client.resetTarget();
        const demcr = decodeDemcr(result.demcr);
        let hint = "Debug interface survived the reset.";
        if (!result.interfaceAlive) {
          hint = demcr.vectorCatchReset
            ? "Debug interface did not answer after reset while DEMCR.VC_CORERESET was armed. Reconnect, attach, and clear DEMCR bit 0 before resetting again."
            : "Debug interface did not answer after reset. Reconnect, attach, and use runResetSurvival to find the configuration responsible.";
        }
        return formatResponse({
          ...result,
          demcr: { ...word(result.demcr), ...demcr },
          ...(result.dhcsr !== undefined && { dhcsr: { ...word(result.dhcsr), ...decodeDhcsr(result.dhcsr) } }),
          hint,
        });
      } catch (error) {
        return formatError(error);
      }
    }
  );

  // Tool: listScenarios - Stock reset-survival scenarios
  server.registerTool(
    "listScenarios",
    {
      description: `List the stock reset-survival scenarios and the register writes each applies before the reset.

Related tools: runResetSurvival`,
    },
    async () => {
      try {
        const scenarios = await loadScenarios(scenarioFile);
        return formatResponse({
          count: scenarios.length,
          scenarios: scenarios.map((s) => ({
            name: s.name,
            description: s.description,
            steps: s.steps.length,
          })),
        });
      } catch (error) {
        return formatError(error);
      }
    }
  );

  // Tool: runResetSurvival - Reset-survival diagnostic
  server.registerTool(
    "runResetSurvival",
    {
      description: `Run the reset-survival diagnostic on a fresh session: attach, apply a configuration, reset through AIRCR, then probe DHCSR.

Outcome per scenario:
- passed: the debug interface answered after the reset
- failed: it was lost after the reset
- aborted: something before the reset failed (the phase and step are reported)

Give a stock scenario name, custom steps, or all=true for every stock scenario.
The diagnostic opens its own connection, so disconnect() any interactive session first.

Related tools: listScenarios, resetTarget`,
      inputSchema: {
        scenario: z.string().optional().describe("Stock scenario name (see listScenarios)"),
        name: z.string().optional().describe("Name for a custom scenario"),
        steps: z
          .array(
            z.object({
              kind: z.enum(["write", "read"]),
              address: wordSchema,
              value: wordSchema.optional(),
              label: z.string().optional(),
            })
          )
          .optional()
          .describe("Custom AP register steps applied before the reset"),
        all: z.boolean().optional().describe("Run every stock scenario in turn"),
      },
    },
    async (args) => {
      try {
        if (args.all) {
          const reports = await runResetSurvivalSuite(client.config, await loadScenarios(scenarioFile), {
            settleMs: options.settleMs,
          });
          return formatResponse({
            passed: reports.filter((r) => r.outcome === "passed").length,
            total: reports.length,
            reports,
          });
        }

        if (args.steps) {
          const scenario = parseScenario({
            name: args.name ?? "Custom",
            steps: args.steps.map((s) => {
              if (s.kind === "read") return { kind: "read" as const, address: s.address, label: s.label };
              if (s.value === undefined) {
                throw new ProbeError("INVALID_ARGUMENT", `Write step at ${hexWord(s.address)} has no value`);
              }
              return { kind: "write" as const, address: s.address, value: s.value, label: s.label };
            }),
          });
          return formatResponse(await runResetSurvival(client.config, scenario));
        }

        const name = args.scenario ?? "Basic Reset";
        const scenario = findScenario(await loadScenarios(scenarioFile), name);
        if (!scenario) {
          throw new ProbeError("INVALID_ARGUMENT", `No stock scenario named "${name}"`, {
            suggestion: "Use listScenarios() to see the available names",
          });
        }
        return formatResponse(await runResetSurvival(client.config, scenario));
      } catch (error) {
        return formatError(error);
      }
    }
  );

  return server;
}
