/**
 * Reset-survival diagnostic.
 *
 * Attaches to the target, applies a scenario's register configuration, requests
 * a system reset through AIRCR and then checks whether the debug interface still
 * answers. Running it across scenarios narrows down which pre-reset
 * configuration leaves SWD locked up after the reset (for example VC_CORERESET
 * armed in DEMCR on some STM32 parts).
 */
import { readFile } from "fs/promises";
import { setTimeout as sleep } from "timers/promises";
import { fileURLToPath } from "url";
import { z } from "zod";
import { type ProbeConfig, wordSchema } from "../config.js";
import { hexWord } from "../protocol/codec.js";
import { ProbeError, type ProbeErrorInfo, isProbeError, withOperation } from "../protocol/errors.js";
import { TransactionSequencer } from "../protocol/sequencer.js";
import { withSession } from "../protocol/session.js";
import { createDebugLog } from "../utils/log.js";

export const DEFAULT_SCENARIO_FILE = fileURLToPath(new URL("../../scenarios/reset-survival.json", import.meta.url));

export const scenarioStepSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("write"),
    address: wordSchema,
    value: wordSchema,
    label: z.string().optional(),
  }),
  z.object({
    kind: z.literal("read"),
    address: wordSchema,
    label: z.string().optional(),
  }),
]);

export const scenarioSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  steps: z.array(scenarioStepSchema).default([]),
});

export type ScenarioStep = z.infer<typeof scenarioStepSchema>;
export type Scenario = z.infer<typeof scenarioSchema>;

export type Phase = "connect" | "setup" | "configuration" | "reset" | "probe";
export type Outcome = "passed" | "failed" | "aborted";

export interface StepRecord {
  phase: Phase;
  label: string;
  ok: boolean;
  value?: number;
  error?: ProbeErrorInfo;
}

export interface ResetSurvivalReport {
  scenario: string;
  outcome: Outcome;
  summary: string;
  phase?: Phase;
  failedStep?: string;
  error?: ProbeErrorInfo;
  idcode?: number;
  dhcsr?: number;
  steps: StepRecord[];
}

export interface SuiteOptions {
  settleMs?: number;
}

export function parseScenario(input: unknown): Scenario {
  const result = scenarioSchema.safeParse(input);
  if (!result.success) {
    throw new ProbeError("INVALID_CONFIG", `Invalid scenario: ${result.error.issues.map((i) => i.message).join("; ")}`, {
      cause: result.error,
    });
  }
  return result.data;
}

export async function loadScenarios(file = DEFAULT_SCENARIO_FILE): Promise<Scenario[]> {
  const text = await readFile(file, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ProbeError("INVALID_CONFIG", `Scenario file ${file} is not valid JSON`, { cause: error });
  }

  const result = z.array(scenarioSchema).safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ProbeError("INVALID_CONFIG", `Scenario file ${file} is invalid: ${detail}`, { cause: result.error });
  }
  return result.data;
}

export function findScenario(scenarios: Scenario[], name: string): Scenario | undefined {
  const wanted = name.trim().toLowerCase();
  return scenarios.find((s) => s.name.toLowerCase() === wanted);
}

function stepLabel(step: ScenarioStep): string {
  if (step.label) return step.label;
  return step.kind === "write"
    ? `Write ${hexWord(step.address)}=${hexWord(step.value)}`
    : `Read ${hexWord(step.address)}`;
}

function errorInfo(error: unknown, label: string): ProbeErrorInfo {
  return (isProbeError(error) ? error : withOperation(error, label)).toJSON();
}

export async function runResetSurvival(config: ProbeConfig, scenario: Scenario): Promise<ResetSurvivalReport> {
  const log = createDebugLog(config.debug, "RESET");
  const { aircr, sysResetRequest, dhcsr } = config.registers;
  const steps: StepRecord[] = [];
  let current: { phase: Phase; label: string } = { phase: "connect", label: `Connect ${config.host}:${config.port}` };

  const run = async <T>(phase: Phase, label: string, fn: () => Promise<T>): Promise<T> => {
    current = { phase, label };
    log(`${scenario.name}: ${phase} / ${label}`);
    try {
      const value = await fn();
      steps.push({ phase, label, ok: true, ...(typeof value === "number" && { value }) });
      return value;
    } catch (error) {
      steps.push({ phase, label, ok: false, error: errorInfo(error, label) });
      throw error;
    }
  };

  try {
    return await withSession(config, async (session) => {
      steps.push({ phase: "connect", label: current.label, ok: true });
      const seq = new TransactionSequencer(session, config.registers, { powerUpPolls: config.powerUpPolls });

      // Baseline debug session
      await run("setup", "Line Reset", () => seq.lineReset());
      const idcode = await run("setup", "DP Read IDCODE", () => seq.readIdcode());
      await run("setup", "Clear Sticky Faults", () => seq.clearStickyFaults());
      await run("setup", "DP Read RDBUFF", () => seq.readRdbuff());
      await run("setup", "Power Up Debug Domain", () => seq.powerUpDebugDomain());
      await run("setup", "Configure CSW", () => seq.configureMemoryAccess());

      // Configuration under test
      for (const step of scenario.steps) {
        if (step.kind === "write") {
          await run("configuration", stepLabel(step), () => seq.apRegisterWrite(step.address, step.value));
        } else {
          await run("configuration", stepLabel(step), () => seq.apRegisterRead(step.address));
        }
      }

      await run("reset", "AIRCR SYSRESETREQ", () => seq.apRegisterWrite(aircr, sysResetRequest));
      const dhcsrValue = await run("probe", "DHCSR Read", () => seq.apRegisterRead(dhcsr));

      const report: ResetSurvivalReport = {
        scenario: scenario.name,
        outcome: "passed",
        summary: "PASSED - interface survived reset",
        idcode,
        dhcsr: dhcsrValue,
        steps,
      };
      return report;
    });
  } catch (error) {
    const info = errorInfo(error, current.label);
    if (current.phase === "connect") {
      steps.push({ phase: "connect", label: current.label, ok: false, error: info });
    }

    const failed = current.phase === "probe";
    const report: ResetSurvivalReport = {
      scenario: scenario.name,
      outcome: failed ? "failed" : "aborted",
      summary: failed
        ? `FAILED - debug interface lost after reset (${current.label}: ${info.message})`
        : `ABORTED - ${current.phase} failed at ${current.label}: ${info.message}`,
      phase: current.phase,
      failedStep: current.label,
      error: info,
      steps,
    };
    log(report.summary);
    return report;
  }
}

/** Run scenarios one after another, each on its own session, letting the target settle in between. */
export async function runResetSurvivalSuite(
  config: ProbeConfig,
  scenarios: Scenario[],
  options: SuiteOptions = {}
): Promise<ResetSurvivalReport[]> {
  const settleMs = options.settleMs ?? 1000;
  const reports: ResetSurvivalReport[] = [];
  for (const [index, scenario] of scenarios.entries()) {
    if (index > 0 && settleMs > 0) {
      await sleep(settleMs);
    }
    reports.push(await runResetSurvival(config, scenario));
  }
  return reports;
}
