// Probe configuration, validated with zod and passed explicitly to sessions and procedures
import { z } from "zod";
import { ProbeError } from "./protocol/errors.js";
import { DEFAULT_PORT } from "./protocol/types.js";

// A 32-bit word, given as a number or a "0x..." string
export const wordSchema = z
  .union([
    z.number().int().min(0).max(0xffffffff),
    z
      .string()
      .regex(/^(0x[0-9a-fA-F]{1,8}|[0-9]+)$/, "expected a decimal or 0x-prefixed hex word")
      .transform((s) => Number(s))
      .pipe(z.number().int().min(0).max(0xffffffff)),
  ])
  .describe("32-bit word (number or 0x-prefixed hex string)");

// Cortex-M system control addresses and the constant values the procedures write
export const registerMapSchema = z.object({
  aircr: wordSchema.default(0xe000ed0c),
  dhcsr: wordSchema.default(0xe000edf0),
  demcr: wordSchema.default(0xe000edfc),
  sysResetRequest: wordSchema.default(0x05fa0004), // VECTKEY | SYSRESETREQ
  abortClearMask: wordSchema.default(0x1e), // ORUNERRCLR | WDERRCLR | STKERRCLR | STKCMPCLR
  powerUpRequest: wordSchema.default(0x50000000), // CSYSPWRUPREQ | CDBGPWRUPREQ
  csw: wordSchema.default(0x23000052), // 32-bit, single auto-increment, master debug
});

export type RegisterMap = z.infer<typeof registerMapSchema>;

// Integer setting from code (number) or the environment (string)
function intSetting(min: number, max = Number.MAX_SAFE_INTEGER) {
  return z
    .union([z.number(), z.string().regex(/^[0-9]+$/, "expected an integer").transform((s) => Number(s))])
    .pipe(z.number().int().min(min).max(max));
}

export const configSchema = z.object({
  host: z.string().min(1).default("127.0.0.1"),
  port: intSetting(1, 65535).default(DEFAULT_PORT),
  timeoutMs: intSetting(1).default(5000),
  powerUpPolls: intSetting(1).default(10),
  debug: z
    .union([z.boolean(), z.string().toLowerCase().pipe(z.enum(["1", "0", "true", "false"]))])
    .transform((v) => v === true || v === "1" || v === "true")
    .default(false),
  registers: registerMapSchema.default({}),
});

export type ProbeConfig = z.infer<typeof configSchema>;
export type ProbeConfigInput = z.input<typeof configSchema>;

export function parseConfig(input: ProbeConfigInput = {}): ProbeConfig {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`).join("; ");
    throw new ProbeError("INVALID_CONFIG", `Invalid probe configuration: ${detail}`, {
      suggestion: "Check PROBE_HOST, PROBE_PORT, PROBE_TIMEOUT_MS, PROBE_POWERUP_POLLS and PROBE_DEBUG",
      cause: result.error,
    });
  }
  return result.data;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ProbeConfig {
  return parseConfig({
    host: env.PROBE_HOST || undefined,
    port: env.PROBE_PORT || undefined,
    timeoutMs: env.PROBE_TIMEOUT_MS || undefined,
    powerUpPolls: env.PROBE_POWERUP_POLLS || undefined,
    debug: env.PROBE_DEBUG || undefined,
  });
}
