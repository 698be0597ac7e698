// Cortex-M system control registers the tools talk about

export const SYSTEM_REGISTERS = [
  { name: "AIRCR", address: 0xe000ed0c, description: "Application interrupt and reset control - write 0x05FA0004 to request a system reset" },
  { name: "SHPR3", address: 0xe000ed20, description: "System handler priority 3" },
  { name: "DFSR", address: 0xe000ed30, description: "Debug fault status - write 1 to clear each flag" },
  { name: "DHCSR", address: 0xe000edf0, description: "Debug halting control and status - writes need DBGKEY 0xA05F in bits 31:16" },
  { name: "DCRSR", address: 0xe000edf4, description: "Debug core register selector" },
  { name: "DCRDR", address: 0xe000edf8, description: "Debug core register data" },
  { name: "DEMCR", address: 0xe000edfc, description: "Debug exception and monitor control - bit 0 VC_CORERESET halts the core out of reset" },
] as const;

export function findSystemRegister(address: number): (typeof SYSTEM_REGISTERS)[number] | undefined {
  return SYSTEM_REGISTERS.find((r) => r.address === address);
}

// Helper to provide context about memory regions
export function getAddressHint(address: number): string {
  const reg = findSystemRegister(address);
  if (reg) return `${reg.name}: ${reg.description}`;
  if (address < 0x20000000) return "Code region - flash or boot ROM on most parts";
  if (address < 0x40000000) return "SRAM region";
  if (address < 0x60000000) return "Peripheral region - reads may have side effects";
  if (address >= 0xe0000000 && address < 0xe0100000) return "Private peripheral bus - SCS, debug and trace components";
  return "";
}

export interface IdcodeInfo {
  value: number;
  designer: number;
  partNumber: number;
  version: number;
  arm: boolean;
}

// DPIDR/IDCODE: VERSION[31:28] PARTNO[27:20] ... DESIGNER[11:1] RAO[0]
export function decodeIdcode(value: number): IdcodeInfo {
  const designer = (value >>> 1) & 0x7ff;
  return {
    value,
    designer,
    partNumber: (value >>> 20) & 0xff,
    version: (value >>> 28) & 0xf,
    arm: designer === 0x23b,
  };
}

export interface DhcsrInfo {
  value: number;
  debugEnabled: boolean;
  halted: boolean;
  lockedUp: boolean;
  resetSinceRead: boolean;
}

export function decodeDhcsr(value: number): DhcsrInfo {
  return {
    value,
    debugEnabled: (value & 0x1) !== 0, // C_DEBUGEN
    halted: (value & (1 << 17)) !== 0, // S_HALT
    lockedUp: (value & (1 << 19)) !== 0, // S_LOCKUP
    resetSinceRead: (value & (1 << 25)) !== 0, // S_RESET_ST
  };
}

export interface DemcrInfo {
  value: number;
  vectorCatchReset: boolean;
  vectorCatchHardFault: boolean;
  traceEnabled: boolean;
}

export function decodeDemcr(value: number): DemcrInfo {
  return {
    value,
    vectorCatchReset: (value & 0x1) !== 0, // VC_CORERESET
    vectorCatchHardFault: (value & (1 << 10)) !== 0, // VC_HARDERR
    traceEnabled: (value & (1 << 24)) !== 0, // TRCENA
  };
}
