// Debug logging - everything goes to stderr, stdout belongs to the MCP transport

export type DebugLog = (msg: string, data?: Buffer | unknown) => void;

export function createDebugLog(enabled: boolean, prefix = "PROBE"): DebugLog {
  return (msg, data) => {
    if (!enabled) return;
    if (data instanceof Buffer) {
      console.error(`[${prefix}] ${msg}: ${data.toString("hex")} (${data.length} bytes)`);
    } else if (data !== undefined) {
      console.error(`[${prefix}] ${msg}:`, data);
    } else {
      console.error(`[${prefix}] ${msg}`);
    }
  };
}
