export type DebugFlag = "net" | "codec" | "policy" | "relay" | "mgmt";

/**
 * Debug configuration value
 *
 * - `true`: enable all debug components
 * - `false`: disable all debug components
 * - `string[]`: enable selected components
 */
export type DebugConfig = boolean | ReadonlyArray<DebugFlag>;

export const ALL_DEBUG_FLAGS: ReadonlyArray<DebugFlag> = ["net", "codec", "policy", "relay", "mgmt"];

/**
 * Component identifier passed to debug log callbacks
 */
export type DebugComponent = DebugFlag | "error";

/**
 * Debug log callback invoked with component + message
 */
export type DebugLogFn = (component: DebugComponent, message: string) => void;

export function formatDebugLine(component: DebugComponent, message: string) {
  const trimmed = stripTrailingNewline(message);
  return `[${component}] ${trimmed}`;
}

export function stripTrailingNewline(value: string) {
  if (value.endsWith("\r\n")) return value.slice(0, -2);
  if (value.endsWith("\n")) return value.slice(0, -1);
  return value;
}

function isDebugFlag(value: string): value is DebugFlag {
  return ALL_DEBUG_FLAGS.some((flag) => flag === value);
}

export function parseDebugEnv(value: string | undefined = process.env.RELAY_DEBUG) {
  const flags = new Set<DebugFlag>();
  if (!value) return flags;

  // Allow: "net,codec" as well as "all" / "*".
  for (const entry of value.split(",")) {
    const raw = entry.trim();
    if (!raw) continue;

    if (raw === "*" || raw === "all" || raw === "1" || raw === "true") {
      for (const f of ALL_DEBUG_FLAGS) flags.add(f);
      continue;
    }

    const flag = raw === "management" ? "mgmt" : raw;
    if (isDebugFlag(flag)) {
      flags.add(flag);
    }
  }

  return flags;
}

export function resolveDebugFlags(config: DebugConfig | undefined, envFlags = parseDebugEnv()) {
  if (config === undefined) {
    return envFlags;
  }
  if (config === true) {
    return new Set<DebugFlag>(ALL_DEBUG_FLAGS);
  }
  if (config === false) {
    return new Set<DebugFlag>();
  }

  const out = new Set<DebugFlag>();
  for (const flag of config) {
    if (isDebugFlag(flag)) {
      out.add(flag);
    }
  }
  return out;
}

export function debugFlagsToArray(flags: Set<DebugFlag>): DebugFlag[] {
  return Array.from(flags).sort();
}

/**
 * Render a client address for log lines, honoring the privacy setting.
 */
export function formatClientAddress(address: string, port: number, logClientIps: boolean) {
  if (!logClientIps) return "[redacted]";
  return address.includes(":") ? `[${address}]:${port}` : `${address}:${port}`;
}
