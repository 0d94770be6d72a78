/**
 * Debug Channels
 *
 * Targeted debug logging for following how accessor expressions are parsed,
 * evaluated, and turned into field identifiers.
 *
 * ## Usage
 *
 * Enable via environment variable:
 * ```bash
 * FIELDKIT_DEBUG=forms npm test             # Identifier creation only
 * FIELDKIT_DEBUG=expression,forms npm test  # Multiple channels
 * FIELDKIT_DEBUG=* npm test                 # Everything
 * ```
 *
 * In code (zero-cost when disabled):
 * ```typescript
 * debug.expression('parse', { source, kind: body.$kind });
 * debug.forms('identifier.create', { fieldName });
 * ```
 */

/** Debug data can be any serializable value */
export type DebugData = Record<string, unknown>;

/** A debug channel function - logs when enabled, no-op when disabled */
export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  /** Format output as JSON (machine-readable) or pretty (human-readable) */
  format: "json" | "pretty";
  timestamps: boolean;
  /** Custom output function (defaults to console.log) */
  output: (message: string) => void;
}

const DEFAULT_CONFIG: DebugConfig = {
  format: "pretty",
  timestamps: false,
  output: console.log,
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

export const DEBUG_ENV_VAR = "FIELDKIT_DEBUG";

function parseDebugEnv(): Set<string> {
  const env = process.env[DEBUG_ENV_VAR] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") {
    return new Set(["*"]);
  }
  return new Set(env.split(",").map((s) => s.trim().toLowerCase()));
}

let enabledChannels = parseDebugEnv();

/** Channels created through getDebugChannel() */
const extraChannels = new Map<string, DebugChannel>();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

export function formatMessage(
  channel: string,
  point: string,
  data: DebugData | undefined,
): string {
  const prefix = config.timestamps
    ? `[${new Date().toISOString()}] `
    : "";

  if (config.format === "json") {
    return JSON.stringify({
      channel,
      point,
      ...(data && { data }),
      ...(config.timestamps && { timestamp: Date.now() }),
    });
  }

  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) {
    return `${prefix}${label}`;
  }
  return `${prefix}${label} ${formatData(data)}`;
}

function formatData(data: DebugData, depth = 0): string {
  const entries = Object.entries(data);
  if (entries.length === 0) return "{}";

  const parts = entries.map(([key, value]) => `${key}=${formatValue(value, depth)}`);
  return `{ ${parts.join(", ")} }`;
}

function formatValue(value: unknown, depth: number): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    if (value.length > 60) return `"${value.slice(0, 57)}..."`;
    return `"${value}"`;
  }
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  if (typeof value === "symbol") return value.toString();
  if (typeof value === "function") return `<fn ${value.name || "anonymous"}>`;
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    if (value.length <= 3 && depth < 2) {
      return `[${value.map((v: unknown) => formatValue(v, depth + 1)).join(", ")}]`;
    }
    return `[${value.length} items]`;
  }
  if (typeof value !== "object") return String(value);
  // Owners are arbitrary user objects; never walk into them.
  const ctor: unknown = Reflect.getPrototypeOf(value)?.constructor;
  if (typeof ctor === "function" && ctor !== Object) {
    return `<${ctor.name || "object"}>`;
  }
  if (depth < 1) {
    return formatData(Object.fromEntries(Object.entries(value)), depth + 1);
  }
  return "{...}";
}

/**
 * Create a debug channel.
 *
 * Returns a function that logs when the channel is enabled,
 * or a no-op function when disabled.
 */
function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) {
    return () => {};
  }

  return (point: string, data?: DebugData) => {
    config.output(formatMessage(name, point, data));
  };
}

/**
 * Get or create an extra debug channel by name.
 * Channels are refreshed when refreshDebugChannels() is called.
 */
export function getDebugChannel(name: string): DebugChannel {
  const key = name.trim().toLowerCase();
  if (!key) return () => {};
  const existing = extraChannels.get(key);
  if (existing) return existing;
  const channel = createChannel(key);
  extraChannels.set(key, channel);
  return channel;
}

/**
 * Re-read FIELDKIT_DEBUG and recreate every channel.
 */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  debug.expression = createChannel("expression");
  debug.forms = createChannel("forms");
  for (const name of extraChannels.keys()) {
    extraChannels.set(name, createChannel(name));
  }
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

/** Restore the default output configuration. */
export function resetDebugConfig(): void {
  config = { ...DEFAULT_CONFIG };
}

/**
 * Check if any debug channel is enabled.
 * Useful for conditional expensive computations.
 */
export function isDebugEnabled(channel?: string): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}

export const debug = {
  /** Accessor parsing and evaluation */
  expression: createChannel("expression"),

  /** Field identifier creation */
  forms: createChannel("forms"),
};

export type Debug = typeof debug;
