/**
 * Debug Channels for Analyzer Visibility
 *
 * Targeted debug logging for following what the analyzer decides while it
 * walks a document: which scopes open, which names bind where, which call
 * sites resolve and which are skipped.
 *
 * ## Usage
 *
 * Enable via environment variable:
 * ```bash
 * LUAHINT_DEBUG=scope npm test        # Just scope building
 * LUAHINT_DEBUG=scope,hints npm test  # Multiple channels
 * LUAHINT_DEBUG=* npm test            # Everything
 * ```
 *
 * In code (always present, no-op when disabled):
 * ```typescript
 * debug.scope("open", { id, parent, name });
 * debug.hints("unresolved", { callee });
 * ```
 */

/** Debug data can be any serializable value */
export type DebugData = Record<string, unknown>;

/** A debug channel function - logs when enabled, no-op when disabled */
export type DebugChannel = (point: string, data?: DebugData) => void;

/** Configuration for debug output */
export interface DebugConfig {
  /** Format output as JSON (machine-readable) or pretty (human-readable) */
  format: "json" | "pretty";
  /** Include timestamps in output */
  timestamps: boolean;
  /**
   * Output function. Defaults to stderr: a server speaking LSP over stdio
   * must keep stdout for protocol messages.
   */
  output: (message: string) => void;
}

const DEFAULT_CONFIG: DebugConfig = {
  format: "pretty",
  timestamps: false,
  output: (message) => console.error(message),
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

/** Parse LUAHINT_DEBUG environment variable */
function parseDebugEnv(): Set<string> {
  const env = process.env["LUAHINT_DEBUG"] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") {
    return new Set(["*"]);
  }
  return new Set(env.split(",").map((s) => s.trim().toLowerCase()).filter(Boolean));
}

let enabledChannels = parseDebugEnv();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

export function formatDebugMessage(
  channel: string,
  point: string,
  data: DebugData | undefined,
): string {
  const prefix = config.timestamps ? `[${new Date().toISOString()}] ` : "";

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
  const parts = Object.entries(data).map(([key, value]) => `${key}=${formatValue(value)}`);
  return `${prefix}${label} { ${parts.join(", ")} }`;
}

function formatValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    if (value.length > 60) return `"${value.slice(0, 57)}..."`;
    return `"${value}"`;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    if (value.length <= 4) return `[${value.map(formatValue).join(", ")}]`;
    return `[${value.length} items]`;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return "[unserializable]";
  }
}

function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) {
    return () => {};
  }
  return (point: string, data?: DebugData) => {
    config.output(formatDebugMessage(name, point, data));
  };
}

/**
 * Refresh debug channels (re-reads environment variable).
 * Call this if LUAHINT_DEBUG changes at runtime.
 */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  debug.parse = createChannel("parse");
  debug.scope = createChannel("scope");
  debug.hints = createChannel("hints");
}

/** Configure debug output format. Channels pick the change up immediately. */
export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

/** Restore the default output configuration. */
export function resetDebugConfig(): void {
  config = { ...DEFAULT_CONFIG };
}

export function isDebugEnabled(channel?: string): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}

export const debug = {
  /** Parsing and node id assignment */
  parse: createChannel("parse"),

  /** Scope tree construction and name binding */
  scope: createChannel("scope"),

  /** Call-site resolution and hint emission */
  hints: createChannel("hints"),
};

export type Debug = typeof debug;
