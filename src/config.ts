// src/config.ts
//
// Settings from the environment, overridden by CLI flags. Invalid values are collected as problems
// and the server refuses to start; nothing is silently clamped.

export const TRANSPORTS = ['stdio', 'http'] as const;
export type TransportKind = (typeof TRANSPORTS)[number];

const LOOPBACK_ADDRESSES = ['127.0.0.1', '::1', 'localhost'] as const;

export type EngineSettings = Readonly<{
  transport: TransportKind;
  bindAddress: string;
  port: number;
  endpointPath: string;
  strictMode: boolean;
  maxMessageBytes: number;
  maxResponseBytes: number;
  maxSessions: number;
  idleTimeoutMs: number;
  requestTimeoutMs: number;
  debugLogging: boolean;
}>;

export type SettingKey = keyof EngineSettings;

/** Raw values as they arrive from flags; strings are parsed the same way as env values. */
export type SettingsOverrides = Partial<Record<SettingKey, string | number | boolean>>;

export const ENV_VARS: Readonly<Record<SettingKey, string>> = {
  transport: 'MCP_TRANSPORT',
  bindAddress: 'MCP_BIND_ADDRESS',
  port: 'MCP_PORT',
  endpointPath: 'MCP_ENDPOINT_PATH',
  strictMode: 'MCP_STRICT',
  maxMessageBytes: 'MCP_MAX_MESSAGE_BYTES',
  maxResponseBytes: 'MCP_MAX_RESPONSE_BYTES',
  maxSessions: 'MCP_MAX_SESSIONS',
  idleTimeoutMs: 'MCP_IDLE_TIMEOUT_MS',
  requestTimeoutMs: 'MCP_REQUEST_TIMEOUT_MS',
  debugLogging: 'MCP_DEBUG',
};

export const DEFAULT_SETTINGS: EngineSettings = {
  transport: 'stdio',
  bindAddress: '127.0.0.1',
  port: 3939,
  endpointPath: '/mcp',
  strictMode: true,
  maxMessageBytes: 1024 * 1024,
  maxResponseBytes: 1024 * 1024,
  maxSessions: 64,
  idleTimeoutMs: 30 * 60 * 1000,
  requestTimeoutMs: 30_000,
  debugLogging: false,
};

type IntRange = Readonly<{ min: number; max: number }>;

const INT_RANGES = {
  port: { min: 1, max: 65535 },
  maxMessageBytes: { min: 1024, max: 16 * 1024 * 1024 },
  maxResponseBytes: { min: 16_384, max: 16 * 1024 * 1024 },
  maxSessions: { min: 1, max: 1024 },
  idleTimeoutMs: { min: 0, max: 24 * 60 * 60 * 1000 },
  requestTimeoutMs: { min: 250, max: 120_000 },
} as const satisfies Partial<Record<SettingKey, IntRange>>;

export function readSettings(
  env: NodeJS.ProcessEnv = process.env,
  overrides: SettingsOverrides = {},
): { settings?: EngineSettings; problems: string[] } {
  const problems: string[] = [];

  const raw = (key: SettingKey): string | number | boolean | undefined => overrides[key] ?? env[ENV_VARS[key]];

  const int = (key: keyof typeof INT_RANGES): number => {
    const value = raw(key);
    if (value === undefined) return DEFAULT_SETTINGS[key];
    const n = typeof value === 'number' ? value : Number(String(value).trim());
    const { min, max } = INT_RANGES[key];
    if (String(value).trim() === '' || !Number.isInteger(n) || n < min || n > max) {
      problems.push(`${key} must be an integer in [${min}, ${max}] (got "${String(value)}").`);
      return DEFAULT_SETTINGS[key];
    }
    return n;
  };

  const bool = (key: 'strictMode' | 'debugLogging'): boolean => {
    const value = raw(key);
    if (value === undefined) return DEFAULT_SETTINGS[key];
    if (typeof value === 'boolean') return value;
    const parsed = parseBoolean(String(value));
    if (parsed === undefined) {
      problems.push(`${key} must be one of true, false, 1, 0 (got "${String(value)}").`);
      return DEFAULT_SETTINGS[key];
    }
    return parsed;
  };

  const transportRaw = String(raw('transport') ?? DEFAULT_SETTINGS.transport).trim().toLowerCase();
  const transport = TRANSPORTS.find((t) => t === transportRaw);
  if (!transport) problems.push(`transport must be "stdio" or "http" (got "${transportRaw}").`);

  const bindAddress = String(raw('bindAddress') ?? DEFAULT_SETTINGS.bindAddress).trim();
  // Localhost only; there is no authentication layer.
  if (!LOOPBACK_ADDRESSES.some((a) => a === bindAddress)) {
    problems.push(`bindAddress must be a loopback address (${LOOPBACK_ADDRESSES.join(', ')}) (got "${bindAddress}").`);
  }

  const endpointPath = String(raw('endpointPath') ?? DEFAULT_SETTINGS.endpointPath).trim();
  if (!/^\/[A-Za-z0-9._~/-]*$/.test(endpointPath)) {
    problems.push(`endpointPath must be an absolute path without query (got "${endpointPath}").`);
  }

  const settings: EngineSettings = {
    transport: transport ?? DEFAULT_SETTINGS.transport,
    bindAddress,
    port: int('port'),
    endpointPath,
    strictMode: bool('strictMode'),
    maxMessageBytes: int('maxMessageBytes'),
    maxResponseBytes: int('maxResponseBytes'),
    maxSessions: int('maxSessions'),
    idleTimeoutMs: int('idleTimeoutMs'),
    requestTimeoutMs: int('requestTimeoutMs'),
    debugLogging: bool('debugLogging'),
  };

  if (problems.length) return { problems };
  return { settings, problems };
}

function parseBoolean(value: string): boolean | undefined {
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      return undefined;
  }
}
