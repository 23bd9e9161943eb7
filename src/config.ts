import { ScanConfigSchema, ServeConfigSchema, type ScanConfig, type ServeConfig } from './schemas/config.js';

type Env = Record<string, string | undefined>;

const SCAN_ENV_KEYS: Record<string, keyof ScanConfig> = {
  SCAN_WORKERS: 'workers',
  CATALOG_PATH: 'catalogPath',
  SCAN_OUTPUT: 'outputPath',
  PROBE_TIMEOUT_MS: 'probeTimeoutMs',
  PROBE_MAX_REDIRECTS: 'maxRedirects',
  PROBE_MAX_CONTENT_BYTES: 'maxContentBytes',
  PROBE_USER_AGENT: 'userAgent',
  PROBE_PROXY_URL: 'proxyUrl',
  RDAP_TIMEOUT_MS: 'registryTimeoutMs',
  RDAP_RETRY_ATTEMPTS: 'registryRetryAttempts',
  RDAP_RETRY_DELAY_MS: 'registryRetryDelayMs',
  RDAP_BOOTSTRAP_URL: 'rdapBootstrapUrl',
  SCAN_DOMAIN_DELAY_MS: 'domainDelayMs',
  SCAN_QUICK_LIMIT: 'quickLimit',
  LOG_LEVEL: 'logLevel',
  LOG_DIR: 'logDir',
};

const SERVE_ENV_KEYS: Record<string, keyof ServeConfig> = {
  PORT: 'port',
  REPORT_PATH: 'reportPath',
};

function fromEnv(env: Env, keys: Record<string, string>): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [envKey, configKey] of Object.entries(keys)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      values[configKey] = value;
    }
  }
  return values;
}

function definedOnly(overrides: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
}

/** Defaults, then environment, then explicit overrides (CLI flags). */
export function loadConfig(overrides: Partial<Record<keyof ScanConfig, unknown>> = {}, env: Env = process.env): ScanConfig {
  return ScanConfigSchema.parse({ ...fromEnv(env, SCAN_ENV_KEYS), ...definedOnly(overrides) });
}

export function loadServeConfig(overrides: Partial<Record<keyof ServeConfig, unknown>> = {}, env: Env = process.env): ServeConfig {
  return ServeConfigSchema.parse({ ...fromEnv(env, SERVE_ENV_KEYS), ...definedOnly(overrides) });
}
