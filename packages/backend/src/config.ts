/**
 * @description: Centralizes backend runtime configuration defaults and env parsing.
 * @groundcheck-scope: utility
 * @groundcheck-module: BackendRuntimeConfig
 * @groundcheck-risk: moderate - Misconfiguration can break API behavior or abuse protections.
 */
type RuntimeConfig = {
  server: {
    port: number;
    host: string;
    trustProxy: boolean;
  };
  validateApi: {
    rateLimit: number;
    rateLimitWindowMs: number;
    maxBodyBytes: number;
  };
  entityModelEnabled: boolean;
};

// --- Helpers ---
// Guard numeric settings to sane positive values.
const parsePositiveInt = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value || '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  const normalized = value?.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') {
    return true;
  }
  if (normalized === 'false' || normalized === '0') {
    return false;
  }
  return fallback;
};

// --- Environment parsing ---
const loadRuntimeConfig = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => ({
  server: {
    port: parsePositiveInt(env.PORT, 3000),
    host: env.HOST?.trim() || '::',
    trustProxy: parseBoolean(env.WEB_TRUST_PROXY, false)
  },
  validateApi: {
    rateLimit: parsePositiveInt(env.VALIDATE_API_RATE_LIMIT, 30),
    rateLimitWindowMs: parsePositiveInt(env.VALIDATE_API_RATE_LIMIT_WINDOW_MS, 60000),
    maxBodyBytes: parsePositiveInt(env.VALIDATE_API_MAX_BODY_BYTES, 200000)
  },
  // The NLP model is optional; pattern extraction is always available.
  entityModelEnabled: parseBoolean(env.ENTITY_MODEL_ENABLED, true)
});

export { loadRuntimeConfig };
export type { RuntimeConfig };
