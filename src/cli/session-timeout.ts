const DEFAULT_AGENT_TIMEOUT_MS = 600_000;
const MIN_AGENT_TIMEOUT_MS = 30_000;

/**
 * Per-call agent timeout. `GANTRY_AGENT_TIMEOUT_MS` wins over the configured value;
 * anything below 30s is raised to 30s, anything unparseable falls back.
 */
export function resolveAgentTimeoutMs(configured?: number, env: NodeJS.ProcessEnv = process.env): number {
  const raw = env.GANTRY_AGENT_TIMEOUT_MS;
  const fromEnv = raw && raw.trim() ? Number(raw) : Number.NaN;
  const candidate = Number.isFinite(fromEnv) ? fromEnv : configured;
  if (candidate === undefined || !Number.isFinite(candidate)) return DEFAULT_AGENT_TIMEOUT_MS;

  const ms = Math.floor(candidate);
  if (ms < MIN_AGENT_TIMEOUT_MS) return MIN_AGENT_TIMEOUT_MS;
  return ms;
}
