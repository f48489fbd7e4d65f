import { describe, expect, it } from 'vitest';

import { resolveAgentTimeoutMs } from '../src/cli/session-timeout.js';

describe('resolveAgentTimeoutMs', () => {
  it('defaults to 10 minutes when nothing is set', () => {
    expect(resolveAgentTimeoutMs(undefined, {})).toBe(600_000);
  });

  it('uses the configured value', () => {
    expect(resolveAgentTimeoutMs(120_000, {})).toBe(120_000);
  });

  it('lets the environment override the configuration', () => {
    expect(resolveAgentTimeoutMs(120_000, { GANTRY_AGENT_TIMEOUT_MS: '90000' })).toBe(90_000);
  });

  it('falls back for non-numeric values', () => {
    expect(resolveAgentTimeoutMs(undefined, { GANTRY_AGENT_TIMEOUT_MS: 'not-a-number' })).toBe(600_000);
    expect(resolveAgentTimeoutMs(45_000, { GANTRY_AGENT_TIMEOUT_MS: '  ' })).toBe(45_000);
  });

  it('raises values below the minimum to 30 seconds', () => {
    expect(resolveAgentTimeoutMs(undefined, { GANTRY_AGENT_TIMEOUT_MS: '1000' })).toBe(30_000);
    expect(resolveAgentTimeoutMs(5_000, {})).toBe(30_000);
  });

  it('floors fractional values', () => {
    expect(resolveAgentTimeoutMs(undefined, { GANTRY_AGENT_TIMEOUT_MS: '45000.9' })).toBe(45_000);
  });
});
