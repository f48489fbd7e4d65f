import { describe, expect, it } from 'vitest';

import { isEngineArtifactPath, isProtectedPath } from '../src/workspace/protected-paths.js';

describe('protected paths', () => {
  it('flags the engine directory and git internals', () => {
    expect(isProtectedPath('.gantry/config.yaml')).toBe(true);
    expect(isProtectedPath('.gantry/sessions/s-20261018-001/audit.jsonl')).toBe(true);
    expect(isProtectedPath('.git/HEAD')).toBe(true);
  });

  it('does not flag normal source files', () => {
    expect(isProtectedPath('src/core/scheduler.ts')).toBe(false);
    expect(isProtectedPath('.github/workflows/ci.yml')).toBe(false);
  });

  it('treats only session and state files as engine artifacts', () => {
    expect(isEngineArtifactPath('.gantry/sessions/s-20261018-001/audit.jsonl')).toBe(true);
    expect(isEngineArtifactPath('.gantry/state/done.yaml')).toBe(true);
    expect(isEngineArtifactPath('.gantry/config.yaml')).toBe(false);
  });
});
