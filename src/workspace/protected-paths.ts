import picomatch from 'picomatch';

export const PROTECTED_PATH_PATTERNS = ['.gantry/**', '.git/**'] as const;

/** Paths the engine owns; no role may write them, whatever its patterns say. */
export function isProtectedPath(path: string): boolean {
  // Repo-relative POSIX-ish strings, the way git reports them.
  const isMatch = picomatch([...PROTECTED_PATH_PATTERNS], { dot: true });
  return isMatch(path);
}

/**
 * Engine-written files under `.gantry/`: never part of a task diff or commit.
 * `.gantry/config.yaml` is not one of them; it is committed configuration.
 */
export function isEngineArtifactPath(path: string): boolean {
  return path.startsWith('.gantry/sessions/') || path.startsWith('.gantry/state/');
}
