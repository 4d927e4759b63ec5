import fs from 'fs';

const DEFAULT_POLL_MS = 1_000;

export type KillSwitch = {
  /** True while the halt file exists. Checks the disk at most once per poll interval unless forced. */
  isActive(options?: { force?: boolean }): boolean;
  readonly path: string | null;
};

/**
 * Halt-file watcher. Without a path the switch is never active. The path
 * defaults to KILL_SWITCH_FILE, the poll interval to KILL_SWITCH_POLL_MS.
 */
export function createKillSwitch(options: { path?: string; pollMs?: number } = {}): KillSwitch {
  const raw = (options.path ?? process.env.KILL_SWITCH_FILE ?? '').trim();
  const path = raw.length > 0 ? raw : null;
  const pollMs = options.pollMs ?? Number(process.env.KILL_SWITCH_POLL_MS ?? DEFAULT_POLL_MS);

  let active = false;
  let checkedAt = Number.NEGATIVE_INFINITY;

  return {
    path,
    isActive: ({ force = false } = {}) => {
      if (!path) return false;
      const now = Date.now();
      if (force || now - checkedAt >= pollMs) {
        checkedAt = now;
        active = fs.existsSync(path);
      }
      return active;
    },
  };
}
