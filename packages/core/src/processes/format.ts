import type { ProcessHandle } from "./types.js";

/** Elapsed run time; running handles are measured up to `now`. */
export function runtimeMs(handle: ProcessHandle, now: number = Date.now()): number {
  if (!handle.startedAt) return 0;
  const end = handle.finishedAt ? handle.finishedAt.getTime() : now;
  return Math.max(0, end - handle.startedAt.getTime());
}

/** "42s", "3m 5s", "2h 10m". */
export function formatRuntime(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  if (totalSeconds < 60) return `${totalSeconds}s`;

  const minutes = Math.floor(totalSeconds / 60);
  if (minutes < 60) return `${minutes}m ${totalSeconds % 60}s`;

  return `${Math.floor(minutes / 60)}h ${minutes % 60}m`;
}
