// =============================================================================
// Paths — Containment checks for workspace and bundle roots
// =============================================================================

import { isAbsolute, relative, sep } from "node:path";

/** True when `target` is `root` itself or lies beneath it. Both must be absolute. */
export function isPathInside(root: string, target: string): boolean {
  const rel = relative(root, target);
  if (rel === "") return true;
  return rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}
