// =============================================================================
// Version helpers — Host/plugin compatibility checks
// =============================================================================

import semver from "semver";

export function isSemver(value: string): boolean {
  return semver.valid(value) !== null;
}

/** True when a host running `hostVersion` satisfies a plugin's `minimumAppVersion`. */
export function isHostCompatible(minimumAppVersion: string, hostVersion: string): boolean {
  return semver.gte(hostVersion, minimumAppVersion);
}
