// =============================================================================
// Bundle Port — Fetching and verifying plugin bundles
// =============================================================================

/** Name of the detached signature file inside a bundle */
export const SIGNATURE_FILE = "bundle.sig";

export interface BundleSourcePort {
  /**
   * Materialises the bundle at `location` (directory, archive path or URL)
   * inside the existing, empty `targetDir`. Must stop when `signal` aborts.
   */
  fetchInto(location: string, targetDir: string, signal: AbortSignal): Promise<void>;
}

export type SignatureStatus =
  | { status: "verified"; keyIndex: number }
  | { status: "unsigned" };

export interface SignatureVerifierPort {
  /** Throws `InstallError` when the signature is invalid, or missing while required */
  verify(bundleDir: string, options: { required: boolean; source: string }): Promise<SignatureStatus>;
}
