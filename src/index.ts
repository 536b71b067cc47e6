// =============================================================================
// aics-plugin-host — Public API
// =============================================================================

// ─────────────────────────────────────────────────────────────────────────────
// Host
// ─────────────────────────────────────────────────────────────────────────────

export { PluginHost } from "./plugins/plugin-host.js";
export type { AvailablePlugin, PluginHostOverrides } from "./plugins/plugin-host.js";
export { ManifestStore, readBundle } from "./plugins/manifest-store.js";
export { InstallationManager } from "./plugins/installation-manager.js";
export type { InstallationManagerOptions, InstallOptions } from "./plugins/installation-manager.js";
export { ActivationEngine } from "./plugins/activation-engine.js";
export type { ActivationEngineOptions, HostApiProvider, InstalledPlugins } from "./plugins/activation-engine.js";
export { HostApi, OPERATION_LABELS } from "./plugins/host-api.js";
export type { HostApiOptions } from "./plugins/host-api.js";
export { PluginEventBus } from "./plugins/plugin-events.js";
export type {
  PluginEvent,
  PluginEventBusOptions,
  PluginEventHandler,
  PluginEventMap,
  PluginEventType,
} from "./plugins/plugin-events.js";

// ─────────────────────────────────────────────────────────────────────────────
// Domain
// ─────────────────────────────────────────────────────────────────────────────

export {
  BUNDLE_EXTENSION,
  MANIFEST_FILE,
  PluginCapabilitySchema,
  PluginManifestSchema,
  PluginPermissionSchema,
  parseManifest,
  serializeManifest,
} from "./domain/manifest.schema.js";
export type { PluginCapability, PluginManifest, PluginPermission } from "./domain/manifest.schema.js";
export {
  COMMAND_PERMISSIONS,
  HOST_API_VERSION,
  HOST_COMMAND_TYPES,
  HostCommandSchema,
  parseCommandArgs,
  parseHostCommand,
} from "./domain/host-command.schema.js";
export type {
  HostCommand,
  HostCommandInput,
  HostCommandType,
  JsonObject,
  JsonValue,
  NotificationLevel,
} from "./domain/host-command.schema.js";
export { isHostCompatible, isSemver } from "./domain/version.js";

// ─────────────────────────────────────────────────────────────────────────────
// Ports
// ─────────────────────────────────────────────────────────────────────────────

export type {
  LoadOptions,
  Plugin,
  PluginCommandHandler,
  PluginContext,
  PluginEnvironment,
  PluginInstance,
  PluginLoaderPort,
  PluginMenuItemDescriptor,
  PluginModule,
  PluginState,
  PluginUiContribution,
  PluginViewDescriptor,
} from "./ports/plugin.port.js";
export type { HostCommandResult, PluginHostApi } from "./ports/host-api.port.js";
export type {
  AiCompletionPort,
  ClipboardPort,
  EditorPort,
  EditorSnapshot,
  HostServices,
  NetworkPort,
  TerminalPort,
  TerminalResult,
  UiPort,
  WorkspacePort,
} from "./ports/host-services.port.js";
export { SIGNATURE_FILE } from "./ports/bundle.port.js";
export type { BundleSourcePort, SignatureStatus, SignatureVerifierPort } from "./ports/bundle.port.js";
export { CATEGORY_CAPABILITY } from "./ports/marketplace.port.js";
export type { MarketplaceListing, MarketplacePort, PluginCategory } from "./ports/marketplace.port.js";

// ─────────────────────────────────────────────────────────────────────────────
// Adapters
// ─────────────────────────────────────────────────────────────────────────────

export { VmPluginLoaderAdapter } from "./adapters/sandbox/vm-plugin-loader.adapter.js";
export { ArchiveBundleSourceAdapter } from "./adapters/bundle/archive-bundle-source.adapter.js";
export {
  computeBundleDigest,
  Ed25519SignatureVerifier,
  signBundle,
} from "./adapters/signature/ed25519-verifier.adapter.js";
export { RegistryCatalogAdapter } from "./adapters/plugin-marketplace/registry-catalog.adapter.js";
export { NodeWorkspaceAdapter } from "./adapters/host-services/node-workspace.adapter.js";
export { LocalShellTerminalAdapter } from "./adapters/host-services/local-shell-terminal.adapter.js";
export { FetchNetworkAdapter } from "./adapters/host-services/fetch-network.adapter.js";
export { InMemoryClipboardAdapter } from "./adapters/host-services/in-memory-clipboard.adapter.js";
export { LoggerUiAdapter } from "./adapters/host-services/logger-ui.adapter.js";
export {
  AiSdkCompletionAdapter,
  UnconfiguredAiCompletionAdapter,
} from "./adapters/host-services/ai-sdk-completion.adapter.js";
export { InMemoryEditorAdapter } from "./adapters/host-services/in-memory-editor.adapter.js";

// ─────────────────────────────────────────────────────────────────────────────
// Ambient
// ─────────────────────────────────────────────────────────────────────────────

export { loadConfig, resolveConfig, PluginHostConfigSchema } from "./config.js";
export type { PluginHostConfig, PluginHostConfigInput } from "./config.js";
export { createConsoleLogger, silentLogger } from "./logging.js";
export type { LogEntry, Logger, LogLevel } from "./logging.js";
export {
  ConfigError,
  IncompatibleVersionError,
  InstallError,
  InvalidCommandError,
  LoadError,
  MarketplaceError,
  MissingPermissionError,
  NetworkError,
  NotFoundError,
  ParseError,
  PluginCommandError,
  PluginHostError,
  PluginInactiveError,
  PluginTimeoutError,
  WorkspaceAccessError,
} from "./errors.js";
