// =============================================================================
// LoggerUiAdapter — Headless UI: notifications become log entries
// =============================================================================

import { log, type Logger, type LogLevel } from "../../logging.js";
import type { NotificationRequest, UiPort } from "../../ports/host-services.port.js";

const LEVELS: Record<NotificationRequest["level"], LogLevel> = {
  info: "info",
  success: "info",
  warning: "warn",
  error: "error",
};

/** Notifications kept for `notifications()` by default */
const DEFAULT_MAX_HISTORY = 100;

export type InputResolver = (pluginId: string, prompt: string) => Promise<string | undefined>;

export class LoggerUiAdapter implements UiPort {
  private readonly logger: Logger;
  private readonly resolveInput?: InputResolver;
  private readonly maxHistory: number;
  private history: NotificationRequest[] = [];

  /**
   * Without an `InputResolver`, every input dialog is treated as dismissed.
   * Only the latest `maxHistory` notifications are kept.
   */
  constructor(logger: Logger, resolveInput?: InputResolver, maxHistory = DEFAULT_MAX_HISTORY) {
    this.logger = logger;
    this.resolveInput = resolveInput;
    this.maxHistory = maxHistory;
  }

  async showNotification(notification: NotificationRequest): Promise<void> {
    this.history.push(notification);
    if (this.history.length > this.maxHistory) {
      this.history = this.history.slice(-this.maxHistory);
    }
    log(
      this.logger,
      LEVELS[notification.level],
      "ui:notification",
      { message: notification.message, level: notification.level },
      notification.pluginId,
    );
  }

  async showInputDialog(pluginId: string, prompt: string): Promise<string | undefined> {
    if (!this.resolveInput) return undefined;
    return this.resolveInput(pluginId, prompt);
  }

  notifications(): readonly NotificationRequest[] {
    return [...this.history];
  }
}
