// =============================================================================
// InMemoryClipboardAdapter — Process-local clipboard
// =============================================================================

import type { ClipboardPort } from "../../ports/host-services.port.js";

export class InMemoryClipboardAdapter implements ClipboardPort {
  private text: string;

  constructor(initial = "") {
    this.text = initial;
  }

  async read(): Promise<string> {
    return this.text;
  }

  async write(text: string): Promise<void> {
    this.text = text;
  }
}
