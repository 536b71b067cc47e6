// =============================================================================
// FetchNetworkAdapter — Outbound HTTP for plugins via global fetch
// =============================================================================

import { describeError, NetworkError } from "../../errors.js";
import type { NetworkPort, NetworkRequest, NetworkResponse } from "../../ports/host-services.port.js";

const DEFAULT_TIMEOUT = 30_000;
const DEFAULT_MAX_BODY = 5 * 1024 * 1024; // 5MB
const DEFAULT_MAX_REDIRECTS = 5;
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export interface FetchNetworkOptions {
  timeoutMs?: number;
  /** Response bodies longer than this many characters are rejected */
  maxBodyLength?: number;
  /** Hosts plugins may reach; omitted means any host */
  allowedHosts?: string[];
  maxRedirects?: number;
}

/** Follows redirects itself so every hop is checked against `allowedHosts`. */
export class FetchNetworkAdapter implements NetworkPort {
  private readonly timeoutMs: number;
  private readonly maxBodyLength: number;
  private readonly maxRedirects: number;
  private readonly allowedHosts?: ReadonlySet<string>;

  constructor(options?: FetchNetworkOptions) {
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT;
    this.maxBodyLength = options?.maxBodyLength ?? DEFAULT_MAX_BODY;
    this.maxRedirects = options?.maxRedirects ?? DEFAULT_MAX_REDIRECTS;
    this.allowedHosts = options?.allowedHosts ? new Set(options.allowedHosts) : undefined;
  }

  async request(request: NetworkRequest): Promise<NetworkResponse> {
    const signal = AbortSignal.timeout(this.timeoutMs);
    let url = new URL(request.url);
    let method = request.method;
    let body = request.body;

    for (let hop = 0; ; hop++) {
      this.assertAllowed(url);
      const response = await this.send(url, { method, headers: request.headers, body, signal });

      const location = response.headers.get("location");
      if (!REDIRECT_STATUSES.has(response.status) || location === null) {
        return this.toNetworkResponse(url, response);
      }
      await response.body?.cancel();
      if (hop >= this.maxRedirects) {
        throw new NetworkError(url.href, `Request to ${url.origin} exceeded ${this.maxRedirects} redirects`);
      }

      url = new URL(location, url);
      if (response.status === 303 || ((response.status === 301 || response.status === 302) && method === "POST")) {
        method = "GET";
        body = undefined;
      }
    }
  }

  // ─── Private ────────────────────────────────────────────────────────────

  private assertAllowed(url: URL): void {
    if (this.allowedHosts && !this.allowedHosts.has(url.hostname)) {
      throw new NetworkError(url.href, `Host "${url.hostname}" is not in the allowed host list`);
    }
  }

  private async send(url: URL, init: RequestInit): Promise<Response> {
    try {
      return await fetch(url, { ...init, redirect: "manual" });
    } catch (err) {
      throw new NetworkError(url.href, `Request to ${url.origin} failed: ${describeError(err)}`, { cause: err });
    }
  }

  private async toNetworkResponse(url: URL, response: Response): Promise<NetworkResponse> {
    const body = await response.text();
    if (body.length > this.maxBodyLength) {
      throw new NetworkError(url.href, `Response from ${url.origin} exceeds ${this.maxBodyLength} characters`);
    }

    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });

    return { status: response.status, headers, body };
  }
}
