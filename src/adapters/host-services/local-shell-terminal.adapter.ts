// =============================================================================
// LocalShellTerminalAdapter — Terminal commands as subprocesses with limits
// =============================================================================

import { spawn } from "node:child_process";
import { resolve } from "node:path";

import { WorkspaceAccessError } from "../../errors.js";
import type { TerminalExecuteOptions, TerminalPort, TerminalResult } from "../../ports/host-services.port.js";
import { isPathInside } from "../../utils/paths.js";

const DEFAULT_TIMEOUT = 30_000;
const DEFAULT_MAX_OUTPUT = 1024 * 1024; // 1MB

export interface LocalShellTerminalOptions {
  /** Directory commands run in; relative `cwd` options resolve against it */
  workspaceRoot: string;
  /** Shell binary (default: /bin/sh) */
  shell?: string;
  /** Blocked commands (regex patterns) */
  blockedPatterns?: RegExp[];
  /** Inherit parent process env (default: false) */
  inheritParentEnv?: boolean;
  defaultTimeoutMs?: number;
  maxOutputBytes?: number;
}

export class LocalShellTerminalAdapter implements TerminalPort {
  private readonly opts: LocalShellTerminalOptions;

  constructor(options: LocalShellTerminalOptions) {
    this.opts = options;
  }

  async execute(command: string, options?: TerminalExecuteOptions): Promise<TerminalResult> {
    for (const pattern of this.opts.blockedPatterns ?? []) {
      if (pattern.test(command)) {
        return {
          output: `Command blocked by host policy: ${pattern.source}`,
          exitCode: 126,
          truncated: false,
          durationMs: 0,
        };
      }
    }

    const timeout = options?.timeoutMs ?? this.opts.defaultTimeoutMs ?? DEFAULT_TIMEOUT;
    const maxOutput = this.opts.maxOutputBytes ?? DEFAULT_MAX_OUTPUT;
    const cwd = this.resolveCwd(options?.cwd);
    const shell = this.opts.shell ?? "/bin/sh";

    const env = this.opts.inheritParentEnv ? process.env : { PATH: process.env.PATH };

    const start = Date.now();

    return new Promise<TerminalResult>((resolvePromise) => {
      const child = spawn(shell, ["-c", command], { cwd, env });

      let output = "";
      let truncated = false;
      let settled = false;

      const finish = (result: Omit<TerminalResult, "durationMs">): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolvePromise({ ...result, durationMs: Date.now() - start });
      };

      const onData = (chunk: Buffer): void => {
        if (truncated || settled) return;
        const text = chunk.toString();
        if (output.length + text.length > maxOutput) {
          output += text.slice(0, maxOutput - output.length);
          truncated = true;
          child.kill("SIGKILL");
          finish({ output: output + "\n[TRUNCATED]", exitCode: 0, truncated: true });
        } else {
          output += text;
        }
      };

      child.stdout.on("data", onData);
      child.stderr.on("data", onData);

      const timer = setTimeout(() => {
        child.kill("SIGKILL");
        finish({ output: output + "\n[TIMEOUT]", exitCode: 124, truncated });
      }, timeout);

      child.on("close", (code) => {
        finish({ output, exitCode: code ?? 1, truncated });
      });

      child.on("error", (err) => {
        finish({ output: err.message, exitCode: 127, truncated: false });
      });
    });
  }

  private resolveCwd(cwd: string | undefined): string {
    const root = resolve(this.opts.workspaceRoot);
    if (cwd === undefined) return root;
    const target = resolve(root, cwd);
    if (!isPathInside(root, target)) {
      throw new WorkspaceAccessError(cwd, "working directory escapes the workspace root");
    }
    return target;
  }
}
