// src/connectivity.ts
//
// The source share usually sits behind a VPN. Checking and bringing it up is
// delegated to operator-provided commands; a zero exit status means "up".

import { spawn } from "node:child_process";
import { errorMessage } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import { retryWithBackoff } from "./retry.js";

export interface ConnectivityProvider {
  ensureConnected(): Promise<boolean>;
}

export class AlwaysConnected implements ConnectivityProvider {
  async ensureConnected(): Promise<boolean> {
    return true;
  }
}

export interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  argv: readonly string[],
  timeoutMs: number,
) => Promise<CommandResult>;

export const spawnCommand: CommandRunner = (argv, timeoutMs) =>
  new Promise((resolve, reject) => {
    const [cmd, ...args] = argv;
    const p = spawn(cmd, args, {
      stdio: ["ignore", "pipe", "pipe"],
      timeout: timeoutMs,
      killSignal: "SIGKILL",
    });
    let stdout = "";
    let stderr = "";
    p.stdout.on("data", (d: Buffer) => (stdout += d.toString()));
    p.stderr.on("data", (d: Buffer) => (stderr += d.toString()));
    p.on("error", reject);
    p.on("close", (code) => resolve({ code, stdout, stderr }));
  });

export interface CommandConnectivityOptions {
  checkCommand: readonly string[] | null;
  connectCommand: readonly string[] | null;
  retries: number;
  retryDelayMs: number;
  timeoutMs: number;
  logger?: Logger;
  runner?: CommandRunner;
  sleep?: (ms: number) => Promise<void>;
}

export class CommandConnectivity implements ConnectivityProvider {
  private readonly logger: Logger;
  private readonly runner: CommandRunner;

  constructor(private readonly opts: CommandConnectivityOptions) {
    this.logger = opts.logger ?? new NullLogger();
    this.runner = opts.runner ?? spawnCommand;
  }

  async ensureConnected(): Promise<boolean> {
    const { checkCommand, connectCommand } = this.opts;
    if (!checkCommand) {
      this.logger.debug("no connectivity check configured");
      return true;
    }
    if (await this.succeeds(checkCommand)) return true;
    if (!connectCommand) {
      this.logger.error("not connected and no connect command configured");
      return false;
    }

    const result = await retryWithBackoff(
      async () => {
        if (!(await this.succeeds(connectCommand))) {
          throw new Error(`${connectCommand[0]} failed`);
        }
        if (!(await this.succeeds(checkCommand))) {
          throw new Error("still not connected after connect command");
        }
      },
      {
        maxAttempts: this.opts.retries,
        backoffBaseMs: this.opts.retryDelayMs,
        maxBackoffMs: this.opts.retryDelayMs,
      },
      {
        sleep: this.opts.sleep,
        onAttemptFailed: (attempt, err, nextDelayMs) =>
          this.logger.warn("connect attempt failed", {
            attempt,
            maxAttempts: this.opts.retries,
            retryInMs: nextDelayMs,
            error: errorMessage(err),
          }),
      },
    );
    if (result.ok) {
      this.logger.info("connected", { attempts: result.attempts });
      return true;
    }
    this.logger.error("unable to establish connectivity", {
      attempts: result.attempts,
    });
    return false;
  }

  private async succeeds(argv: readonly string[]): Promise<boolean> {
    try {
      const { code, stderr } = await this.runner(argv, this.opts.timeoutMs);
      if (code === 0) return true;
      this.logger.debug("command exited non-zero", {
        command: argv.join(" "),
        code,
        stderr: stderr.trim(),
      });
      return false;
    } catch (err) {
      this.logger.warn("unable to run command", {
        command: argv.join(" "),
        error: errorMessage(err),
      });
      return false;
    }
  }
}
