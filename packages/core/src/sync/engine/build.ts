import { spawn } from "node:child_process";
import { mkdir } from "node:fs/promises";
import type { Logger } from "pino";
import { BuildFailedError } from "../../errors/catalog.js";

export interface BuildOptions {
  /** Shell command line; empty or absent skips the build */
  command?: string | null;
  workingDirectory: string;
  /** Kill the build after this long (default: 10 minutes) */
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

export interface BuildResult {
  skipped: boolean;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  durationMs: number;
}

export const DEFAULT_BUILD_TIMEOUT_MS = 600_000;

/**
 * Run the site build through the system shell and wait for it to exit.
 * Rejects with BuildFailedError on spawn failure, non-zero exit or timeout.
 */
export async function runBuild(
  options: BuildOptions,
  logger: Logger,
): Promise<BuildResult> {
  const command = options.command?.trim() ?? "";
  if (command === "") {
    logger.info("No build command configured, skipping build");
    return { skipped: true, exitCode: null, stdout: "", stderr: "", durationMs: 0 };
  }

  const timeoutMs = options.timeoutMs ?? DEFAULT_BUILD_TIMEOUT_MS;
  await mkdir(options.workingDirectory, { recursive: true });

  logger.info(
    { command, cwd: options.workingDirectory },
    "Running build command",
  );
  const startedAt = Date.now();

  return new Promise((resolve, reject) => {
    const proc = spawn(command, {
      cwd: options.workingDirectory,
      env: options.env ?? process.env,
      shell: true,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    let settled = false;
    let timedOut = false;

    const settle = (fn: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      fn();
    };

    const timer = setTimeout(() => {
      timedOut = true;
      proc.kill("SIGTERM");
    }, timeoutMs);

    proc.stdout?.on("data", (data: Buffer) => {
      stdout += data.toString();
    });
    proc.stderr?.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on("error", (err) => {
      settle(() =>
        reject(
          new BuildFailedError(
            null,
            stderr,
            `Failed to start build command: ${err.message}`,
          ),
        ),
      );
    });

    // A killed shell may leave children holding the pipes open, so a
    // timeout settles on exit rather than waiting for close
    proc.on("exit", (code) => {
      if (!timedOut) return;
      settle(() =>
        reject(
          new BuildFailedError(
            code,
            stderr,
            `Build command timed out after ${timeoutMs}ms`,
          ),
        ),
      );
    });

    proc.on("close", (code) => {
      const durationMs = Date.now() - startedAt;
      if (stdout) logger.debug({ output: stdout.trimEnd() }, "Build stdout");
      if (stderr) logger.debug({ output: stderr.trimEnd() }, "Build stderr");

      if (code === 0 && !timedOut) {
        logger.info({ durationMs }, "Build completed");
        settle(() =>
          resolve({ skipped: false, exitCode: 0, stdout, stderr, durationMs }),
        );
        return;
      }

      settle(() => reject(new BuildFailedError(code, stderr)));
    });
  });
}
