import { spawn } from "node:child_process";
import { createLogger } from "@ocr-structure/logging";

const logger = createLogger({ service: "text-extraction" }).child({
  module: "ProcessRunner",
});

export type ProcessOutput = {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  timedOut: boolean;
};

export type RunOptions = {
  input?: Buffer;
  timeoutMs: number;
};

/**
 * Runs an external program to completion. Rejects only when the program
 * cannot be started; a non-zero exit or a timeout is reported in the output.
 */
export interface ProcessRunner {
  run(
    command: string,
    args: string[],
    options: RunOptions,
  ): Promise<ProcessOutput>;
}

export class SpawnProcessRunner implements ProcessRunner {
  run(
    command: string,
    args: string[],
    options: RunOptions,
  ): Promise<ProcessOutput> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { stdio: ["pipe", "pipe", "pipe"] });
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let timedOut = false;

      const timer = setTimeout(() => {
        timedOut = true;
        child.kill("SIGKILL");
      }, options.timeoutMs);

      child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

      // the program may exit before reading all of stdin
      child.stdin.on("error", (error) => {
        logger.debug("stdin closed early", {
          command,
          errorMessage: error.message,
        });
      });

      child.on("error", (error) => {
        clearTimeout(timer);
        reject(error);
      });

      child.on("close", (exitCode) => {
        clearTimeout(timer);
        resolve({
          stdout: Buffer.concat(stdout).toString("utf8"),
          stderr: Buffer.concat(stderr).toString("utf8"),
          exitCode,
          timedOut,
        });
      });

      child.stdin.end(options.input);
    });
  }
}
