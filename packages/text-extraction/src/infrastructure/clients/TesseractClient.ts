import { createLogger, normalizeError } from "@ocr-structure/logging";
import {
  InfrastructureError,
  Result,
  TimeoutError,
  err,
  isErr,
  map,
  ok,
} from "@ocr-structure/types";
import { RecognitionError } from "../../shared/errors/RecognitionError.js";
import {
  ProcessOutput,
  ProcessRunner,
  SpawnProcessRunner,
} from "./ProcessRunner.js";

const logger = createLogger({ service: "text-extraction" }).child({
  module: "TesseractClient",
});

const ENGINE = "tesseract";

export type TesseractClientOptions = {
  binaryPath?: string;
  timeoutMs?: number;
  runner?: ProcessRunner;
};

/**
 * Client for the tesseract command-line program.
 * Wraps process execution with the Result pattern and structured logging.
 */
export class TesseractClient {
  private readonly binaryPath: string;
  private readonly timeoutMs: number;
  private readonly runner: ProcessRunner;

  constructor(options: TesseractClientOptions = {}) {
    this.binaryPath = options.binaryPath ?? "tesseract";
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.runner = options.runner ?? new SpawnProcessRunner();
  }

  /**
   * Argument list for a TSV recognition run. A Buffer is fed through stdin.
   */
  static buildRecognizeArgs(
    image: string | Buffer,
    language: string,
    flags: string[],
  ): string[] {
    const source = typeof image === "string" ? image : "stdin";
    return [source, "stdout", "-l", language, ...flags, "tsv"];
  }

  /**
   * Runs recognition and returns the raw TSV output.
   */
  async recognizeTsv(
    image: string | Buffer,
    language: string,
    flags: string[],
  ): Promise<Result<string, InfrastructureError>> {
    const args = TesseractClient.buildRecognizeArgs(image, language, flags);

    logger.info("Running recognition", {
      language,
      flags: flags.join(" "),
      source: typeof image === "string" ? image : `buffer(${image.length})`,
    });

    const output = await this.execute(
      args,
      "recognize",
      typeof image === "string" ? undefined : image,
    );
    return map(output, ({ stdout }) => stdout);
  }

  /**
   * Lists the language packs installed for the engine.
   */
  async listLanguages(): Promise<Result<string[], InfrastructureError>> {
    const output = await this.execute(["--list-langs"], "list-langs");
    if (isErr(output)) {
      return output;
    }

    // older releases print the list on stderr
    const text = output.value.stdout || output.value.stderr;
    const languages = text
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && !line.startsWith("List of"));

    return ok(languages);
  }

  private async execute(
    args: string[],
    operation: string,
    input?: Buffer,
  ): Promise<Result<ProcessOutput, InfrastructureError>> {
    let output: ProcessOutput;
    try {
      output = await this.runner.run(this.binaryPath, args, {
        input,
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      const { error: normalizedError, message } = normalizeError(error);
      logger.error("Failed to start recognition engine", normalizedError, {
        errorMessage: message,
        binaryPath: this.binaryPath,
        operation,
      });
      return err(
        new RecognitionError(
          ENGINE,
          `Failed to start ${this.binaryPath}: ${message}`,
          undefined,
          { operation },
        ),
      );
    }

    if (output.timedOut) {
      logger.warn("Recognition engine timed out", {
        operation,
        timeoutMs: this.timeoutMs,
      });
      return err(new TimeoutError(this.timeoutMs, `${ENGINE} ${operation}`));
    }

    if (output.exitCode !== 0) {
      const stderr = output.stderr.trim();
      logger.warn("Recognition engine exited with an error", {
        operation,
        exitCode: output.exitCode,
        stderr,
      });
      return err(
        new RecognitionError(
          ENGINE,
          stderr || `${ENGINE} ${operation} exited with code ${output.exitCode}`,
          output.exitCode ?? undefined,
          { operation },
        ),
      );
    }

    return ok(output);
  }
}
