/**
 * LibreOffice conversion engine (`soffice --headless --convert-to`).
 *
 * Argument order matters: --convert-to must precede --outdir, and the
 * input file comes last.
 */

import path from "path";
import { existsSync } from "fs";
import { ConversionError, MissingArtifactError, describeError } from "../shared/errors.js";
import { formatCommand, runCommand, type CommandRunner, type ProcessResult } from "./process.js";

export interface ConversionEngine {
  /**
   * Convert `input` into `outDir` as `targetFormat` (e.g. "pdf", "docx").
   * Resolves with the produced file path; rejects with ConversionError on a
   * non-zero exit and MissingArtifactError when nothing was written.
   */
  convert(input: string, outDir: string, targetFormat: string, filterOptions?: string): Promise<string>;
}

export interface LibreOfficeOptions {
  /** Executable, default "soffice" (or SOFFICE_BIN). */
  binary?: string;
  /** Test override for process spawning. */
  _runFn?: CommandRunner;
}

export const DEFAULT_SOFFICE_BIN = "soffice";

/** Extension LibreOffice writes for a `--convert-to` target such as "pdf:writer_pdf_Export". */
export function producedExtension(targetFormat: string): string {
  const ext = targetFormat.split(":")[0];
  return `.${ext}`;
}

export class LibreOfficeEngine implements ConversionEngine {
  readonly binary: string;
  private readonly run: CommandRunner;

  constructor(options: LibreOfficeOptions = {}) {
    this.binary = options.binary || DEFAULT_SOFFICE_BIN;
    this.run = options._runFn ?? runCommand;
  }

  buildArgs(input: string, outDir: string, targetFormat: string, filterOptions?: string): string[] {
    const conv = filterOptions ? `${targetFormat}:${filterOptions}` : targetFormat;
    return ["--headless", "--convert-to", conv, "--outdir", outDir, input];
  }

  async convert(input: string, outDir: string, targetFormat: string, filterOptions?: string): Promise<string> {
    const args = this.buildArgs(input, outDir, targetFormat, filterOptions);
    const command = formatCommand(this.binary, args);

    let result: ProcessResult;
    try {
      result = await this.run(this.binary, args);
    } catch (err) {
      throw new ConversionError(`Could not start LibreOffice (${this.binary}): ${describeError(err)}`, { command });
    }

    if (result.code !== 0) {
      throw new ConversionError(
        `LibreOffice returned exit code ${result.code ?? "null"}`,
        { command, stdout: result.stdout, stderr: result.stderr },
      );
    }

    const stem = path.basename(input, path.extname(input));
    const produced = path.join(outDir, stem + producedExtension(targetFormat));
    if (!existsSync(produced)) {
      throw new MissingArtifactError(produced, `LibreOffice conversion to ${targetFormat}`);
    }
    return produced;
  }

  /** `soffice --version` first line, or null when the binary cannot run. */
  async version(): Promise<string | null> {
    try {
      const result = await this.run(this.binary, ["--version"]);
      if (result.code !== 0) return null;
      return result.stdout.trim().split(/\r?\n/)[0] || this.binary;
    } catch {
      return null;
    }
  }
}
