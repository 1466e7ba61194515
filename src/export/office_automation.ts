/**
 * Native office automation channel (Windows only).
 *
 * Word and PowerPoint are driven through COM from PowerShell. Availability
 * of each application is checked once when the channel is opened; exports
 * for a kind whose application is missing report `false` so the caller can
 * fall back to LibreOffice.
 *
 * Each export launches its own Word or PowerPoint instance and quits it when
 * the file is written. `dispose` starts no process; it only makes further
 * exports report `false`.
 */

import path from "path";
import { formatCommand, runCommand, type CommandRunner } from "../conversion/process.js";
import { describeError } from "../shared/errors.js";
import { documentKindOf } from "../document/canonical.js";
import { silentLogger, type StepLogger } from "../shared/logger.js";
import type { DocumentKind } from "../shared/types.js";

export interface AutomationChannel {
  /** Application for this kind was found and started cleanly. */
  isReady(kind: DocumentKind): boolean;
  /** true when the PDF was written; false when unsupported or failed. */
  exportFixedLayout(inputFile: string, outputFile: string): Promise<boolean>;
  dispose(): Promise<void>;
}

/** Channel used off Windows or when automation is disabled. */
export const UNAVAILABLE_CHANNEL: AutomationChannel = {
  isReady: () => false,
  exportFixedLayout: async () => false,
  dispose: async () => {},
};

const WD_FORMAT_PDF = 17;
const PP_SAVE_AS_PDF = 32;

const PROG_IDS: Record<DocumentKind, string> = {
  docx: "Word.Application",
  pptx: "PowerPoint.Application",
};

function psQuote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function availabilityScript(progId: string): string {
  return [
    "$ErrorActionPreference = 'Stop'",
    `$app = New-Object -ComObject ${progId}`,
    "$app.Quit()",
  ].join("; ");
}

function exportScript(kind: DocumentKind, input: string, output: string): string {
  if (kind === "docx") {
    return [
      "$ErrorActionPreference = 'Stop'",
      "$app = New-Object -ComObject Word.Application",
      "$app.Visible = $false",
      "try {",
      `  $doc = $app.Documents.Open(${psQuote(input)}, $false, $true)`,
      `  $doc.SaveAs([ref] ${psQuote(output)}, [ref] ${WD_FORMAT_PDF})`,
      "  $doc.Close($false)",
      "} finally { $app.Quit() }",
    ].join("\n");
  }
  return [
    "$ErrorActionPreference = 'Stop'",
    "$app = New-Object -ComObject PowerPoint.Application",
    "try {",
    `  $pres = $app.Presentations.Open(${psQuote(input)}, $true, $false, $false)`,
    `  $pres.SaveAs(${psQuote(output)}, ${PP_SAVE_AS_PDF})`,
    "  $pres.Close()",
    "} finally { $app.Quit() }",
  ].join("\n");
}

export interface MsOfficeChannelOptions {
  logger?: StepLogger;
  /** Defaults to process.platform. */
  platform?: NodeJS.Platform;
  _runFn?: CommandRunner;
}

const POWERSHELL = "powershell.exe";
const PS_ARGS = ["-NoProfile", "-NonInteractive", "-ExecutionPolicy", "Bypass", "-Command"];

export class MsOfficeChannel implements AutomationChannel {
  private disposed = false;

  private constructor(
    private readonly ready: ReadonlySet<DocumentKind>,
    private readonly run: CommandRunner,
    private readonly logger: StepLogger,
  ) {}

  /** Check Word and PowerPoint. Off Windows returns the unavailable channel. */
  static async open(options: MsOfficeChannelOptions = {}): Promise<AutomationChannel> {
    const platform = options.platform ?? process.platform;
    const logger = options.logger ?? silentLogger;
    if (platform !== "win32") {
      logger.debug("MSOFFICE", `automation unavailable on ${platform}`);
      return UNAVAILABLE_CHANNEL;
    }

    const run = options._runFn ?? runCommand;
    const ready = new Set<DocumentKind>();
    for (const kind of ["docx", "pptx"] as const) {
      try {
        const result = await run(POWERSHELL, [...PS_ARGS, availabilityScript(PROG_IDS[kind])]);
        if (result.code === 0) ready.add(kind);
        else logger.debug("MSOFFICE", `${PROG_IDS[kind]} check failed: ${result.stderr.trim()}`);
      } catch (err) {
        logger.debug("MSOFFICE", `${PROG_IDS[kind]} check failed: ${describeError(err)}`);
      }
    }
    logger.info("MSOFFICE", `Word=${ready.has("docx")} PowerPoint=${ready.has("pptx")}`);
    return new MsOfficeChannel(ready, run, logger);
  }

  isReady(kind: DocumentKind): boolean {
    return !this.disposed && this.ready.has(kind);
  }

  async exportFixedLayout(inputFile: string, outputFile: string): Promise<boolean> {
    const kind = documentKindOf(inputFile);
    if (!kind || !this.isReady(kind)) return false;

    const script = exportScript(kind, path.resolve(inputFile), path.resolve(outputFile));
    const args = [...PS_ARGS, script];
    try {
      const result = await this.run(POWERSHELL, args);
      if (result.code === 0) return true;
      this.logger.warn(
        "MSOFFICE",
        `${PROG_IDS[kind]} export failed (${formatCommand(POWERSHELL, PS_ARGS)}): ${result.stderr.trim()}`,
      );
    } catch (err) {
      this.logger.warn("MSOFFICE", `${PROG_IDS[kind]} export failed: ${describeError(err)}`);
    }
    return false;
  }

  async dispose(): Promise<void> {
    this.disposed = true;
  }
}
