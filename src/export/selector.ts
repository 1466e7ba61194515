/**
 * Export Engine Selector
 *
 * Drives one edited document to PDF as a small state machine:
 *
 *   try-primary ──ok──────────────────────────► succeeded(msoffice)
 *        │ unavailable / failed
 *        ▼
 *   try-conversion(1) ──ok──► succeeded(libreoffice)
 *        │ failed, attempts left
 *        ▼
 *   try-conversion(n) ... ──last failure──► failed
 *
 * "libreoffice" starts at try-conversion(1). LibreOffice is the backstop
 * for every choice. Every engine writes into a private scratch directory;
 * the PDF is verified there and only then moved to the output path.
 */

import path from "path";
import os from "os";
import { existsSync, statSync } from "fs";
import { copyFile, mkdir, mkdtemp, rename, rm, unlink } from "fs/promises";
import { ConfigurationError, MissingArtifactError, describeError } from "../shared/errors.js";
import { silentLogger, type StepLogger } from "../shared/logger.js";
import { documentKindOf } from "../document/canonical.js";
import type { EngineChoice } from "../shared/run_config.js";
import type { ConversionEngine } from "../conversion/soffice.js";
import type { AutomationChannel } from "./office_automation.js";

export type ExportEngine = "msoffice" | "libreoffice";

export type ExportState =
  | { kind: "try-primary" }
  | { kind: "try-conversion"; attempt: number }
  | { kind: "succeeded"; engine: ExportEngine; attempts: number }
  | { kind: "failed"; error: unknown; attempts: number };

export type ExportOutcome = { engine: ExportEngine; attempts: number };

export const DEFAULT_PDF_FILTER = "pdf";

export interface ExportSettings {
  engine: EngineChoice;
  /** Extra LibreOffice attempts after the first. */
  retries: number;
  /** `--convert-to` target, e.g. "pdf:writer_pdf_Export". */
  pdfFilter: string;
  /** Appended to the filter as `target:options`; empty string disables. */
  pdfFilterOptions: string;
}

export const DEFAULT_EXPORT_SETTINGS: ExportSettings = {
  engine: "auto",
  retries: 2,
  pdfFilter: DEFAULT_PDF_FILTER,
  pdfFilterOptions: "",
};

export interface ExportContext {
  input: string;
  outputPath: string;
  scratch: string;
  choice: EngineChoice;
}

export interface ExportSelectorOptions {
  settings?: Partial<ExportSettings>;
  logger?: StepLogger;
  scratchRoot?: string;
}

export class ExportSelector {
  readonly settings: ExportSettings;
  private readonly logger: StepLogger;
  private readonly scratchRoot: string;

  constructor(
    private readonly conversion: ConversionEngine,
    private readonly channel: AutomationChannel,
    options: ExportSelectorOptions = {},
  ) {
    this.settings = { ...DEFAULT_EXPORT_SETTINGS, ...options.settings };
    if (!Number.isInteger(this.settings.retries) || this.settings.retries < 0) {
      throw new ConfigurationError(`retries must be a non-negative integer, got ${this.settings.retries}`);
    }
    this.logger = options.logger ?? silentLogger;
    this.scratchRoot = options.scratchRoot ?? os.tmpdir();
  }

  initialState(choice: EngineChoice): ExportState {
    return choice === "libreoffice" ? { kind: "try-conversion", attempt: 1 } : { kind: "try-primary" };
  }

  /** Export `input` (a DOCX/PPTX) to `outputPath`; throws the last LibreOffice failure. */
  async export(input: string, outputPath: string, choice: EngineChoice = this.settings.engine): Promise<ExportOutcome> {
    const scratch = await mkdtemp(path.join(this.scratchRoot, "office-merge-pdf-"));
    const ctx: ExportContext = { input, outputPath, scratch, choice };
    try {
      let state = this.initialState(choice);
      while (state.kind === "try-primary" || state.kind === "try-conversion") {
        state = await this.step(state, ctx);
      }
      if (state.kind === "failed") throw state.error;
      return { engine: state.engine, attempts: state.attempts };
    } finally {
      await rm(scratch, { recursive: true, force: true });
    }
  }

  async step(state: ExportState, ctx: ExportContext): Promise<ExportState> {
    switch (state.kind) {
      case "try-primary":
        return this.tryPrimary(ctx);
      case "try-conversion":
        return this.tryConversion(state.attempt, ctx);
      default:
        return state;
    }
  }

  private async tryPrimary(ctx: ExportContext): Promise<ExportState> {
    const kind = documentKindOf(ctx.input);
    const fallback: ExportState = { kind: "try-conversion", attempt: 1 };

    if (!kind || !this.channel.isReady(kind)) {
      const msg = `native automation unavailable for ${path.extname(ctx.input) || "(no extension)"}; using LibreOffice`;
      if (ctx.choice === "msoffice") this.logger.warn("EXPORT", msg);
      else this.logger.debug("EXPORT", msg);
      return fallback;
    }

    const scratchPdf = path.join(ctx.scratch, "msoffice.pdf");
    try {
      if (await this.channel.exportFixedLayout(ctx.input, scratchPdf)) {
        await promote(scratchPdf, ctx.outputPath, "Native export");
        return { kind: "succeeded", engine: "msoffice", attempts: 0 };
      }
      this.logger.warn("EXPORT", "native export reported failure; using LibreOffice");
    } catch (err) {
      this.logger.warn("EXPORT", `native export failed: ${describeError(err)}; using LibreOffice`);
    }
    return fallback;
  }

  private async tryConversion(attempt: number, ctx: ExportContext): Promise<ExportState> {
    const { pdfFilter, pdfFilterOptions, retries } = this.settings;
    try {
      const produced = await this.conversion.convert(
        ctx.input,
        ctx.scratch,
        pdfFilter,
        pdfFilterOptions || undefined,
      );
      await promote(produced, ctx.outputPath, "LibreOffice export");
      return { kind: "succeeded", engine: "libreoffice", attempts: attempt };
    } catch (error) {
      if (attempt > retries) return { kind: "failed", error, attempts: attempt };
      this.logger.warn("EXPORT", `PDF export attempt ${attempt} failed: ${describeError(error)}`);
      return { kind: "try-conversion", attempt: attempt + 1 };
    }
  }
}

/** Verify a scratch PDF and move it to its final path. */
async function promote(produced: string, outputPath: string, what: string): Promise<void> {
  if (!existsSync(produced) || statSync(produced).size === 0) {
    throw new MissingArtifactError(produced, what);
  }
  await mkdir(path.dirname(outputPath), { recursive: true });
  try {
    await rename(produced, outputPath);
  } catch (err) {
    if (!(err instanceof Error && "code" in err && err.code === "EXDEV")) throw err;
    await copyFile(produced, outputPath);
    await unlink(produced);
  }
}
