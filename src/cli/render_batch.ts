#!/usr/bin/env node
/**
 * CLI: office-merge
 *
 * Usage: npm run merge:render -- <data.xlsx|csv> <outdir> <templates> [options]
 *
 * Fills {{TOKEN}} placeholders in DOCX/PPTX (and legacy DOC/PPT/ODT/ODP/RTF)
 * templates, one PDF per data row, plus _report.json/_report.csv.
 */

import "dotenv/config";
import path from "path";
import { readFileSync, realpathSync } from "fs";
import { fileURLToPath } from "url";
import { z } from "zod";

import { ConfigurationError, describeError } from "../shared/errors.js";
import { createStepLogger, type StepLogger } from "../shared/logger.js";
import {
  configFromEnv,
  parseBatchConfig,
  parseEngineChoice,
  type BatchConfig,
  type BatchConfigInput,
} from "../shared/run_config.js";
import { parseSheetArg } from "../batch/row_source.js";
import { LibreOfficeEngine } from "../conversion/soffice.js";
import { MsOfficeChannel } from "../export/office_automation.js";
import { withRenderSession } from "../render/session.js";
import { countByStatus, runBatch } from "../render/orchestrator.js";

export const USAGE = `Usage: office-merge [data] [outdir] [templates] [options]

Positional (defaults: data.xlsx output templates):
  data                       Input XLSX/CSV
  outdir                     Output directory
  templates                  Templates directory

Options:
  --sheet <name|index>       Excel sheet (ignored for CSV)
  --pattern <pattern>        Output filename pattern, e.g. "{index:04d}_{NAME}.pdf"
  --engine <engine>          auto | msoffice | libreoffice
  --retries <n>              Extra LibreOffice export attempts
  --pdf-filter <target>      LibreOffice --convert-to target (default "pdf")
  --pdf-filter-opts <opts>   LibreOffice PDF filter options
  --soffice <path>           LibreOffice executable
  --from <n> / --to <n>      Inclusive 0-based row range
  --default-template <file>  Template for rows with an empty TEMPLATE cell
  --format <COL=f1|f2>       Apply filters to a column (repeatable)
  --strict                   Abort if a token has no matching column
  --dry-run                  Plan outputs without generating PDFs
  --no-masters               PPTX: skip slide masters and layouts
  --no-headers-footers       DOCX: skip headers and footers
  --verbose                  Debug logging
  --check                    Check LibreOffice / MS Office and exit
  --version                  Print version and exit`;

export interface CliArgs {
  positional: string[];
  flags: Partial<BatchConfigInput>;
  engineArg?: string;
  check: boolean;
  version: boolean;
  help: boolean;
}

const VALUE_FLAGS = new Set([
  "--sheet",
  "--pattern",
  "--engine",
  "--retries",
  "--pdf-filter",
  "--pdf-filter-opts",
  "--soffice",
  "--from",
  "--to",
  "--default-template",
  "--format",
]);

function integerArg(flag: string, value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigurationError(`${flag} expects a non-negative integer, got ${JSON.stringify(value)}`);
  }
  return Number(value.trim());
}

/** "Importe=euros" or "Fecha=trim|dmy" → [column, filters]. */
export function parseFormatArg(value: string): [string, string[]] {
  const eq = value.indexOf("=");
  const column = eq > 0 ? value.slice(0, eq).trim() : "";
  const filters = eq > 0 ? value.slice(eq + 1).split("|").map((f) => f.trim()).filter(Boolean) : [];
  if (!column || filters.length === 0) {
    throw new ConfigurationError(`--format expects COLUMN=filter[|filter...], got ${JSON.stringify(value)}`);
  }
  return [column, filters];
}

export function parseCliArgs(argv: string[]): CliArgs {
  const out: CliArgs = { positional: [], flags: {}, check: false, version: false, help: false };
  const formatters: Record<string, string[]> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith("--")) {
      out.positional.push(arg);
      continue;
    }

    if (VALUE_FLAGS.has(arg)) {
      if (i + 1 >= argv.length) throw new ConfigurationError(`${arg} requires a value`);
      const value = argv[++i];
      switch (arg) {
        case "--sheet": out.flags.sheet = parseSheetArg(value); break;
        case "--pattern": out.flags.pattern = value; break;
        case "--engine": out.engineArg = value; break;
        case "--retries": out.flags.retries = integerArg(arg, value); break;
        case "--pdf-filter": out.flags.pdfFilter = value; break;
        case "--pdf-filter-opts": out.flags.pdfFilterOptions = value; break;
        case "--soffice": out.flags.sofficeBin = value; break;
        case "--from": out.flags.rowFrom = integerArg(arg, value); break;
        case "--to": out.flags.rowTo = integerArg(arg, value); break;
        case "--default-template": out.flags.defaultTemplate = value; break;
        case "--format": {
          const [column, filters] = parseFormatArg(value);
          formatters[column] = filters;
          break;
        }
      }
      continue;
    }

    switch (arg) {
      case "--strict": out.flags.strict = true; break;
      case "--dry-run": out.flags.dryRun = true; break;
      case "--no-masters": out.flags.scanMasters = false; break;
      case "--no-headers-footers": out.flags.scanHeadersFooters = false; break;
      case "--verbose": out.flags.verbose = true; break;
      case "--check": out.check = true; break;
      case "--version": out.version = true; break;
      case "--help": out.help = true; break;
      default:
        throw new ConfigurationError(`Unknown option: ${arg}`);
    }
  }

  if (Object.keys(formatters).length > 0) out.flags.columnFormatters = formatters;
  if (out.positional.length > 3) {
    throw new ConfigurationError(`Too many positional arguments: ${out.positional.join(" ")}`);
  }
  return out;
}

/** CLI flags > environment > defaults. */
export function buildConfig(cli: CliArgs, env: NodeJS.ProcessEnv): BatchConfig {
  const [dataPath = "data.xlsx", outDir = "output", templateDir = "templates"] = cli.positional;
  return parseBatchConfig({
    dataPath,
    outDir,
    templateDir,
    ...configFromEnv(env),
    ...cli.flags,
    engine: parseEngineChoice(cli.engineArg, env.EXPORT_ENGINE),
  });
}

const PackageSchema = z.object({ version: z.string() });

export function readVersion(): string {
  const pkgPath = fileURLToPath(new URL("../../package.json", import.meta.url));
  return PackageSchema.parse(JSON.parse(readFileSync(pkgPath, "utf-8"))).version;
}

async function runCheck(config: BatchConfig, logger: StepLogger): Promise<void> {
  const soffice = new LibreOfficeEngine({ binary: config.sofficeBin });
  const version = await soffice.version();
  logger.info("CHECK", `LibreOffice: ${version ? "OK" : "NOT FOUND"} (${version ?? soffice.binary})`);

  const channel = await MsOfficeChannel.open({ logger });
  try {
    logger.info(
      "CHECK",
      `Windows: ${process.platform === "win32"} | Word: ${channel.isReady("docx")} | PowerPoint: ${channel.isReady("pptx")}`,
    );
  } finally {
    await channel.dispose();
  }
}

async function main(): Promise<void> {
  const cli = parseCliArgs(process.argv.slice(2));
  if (cli.help) {
    console.log(USAGE);
    return;
  }
  if (cli.version) {
    console.log(readVersion());
    return;
  }

  const config = buildConfig(cli, process.env);
  const logger = createStepLogger({ verbose: config.verbose });

  if (cli.check) {
    await runCheck(config, logger);
    return;
  }

  console.log("╔══════════════════════════════════════════════════════════════╗");
  console.log("║  office-merge · templates × rows → PDF                       ║");
  console.log("╚══════════════════════════════════════════════════════════════╝");
  console.log();

  logger.info("CONFIG", `Data: ${path.resolve(config.dataPath)}`);
  logger.info("CONFIG", `Templates: ${path.resolve(config.templateDir)}`);
  logger.info("CONFIG", `Output: ${path.resolve(config.outDir)}`);
  logger.info("CONFIG", `Engine: ${config.engine} (retries=${config.retries})${config.dryRun ? " [DRY-RUN]" : ""}`);

  const summary = await withRenderSession(
    {
      logger,
      sofficeBin: config.sofficeBin,
      export: {
        engine: config.engine,
        retries: config.retries,
        pdfFilter: config.pdfFilter,
        pdfFilterOptions: config.pdfFilterOptions,
      },
    },
    (session) => runBatch(config, { session }),
  );

  const counts = countByStatus(summary.results);
  console.log();
  console.log(`✓ ${counts.OK} PDF(s) written, ${counts.ERROR} error(s), ${counts.SKIPPED} skipped`);
}

// ── CLI entry point ──────────────────────────────────────────────────
if (
  process.argv[1] &&
  realpathSync(path.resolve(process.argv[1])) === realpathSync(fileURLToPath(import.meta.url))
) {
  main().catch((err: unknown) => {
    console.error(`\n✗ Batch failed: ${describeError(err)}`);
    process.exit(1);
  });
}
