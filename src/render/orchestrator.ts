/**
 * Render Orchestrator: data rows to PDFs.
 *
 * Per row: normalize → open → substitute → save to scratch → export.
 * Rows run strictly one after another. Every row failure is isolated into
 * an ERROR result; only bad data shape and strict preflight abort.
 */

import path from "path";
import { existsSync, mkdirSync, statSync } from "fs";
import { mkdtemp, rm, writeFile } from "fs/promises";

import { ConfigurationError, describeError } from "../shared/errors.js";
import { applyFilters } from "../tokens/filters.js";
import { openCanonicalDocument, type WalkOptions } from "../document/canonical.js";
import { buildFastMap, substituteDocument } from "../document/consolidator.js";
import { readRowSource, selectRange, type RowTable } from "../batch/row_source.js";
import { TEMPLATE_COLUMN, TemplateResolver } from "../batch/template_resolver.js";
import { outputFilename } from "../batch/filename_pattern.js";
import { isSkipped, outputSubfolder } from "../batch/skip.js";
import { writeReports, type WrittenReports } from "../batch/report.js";
import { enforceStrict, runPreflight, templatesInUse, type PreflightReport } from "./preflight.js";
import type { RenderSession } from "./session.js";
import type { ExportOutcome } from "../export/selector.js";
import type { BatchConfig } from "../shared/run_config.js";
import type { RenderResult, Row } from "../shared/types.js";

export interface RenderOutcome extends ExportOutcome {
  /** Structural units whose text changed. */
  unitsChanged: number;
}

/** Fill one template from one row and export it to `outputPath`. */
export async function renderDocument(
  session: RenderSession,
  templatePath: string,
  row: Row,
  outputPath: string,
  walk: WalkOptions,
): Promise<RenderOutcome> {
  const canonicalPath = await session.cache.normalize(templatePath);
  const doc = openCanonicalDocument(canonicalPath);
  const unitsChanged = substituteDocument(doc, row, buildFastMap(row), walk);

  const scratch = await mkdtemp(path.join(session.scratchRoot, "office-merge-edit-"));
  try {
    const edited = path.join(scratch, `edited.${doc.kind}`);
    await writeFile(edited, doc.toBuffer());
    const outcome = await session.exporter.export(edited, outputPath);
    return { ...outcome, unitsChanged };
  } finally {
    await rm(scratch, { recursive: true, force: true });
  }
}

/** Run configured filters over selected columns (values stay strings). */
export function applyColumnFormatters(
  row: Row,
  formatters: Readonly<Record<string, readonly string[]>>,
): Row {
  const entries = Object.entries(formatters);
  if (entries.length === 0) return row;
  const out = new Map(row);
  for (const [column, filters] of entries) {
    const value = out.get(column);
    if (value !== undefined) out.set(column, applyFilters(value, filters));
  }
  return out;
}

export interface BatchSummary {
  results: RenderResult[];
  preflight: PreflightReport;
  reports: WrittenReports;
}

export interface BatchDeps {
  session: RenderSession;
  /** Pre-loaded rows; skips reading `config.dataPath`. */
  table?: RowTable;
  /** Render override (tests). */
  _renderFn?: typeof renderDocument;
}

export async function runBatch(config: BatchConfig, deps: BatchDeps): Promise<BatchSummary> {
  const { session } = deps;
  const logger = session.logger;
  const render = deps._renderFn ?? renderDocument;
  const walk: WalkOptions = {
    scanMasters: config.scanMasters,
    scanHeadersFooters: config.scanHeadersFooters,
  };

  // ═══════════════════════════════════════════════════════════════
  // PHASE 1: Rows
  // ═══════════════════════════════════════════════════════════════
  const source = deps.table ?? readRowSource(config.dataPath, config.sheet);
  const table = selectRange(source, config.rowFrom, config.rowTo);

  const missing = config.requiredColumns.filter((c) => !table.columns.includes(c));
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required columns: ${JSON.stringify(missing)}. Available: ${JSON.stringify(table.columns)}`,
    );
  }
  mkdirSync(config.outDir, { recursive: true });

  // ═══════════════════════════════════════════════════════════════
  // PHASE 2: Preflight
  // ═══════════════════════════════════════════════════════════════
  const resolver = new TemplateResolver(config.templateDir, config.defaultTemplate);
  const preflight = await runPreflight({
    templateNames: templatesInUse(table.rows, config.defaultTemplate),
    columns: table.columns,
    resolver,
    session,
    walk,
    logger,
  });
  if (config.strict) enforceStrict(preflight);

  // ═══════════════════════════════════════════════════════════════
  // PHASE 3: Render
  // ═══════════════════════════════════════════════════════════════
  const total = table.rows.length;
  logger.info("BATCH", `Rows to process: ${total}`);
  const results: RenderResult[] = [];

  for (const [position, { index, row: rawRow }] of table.rows.entries()) {
    const tag = `[${position + 1}/${total}]`;

    if (isSkipped(rawRow)) {
      logger.info("BATCH", `${tag} SKIP → row skipped`);
      results.push({ row: index, status: "SKIPPED" });
      continue;
    }

    let template: string;
    let templatePath: string;
    try {
      template = resolver.nameFor(rawRow.get(TEMPLATE_COLUMN));
      templatePath = resolver.resolve(template);
    } catch (err) {
      logger.error("BATCH", `${tag} Template resolve failed: ${describeError(err)}`);
      results.push({ row: index, status: "ERROR", error: describeError(err) });
      continue;
    }

    const row = applyColumnFormatters(rawRow, config.columnFormatters);

    let outputPath: string;
    try {
      const context = new Map<string, string | number>(row);
      context.set("index", index);
      const name = outputFilename(config.pattern, context);
      const subfolder = outputSubfolder(row);
      outputPath = path.join(subfolder ? path.join(config.outDir, subfolder) : config.outDir, name);
    } catch (err) {
      logger.error("BATCH", `${tag} ${describeError(err)}`);
      results.push({ row: index, status: "ERROR", template, error: describeError(err) });
      continue;
    }

    if (config.dryRun) {
      logger.info("BATCH", `${tag} [DRY-RUN] Template=${template} -> ${path.basename(outputPath)}`);
      results.push({ row: index, status: "DRY-RUN", template, output: outputPath });
      continue;
    }

    try {
      logger.info("BATCH", `${tag} ${template} → ${path.basename(outputPath)}`);
      const outcome = await render(session, templatePath, row, outputPath, walk);
      const bytes = existsSync(outputPath) ? statSync(outputPath).size : 0;
      logger.debug("BATCH", `${tag} via ${outcome.engine} (${outcome.unitsChanged} unit(s) changed, ${bytes} bytes)`);
      results.push({ row: index, status: "OK", template, output: outputPath, bytes });
    } catch (err) {
      logger.error("BATCH", `Row ${index} (${template}) → ${describeError(err)}`);
      results.push({ row: index, status: "ERROR", template, output: outputPath, error: describeError(err) });
    }
  }

  // ═══════════════════════════════════════════════════════════════
  // PHASE 4: Reports
  // ═══════════════════════════════════════════════════════════════
  const reports = writeReports(config.outDir, results, logger);
  const counts = countByStatus(results);
  logger.info(
    "BATCH",
    `✓ Done. OK=${counts.OK} ERROR=${counts.ERROR} SKIPPED=${counts.SKIPPED} DRY-RUN=${counts["DRY-RUN"]}`,
  );
  return { results, preflight, reports };
}

export function countByStatus(results: readonly RenderResult[]): Record<RenderResult["status"], number> {
  const counts: Record<RenderResult["status"], number> = { OK: 0, ERROR: 0, SKIPPED: 0, "DRY-RUN": 0 };
  for (const r of results) counts[r.status]++;
  return counts;
}
