/**
 * Preflight: compare the tokens used by every template of the batch with
 * the columns of the data, before any row is rendered.
 *
 * Each distinct template is resolved, normalized and scanned once. A
 * template that cannot be scanned is recorded and left for the row loop
 * to report per row.
 */

import { sha256File } from "../shared/hash.js";
import { ConfigurationError, describeError } from "../shared/errors.js";
import { openCanonicalDocument, type WalkOptions } from "../document/canonical.js";
import { baseTokenNames, discoverTokens } from "../document/discovery.js";
import { TEMPLATE_COLUMN, type TemplateResolver } from "../batch/template_resolver.js";
import type { RenderSession } from "./session.js";
import type { StepLogger } from "../shared/logger.js";
import type { IndexedRow } from "../batch/row_source.js";

export interface TemplateScan {
  template: string;
  path?: string;
  sha256?: string;
  tokens: string[];
  error?: string;
}

export interface PreflightReport {
  templates: TemplateScan[];
  /** Raw token expressions, sorted. */
  rawTokens: string[];
  baseNames: string[];
  /** Tokens with no matching column. */
  missingColumns: string[];
  /** Columns no token refers to (TEMPLATE excluded). */
  unusedColumns: string[];
}

/** Distinct template names referenced by the rows, default included when a cell is blank. */
export function templatesInUse(rows: readonly IndexedRow[], defaultTemplate?: string): string[] {
  const names = new Set<string>();
  let blank = false;
  for (const { row } of rows) {
    const name = (row.get(TEMPLATE_COLUMN) ?? "").trim();
    if (name) names.add(name);
    else blank = true;
  }
  if (defaultTemplate && (blank || names.size === 0)) names.add(defaultTemplate);
  return [...names].sort();
}

/** Pure comparison of discovered tokens against data columns. */
export function compareTokens(
  rawTokens: Iterable<string>,
  columns: Iterable<string>,
): Pick<PreflightReport, "rawTokens" | "baseNames" | "missingColumns" | "unusedColumns"> {
  const raw = [...new Set(rawTokens)].sort();
  const base = baseTokenNames(raw);
  const dataColumns = new Set([...columns].filter((c) => c.toUpperCase() !== TEMPLATE_COLUMN));

  return {
    rawTokens: raw,
    baseNames: [...base].sort(),
    missingColumns: [...base].filter((t) => !dataColumns.has(t)).sort(),
    unusedColumns: [...dataColumns].filter((c) => !base.has(c)).sort(),
  };
}

export interface PreflightInput {
  templateNames: string[];
  columns: string[];
  resolver: TemplateResolver;
  session: RenderSession;
  walk: WalkOptions;
  logger: StepLogger;
}

export async function runPreflight(input: PreflightInput): Promise<PreflightReport> {
  const { resolver, session, walk, logger } = input;
  const templates: TemplateScan[] = [];
  const allTokens = new Set<string>();

  for (const template of input.templateNames) {
    try {
      const templatePath = resolver.resolve(template);
      const sha256 = await sha256File(templatePath);
      const canonical = await session.cache.normalize(templatePath);
      const tokens = [...discoverTokens(openCanonicalDocument(canonical), walk)].sort();
      for (const t of tokens) allTokens.add(t);
      templates.push({ template, path: templatePath, sha256, tokens });
      logger.debug("PREFLIGHT", `${template}: ${tokens.length} token(s), sha256 ${sha256.slice(0, 16)}...`);
    } catch (err) {
      templates.push({ template, tokens: [], error: describeError(err) });
      logger.warn("PREFLIGHT", `${template}: cannot scan (${describeError(err)})`);
    }
  }

  const report = { templates, ...compareTokens(allTokens, input.columns) };

  logger.info("PREFLIGHT", `Tokens found in templates (raw): ${JSON.stringify(report.rawTokens)}`);
  logger.info("PREFLIGHT", `Base token names: ${JSON.stringify(report.baseNames)}`);
  if (report.missingColumns.length > 0) {
    logger.warn("PREFLIGHT", `Tokens without matching columns: ${JSON.stringify(report.missingColumns)}`);
  }
  if (report.unusedColumns.length > 0) {
    logger.info("PREFLIGHT", `Columns not used by any token: ${JSON.stringify(report.unusedColumns)}`);
  }
  return report;
}

/** Strict mode: any token without a column aborts the batch. */
export function enforceStrict(report: PreflightReport): void {
  if (report.missingColumns.length > 0) {
    throw new ConfigurationError(
      `[STRICT] Missing columns for tokens: ${JSON.stringify(report.missingColumns)}`,
    );
  }
}
