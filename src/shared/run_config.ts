/**
 * Batch Configuration
 *
 * Precedence: CLI flags > environment variables > defaults. The merged
 * object is validated once by BatchConfigSchema; everything downstream
 * works with the parsed BatchConfig.
 *
 * Environment:
 *   SOFFICE_BIN      LibreOffice executable (default "soffice")
 *   EXPORT_ENGINE    auto | msoffice | libreoffice
 *   EXPORT_RETRIES   extra LibreOffice attempts after the first
 *   PDF_FILTER       --convert-to target for PDF export (default "pdf")
 *   PDF_FILTER_OPTS  filter options appended as "target:options"
 */

import { z } from "zod";
import { ConfigurationError } from "./errors.js";

export const ENGINE_CHOICES = ["auto", "msoffice", "libreoffice"] as const;
export type EngineChoice = (typeof ENGINE_CHOICES)[number];

export function isEngineChoice(value: string): value is EngineChoice {
  return ENGINE_CHOICES.some((choice) => choice === value);
}

export const DEFAULT_FILENAME_PATTERN = "{index:04d}.pdf";

const numeric = (v: unknown) => (typeof v === "string" && v.trim() !== "" ? Number(v) : v);

export const BatchConfigSchema = z
  .object({
    dataPath: z.string().min(1),
    outDir: z.string().min(1),
    templateDir: z.string().min(1),
    /** XLSX sheet name or 0-based index; ignored for CSV. */
    sheet: z.union([z.number().int().nonnegative(), z.string().min(1)]).default(0),
    pattern: z.string().min(1).default(DEFAULT_FILENAME_PATTERN),
    defaultTemplate: z.string().min(1).optional(),
    engine: z.enum(ENGINE_CHOICES).default("auto"),
    retries: z.preprocess(numeric, z.number().int().nonnegative()).default(2),
    pdfFilter: z.string().min(1).default("pdf"),
    pdfFilterOptions: z.string().default(""),
    sofficeBin: z.string().min(1).default("soffice"),
    strict: z.boolean().default(false),
    dryRun: z.boolean().default(false),
    /** Inclusive 0-based row range. */
    rowFrom: z.number().int().nonnegative().optional(),
    rowTo: z.number().int().nonnegative().optional(),
    scanMasters: z.boolean().default(true),
    scanHeadersFooters: z.boolean().default(true),
    /** Column → filter names applied to its value before substitution. */
    columnFormatters: z.record(z.string(), z.array(z.string())).default({}),
    requiredColumns: z.array(z.string()).default(["TEMPLATE"]),
    verbose: z.boolean().default(false),
  })
  .refine((c) => c.rowFrom === undefined || c.rowTo === undefined || c.rowFrom <= c.rowTo, {
    message: "row range start must not exceed its end",
    path: ["rowTo"],
  });

export type BatchConfig = z.infer<typeof BatchConfigSchema>;
export type BatchConfigInput = z.input<typeof BatchConfigSchema>;

export function parseBatchConfig(input: unknown): BatchConfig {
  const result = BatchConfigSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${detail}`);
  }
  return result.data;
}

/**
 * Parse the export engine from CLI argument and/or environment variable.
 * CLI argument takes priority; defaults to "auto" when neither is given.
 */
export function parseEngineChoice(cliArg?: string, envVar?: string): EngineChoice {
  const raw = (cliArg ?? envVar ?? "auto").trim().toLowerCase();
  if (raw === "") return "auto";
  if (isEngineChoice(raw)) return raw;
  throw new ConfigurationError(
    `Unknown export engine "${raw}" (expected one of: ${ENGINE_CHOICES.join(", ")})`,
  );
}

/** Config fields supplied by the environment; unset variables are omitted. */
export function configFromEnv(env: NodeJS.ProcessEnv): Partial<BatchConfigInput> {
  const out: Partial<BatchConfigInput> = {};
  if (env.SOFFICE_BIN) out.sofficeBin = env.SOFFICE_BIN;
  if (env.EXPORT_ENGINE) out.engine = parseEngineChoice(undefined, env.EXPORT_ENGINE);
  if (env.EXPORT_RETRIES) out.retries = env.EXPORT_RETRIES;
  if (env.PDF_FILTER) out.pdfFilter = env.PDF_FILTER;
  if (env.PDF_FILTER_OPTS !== undefined) out.pdfFilterOptions = env.PDF_FILTER_OPTS;
  return out;
}
