/**
 * Format Normalizer
 *
 * Converts legacy templates (.doc, .odt, .rtf, .ppt, .odp) into the
 * canonical editable formats once per process. DOCX/PPTX pass through
 * untouched and uncached.
 *
 * The cache stores the in-flight promise, so concurrent requests for the
 * same source share one conversion. A rejected conversion is evicted and
 * may be retried by a later call.
 */

import path from "path";
import os from "os";
import { existsSync, realpathSync } from "fs";
import { mkdtemp, rm } from "fs/promises";
import { MissingArtifactError, UnsupportedFormatError } from "../shared/errors.js";
import { silentLogger, type StepLogger } from "../shared/logger.js";
import type { ConversionEngine } from "./soffice.js";

export const CANONICAL_EXTENSIONS: ReadonlySet<string> = new Set([".docx", ".pptx"]);

/** Legacy extension → canonical extension. */
export const LEGACY_TARGETS: Readonly<Record<string, ".docx" | ".pptx">> = {
  ".doc": ".docx",
  ".odt": ".docx",
  ".rtf": ".docx",
  ".ppt": ".pptx",
  ".odp": ".pptx",
};

export function isSupportedTemplate(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return CANONICAL_EXTENSIONS.has(ext) || ext in LEGACY_TARGETS;
}

/** Stable key: real path when the file exists, else the resolved absolute path. */
export function cacheKey(sourcePath: string): string {
  const resolved = path.resolve(sourcePath);
  try {
    return realpathSync(resolved);
  } catch {
    return resolved;
  }
}

export interface ConversionCacheOptions {
  logger?: StepLogger;
  /** Parent directory for scratch folders (default: OS temp dir). */
  scratchRoot?: string;
}

export class ConversionCache {
  private readonly entries = new Map<string, Promise<string>>();
  private readonly scratchDirs: string[] = [];
  private readonly logger: StepLogger;
  private readonly scratchRoot: string;

  constructor(
    private readonly engine: ConversionEngine,
    options: ConversionCacheOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
    this.scratchRoot = options.scratchRoot ?? os.tmpdir();
  }

  get size(): number {
    return this.entries.size;
  }

  async normalize(sourcePath: string): Promise<string> {
    const ext = path.extname(sourcePath).toLowerCase();
    if (CANONICAL_EXTENSIONS.has(ext)) return sourcePath;

    const target: ".docx" | ".pptx" | undefined = LEGACY_TARGETS[ext];
    if (!target) throw new UnsupportedFormatError(ext);

    const key = cacheKey(sourcePath);
    const cached = this.entries.get(key);
    if (cached) {
      this.logger.debug("NORMALIZE", `cache hit: ${path.basename(sourcePath)}`);
      return cached;
    }

    const pending = this.convert(key, target);
    this.entries.set(key, pending);
    try {
      return await pending;
    } catch (err) {
      if (this.entries.get(key) === pending) this.entries.delete(key);
      throw err;
    }
  }

  private async convert(source: string, target: ".docx" | ".pptx"): Promise<string> {
    const scratch = await mkdtemp(path.join(this.scratchRoot, "office-merge-conv-"));
    this.scratchDirs.push(scratch);
    this.logger.info("NORMALIZE", `${path.basename(source)} → ${target.slice(1)}`);

    const produced = await this.engine.convert(source, scratch, target.slice(1));
    const expected = path.join(scratch, path.basename(source, path.extname(source)) + target);
    const converted = existsSync(expected) ? expected : produced;
    if (!existsSync(converted)) {
      throw new MissingArtifactError(expected, `Conversion of ${path.basename(source)} to ${target}`);
    }
    return converted;
  }

  /** Drop every entry and delete the scratch folders. */
  async clear(): Promise<void> {
    this.entries.clear();
    const dirs = this.scratchDirs.splice(0);
    await Promise.all(dirs.map((dir) => rm(dir, { recursive: true, force: true })));
  }
}
