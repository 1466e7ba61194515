/**
 * Template Resolver: maps a row's TEMPLATE cell to a file in the template
 * directory. Names are bare filenames; an empty cell falls back to the
 * configured default template.
 */

import path from "path";
import { existsSync } from "fs";
import { ConfigurationError, ResolutionError } from "../shared/errors.js";

export const TEMPLATE_COLUMN = "TEMPLATE";

export class TemplateResolver {
  constructor(
    readonly templateDir: string,
    readonly defaultTemplate?: string,
  ) {}

  /** Template filename for a cell value, after the default fallback. */
  nameFor(cell: string | undefined): string {
    const name = (cell ?? "").trim();
    if (name) return name;
    if (this.defaultTemplate) return this.defaultTemplate;
    throw new ConfigurationError(
      `Column '${TEMPLATE_COLUMN}' is empty and no default template is configured.`,
    );
  }

  resolve(cell: string | undefined): string {
    const name = this.nameFor(cell);
    if (name.includes("/") || name.includes("\\")) {
      throw new ConfigurationError(
        `'${TEMPLATE_COLUMN}' must be a filename only (no directories). Received: ${JSON.stringify(name)}`,
      );
    }

    const root = path.resolve(this.templateDir);
    const resolved = path.resolve(root, name);
    const relative = path.relative(root, resolved);
    if (relative === "" || relative.startsWith("..") || path.isAbsolute(relative)) {
      throw new ConfigurationError(`Template ${JSON.stringify(name)} escapes the template directory`);
    }

    if (!existsSync(resolved)) {
      throw new ResolutionError(`Template file not found: ${resolved}`);
    }
    return resolved;
  }
}
