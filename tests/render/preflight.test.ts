import { describe, it, expect, beforeEach, afterEach } from "vitest";
import path from "path";
import os from "os";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { compareTokens, enforceStrict, runPreflight, templatesInUse } from "../../src/render/preflight.js";
import { RenderSession } from "../../src/render/session.js";
import { TemplateResolver } from "../../src/batch/template_resolver.js";
import { DEFAULT_WALK_OPTIONS } from "../../src/document/canonical.js";
import { UNAVAILABLE_CHANNEL } from "../../src/export/office_automation.js";
import { ConfigurationError } from "../../src/shared/errors.js";
import { sha256Bytes } from "../../src/shared/hash.js";
import { createRecordingLogger } from "../../src/shared/logger.js";
import { rowFromRecord } from "../../src/shared/types.js";
import { buildDocx, wp, wr } from "../helpers/ooxml.js";
import { FakeConversionEngine } from "../helpers/fakes.js";

describe("compareTokens", () => {
  it("splits base names into missing and unused columns", () => {
    expect(compareTokens(["B|upper", "A", "A"], ["TEMPLATE", "A", "C"])).toEqual({
      rawTokens: ["A", "B|upper"],
      baseNames: ["A", "B"],
      missingColumns: ["B"],
      unusedColumns: ["C"],
    });
  });

  it("never reports the template column as unused", () => {
    expect(compareTokens([], ["template"]).unusedColumns).toEqual([]);
  });
});

describe("templatesInUse", () => {
  const rows = (...names: string[]) =>
    names.map((TEMPLATE, index) => ({ index, row: rowFromRecord({ TEMPLATE }) }));

  it("lists distinct names, sorted", () => {
    expect(templatesInUse(rows("b.docx", "a.pptx", "b.docx"), "d.docx")).toEqual(["a.pptx", "b.docx"]);
  });

  it("adds the default template when a cell is blank", () => {
    expect(templatesInUse(rows("b.docx", " "), "d.docx")).toEqual(["b.docx", "d.docx"]);
    expect(templatesInUse(rows("b.docx", ""))).toEqual(["b.docx"]);
  });
});

describe("enforceStrict", () => {
  it("aborts when a token has no column", () => {
    const report = { templates: [], ...compareTokens(["A", "B"], ["A"]) };
    expect(() => enforceStrict(report)).toThrow(ConfigurationError);
    expect(() => enforceStrict(report)).toThrow('[STRICT] Missing columns for tokens: ["B"]');
    expect(() => enforceStrict({ templates: [], ...compareTokens(["A"], ["A"]) })).not.toThrow();
  });
});

describe("runPreflight", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), "preflight-test-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("scans each template once and records the ones it cannot read", async () => {
    const letter = buildDocx({ body: wp(wr("{{A}}")) + wp(wr("{{B|upper}}")) });
    writeFileSync(path.join(dir, "letter.docx"), letter);
    const logger = createRecordingLogger();
    const session = await RenderSession.open({
      _conversion: new FakeConversionEngine(),
      _channel: UNAVAILABLE_CHANNEL,
    });

    const report = await runPreflight({
      templateNames: ["letter.docx", "missing.docx"],
      columns: ["TEMPLATE", "A", "C"],
      resolver: new TemplateResolver(dir),
      session,
      walk: DEFAULT_WALK_OPTIONS,
      logger,
    });
    await session.close();

    expect(report.templates).toEqual([
      {
        template: "letter.docx",
        path: path.join(dir, "letter.docx"),
        sha256: sha256Bytes(letter),
        tokens: ["A", "B|upper"],
      },
      {
        template: "missing.docx",
        tokens: [],
        error: `Template file not found: ${path.join(dir, "missing.docx")}`,
      },
    ]);
    expect(report.missingColumns).toEqual(["B"]);
    expect(report.unusedColumns).toEqual(["C"]);

    const messages = logger.lines.filter((l) => l.level !== "debug").map((l) => `${l.level} ${l.msg}`);
    expect(messages).toEqual([
      `warn missing.docx: cannot scan (Template file not found: ${path.join(dir, "missing.docx")})`,
      'info Tokens found in templates (raw): ["A","B|upper"]',
      'info Base token names: ["A","B"]',
      'warn Tokens without matching columns: ["B"]',
      'info Columns not used by any token: ["C"]',
    ]);
  });

  it("scans legacy templates through the conversion cache", async () => {
    writeFileSync(path.join(dir, "memo.odt"), "legacy bytes");
    const engine = new FakeConversionEngine({ docx: buildDocx({ body: wp(wr("{{NAME|trim}}")) }) });
    const session = await RenderSession.open({ _conversion: engine, _channel: UNAVAILABLE_CHANNEL, scratchRoot: dir });

    const report = await runPreflight({
      templateNames: ["memo.odt"],
      columns: ["TEMPLATE", "NAME"],
      resolver: new TemplateResolver(dir),
      session,
      walk: DEFAULT_WALK_OPTIONS,
      logger: createRecordingLogger(),
    });

    expect(report.templates[0].tokens).toEqual(["NAME|trim"]);
    expect(report.missingColumns).toEqual([]);
    expect(session.cache.size).toBe(1);
    await session.close();
  });
});
