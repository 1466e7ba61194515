import { describe, it, expect } from "vitest";
import {
  configFromEnv,
  parseBatchConfig,
  parseEngineChoice,
  DEFAULT_FILENAME_PATTERN,
} from "../../src/shared/run_config.js";
import { ConfigurationError } from "../../src/shared/errors.js";

const base = { dataPath: "data.csv", outDir: "out", templateDir: "templates" };

describe("parseEngineChoice", () => {
  it("prefers the CLI value over the environment", () => {
    expect(parseEngineChoice("libreoffice", "msoffice")).toBe("libreoffice");
    expect(parseEngineChoice(undefined, "MSOffice")).toBe("msoffice");
    expect(parseEngineChoice()).toBe("auto");
    expect(parseEngineChoice(" ")).toBe("auto");
  });

  it("rejects unknown engines", () => {
    expect(() => parseEngineChoice("word")).toThrow(
      'Unknown export engine "word" (expected one of: auto, msoffice, libreoffice)',
    );
  });
});

describe("parseBatchConfig", () => {
  it("fills defaults", () => {
    expect(parseBatchConfig(base)).toEqual({
      ...base,
      sheet: 0,
      pattern: DEFAULT_FILENAME_PATTERN,
      engine: "auto",
      retries: 2,
      pdfFilter: "pdf",
      pdfFilterOptions: "",
      sofficeBin: "soffice",
      strict: false,
      dryRun: false,
      scanMasters: true,
      scanHeadersFooters: true,
      columnFormatters: {},
      requiredColumns: ["TEMPLATE"],
      verbose: false,
    });
  });

  it("coerces numeric retry strings", () => {
    expect(parseBatchConfig({ ...base, retries: "0" }).retries).toBe(0);
  });

  it("reports every invalid field", () => {
    expect(() => parseBatchConfig({ ...base, retries: -1 })).toThrow(ConfigurationError);
    expect(() => parseBatchConfig({ ...base, rowFrom: 5, rowTo: 2 })).toThrow(
      "Invalid configuration: rowTo: row range start must not exceed its end",
    );
    expect(() => parseBatchConfig({ ...base, outDir: "" })).toThrow(/^Invalid configuration: outDir: /);
  });
});

describe("configFromEnv", () => {
  it("reads only the variables that are set", () => {
    expect(configFromEnv({})).toEqual({});
    expect(
      configFromEnv({
        SOFFICE_BIN: "/opt/lo/program/soffice",
        EXPORT_ENGINE: "libreoffice",
        EXPORT_RETRIES: "5",
        PDF_FILTER: "pdf:writer_pdf_Export",
        PDF_FILTER_OPTS: "",
      }),
    ).toEqual({
      sofficeBin: "/opt/lo/program/soffice",
      engine: "libreoffice",
      retries: "5",
      pdfFilter: "pdf:writer_pdf_Export",
      pdfFilterOptions: "",
    });
  });
});
