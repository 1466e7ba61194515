import { describe, it, expect, beforeEach, afterEach } from "vitest";
import path from "path";
import os from "os";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { LibreOfficeEngine, producedExtension } from "../../src/conversion/soffice.js";
import type { CommandRunner, ProcessResult } from "../../src/conversion/process.js";
import { formatCommand } from "../../src/conversion/process.js";
import { ConversionError, MissingArtifactError } from "../../src/shared/errors.js";

interface Call {
  command: string;
  args: string[];
}

function fakeRunner(
  result: ProcessResult | Error,
  onRun?: (args: string[]) => void,
): CommandRunner & { calls: Call[] } {
  const calls: Call[] = [];
  const run: CommandRunner = async (command, args) => {
    calls.push({ command, args });
    if (result instanceof Error) throw result;
    onRun?.(args);
    return result;
  };
  return Object.assign(run, { calls });
}

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(path.join(os.tmpdir(), "soffice-test-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("producedExtension", () => {
  it("takes the format before any filter name", () => {
    expect(producedExtension("pdf")).toBe(".pdf");
    expect(producedExtension("pdf:writer_pdf_Export")).toBe(".pdf");
    expect(producedExtension("docx")).toBe(".docx");
  });
});

describe("LibreOfficeEngine", () => {
  it("puts --convert-to before --outdir and the input last", () => {
    const engine = new LibreOfficeEngine();
    expect(engine.binary).toBe("soffice");
    expect(engine.buildArgs("in/a.docx", "out", "pdf")).toEqual([
      "--headless", "--convert-to", "pdf", "--outdir", "out", "in/a.docx",
    ]);
    expect(engine.buildArgs("in/a.docx", "out", "pdf", "writer_pdf_Export")).toEqual([
      "--headless", "--convert-to", "pdf:writer_pdf_Export", "--outdir", "out", "in/a.docx",
    ]);
  });

  it("returns the produced file", async () => {
    const input = path.join(dir, "edited.docx");
    const runner = fakeRunner({ code: 0, stdout: "", stderr: "" }, () => {
      writeFileSync(path.join(dir, "edited.pdf"), "%PDF-1.7");
    });
    const engine = new LibreOfficeEngine({ binary: "/opt/lo/soffice", _runFn: runner });

    expect(await engine.convert(input, dir, "pdf")).toBe(path.join(dir, "edited.pdf"));
    expect(runner.calls).toEqual([
      { command: "/opt/lo/soffice", args: ["--headless", "--convert-to", "pdf", "--outdir", dir, input] },
    ]);
  });

  it("attaches the command and output streams to a non-zero exit", async () => {
    const input = path.join(dir, "edited.docx");
    const runner = fakeRunner({ code: 77, stdout: "partial", stderr: "Error: source file could not be loaded" });
    const engine = new LibreOfficeEngine({ _runFn: runner });

    const err = await engine.convert(input, dir, "pdf").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConversionError);
    if (!(err instanceof ConversionError)) return;
    expect(err.message).toBe("LibreOffice returned exit code 77");
    expect(err.diagnostics).toEqual({
      command: formatCommand("soffice", ["--headless", "--convert-to", "pdf", "--outdir", dir, input]),
      stdout: "partial",
      stderr: "Error: source file could not be loaded",
    });
  });

  it("reports a binary that cannot be started", async () => {
    const engine = new LibreOfficeEngine({ _runFn: fakeRunner(new Error("spawn soffice ENOENT")) });
    await expect(engine.convert(path.join(dir, "a.docx"), dir, "pdf")).rejects.toThrow(
      "Could not start LibreOffice (soffice): spawn soffice ENOENT",
    );
  });

  it("reports a successful exit that wrote nothing", async () => {
    const engine = new LibreOfficeEngine({ _runFn: fakeRunner({ code: 0, stdout: "", stderr: "" }) });
    const err = await engine.convert(path.join(dir, "a.docx"), dir, "pdf").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(MissingArtifactError);
    if (!(err instanceof MissingArtifactError)) return;
    expect(err.expectedPath).toBe(path.join(dir, "a.pdf"));
  });

  it("reads the version banner", async () => {
    const ok = new LibreOfficeEngine({
      _runFn: fakeRunner({ code: 0, stdout: "LibreOffice 7.6.4.1 60(Build:1)\nextra\n", stderr: "" }),
    });
    const missing = new LibreOfficeEngine({ _runFn: fakeRunner(new Error("ENOENT")) });

    expect(await ok.version()).toBe("LibreOffice 7.6.4.1 60(Build:1)");
    expect(await missing.version()).toBeNull();
  });
});

describe("formatCommand", () => {
  it("quotes arguments with whitespace", () => {
    expect(formatCommand("soffice", ["--outdir", "/tmp/my dir", "a.docx"])).toBe(
      'soffice --outdir "/tmp/my dir" a.docx',
    );
  });
});
