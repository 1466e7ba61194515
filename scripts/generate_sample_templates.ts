/**
 * Generate sample templates and a matching data file.
 *
 * Writes samples/templates/{carta.docx,resumen.pptx} and samples/data.csv,
 * ready for:
 *
 *   npm run merge:render -- samples/data.csv samples/output samples/templates
 *
 * The DOCX is built with the `docx` library (header, body paragraphs with
 * split runs, a table); the PPTX with the OOXML builders in ./ooxml_builders.ts.
 */

import {
  Document,
  Footer,
  Header,
  Packer,
  Paragraph,
  Table,
  TableCell,
  TableRow,
  TextRun,
  WidthType,
} from "docx";
import { mkdirSync, writeFileSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import * as XLSX from "xlsx";
import { ap, ar, buildPptx, sp, tableFrame } from "./ooxml_builders.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const SAMPLES_DIR = path.resolve(__dirname, "..", "samples");

function textPara(text: string): Paragraph {
  return new Paragraph({ children: [new TextRun(text)] });
}

function cell(text: string): TableCell {
  return new TableCell({ children: [textPara(text)], width: { size: 50, type: WidthType.PERCENTAGE } });
}

export async function buildSampleDocx(): Promise<Buffer> {
  const doc = new Document({
    sections: [
      {
        headers: { default: new Header({ children: [textPara("{{EMPRESA|upper}}")] }) },
        footers: { default: new Footer({ children: [textPara("Ref. {{REF?:sin referencia}}")] }) },
        children: [
          new Paragraph({
            children: [
              new TextRun({ text: "Estimado/a ", size: 24 }),
              // Split on purpose: the token spans three runs.
              new TextRun({ text: "{{", bold: true, size: 24 }),
              new TextRun({ text: "NOMBRE|trim", bold: true, size: 24 }),
              new TextRun({ text: "}}:", bold: true, size: 24 }),
            ],
          }),
          textPara("Le confirmamos el pago de {{IMPORTE|euros}} con fecha {{FECHA|dmy}}."),
          new Table({
            width: { size: 100, type: WidthType.PERCENTAGE },
            rows: [
              new TableRow({ children: [cell("Concepto"), cell("Importe")] }),
              new TableRow({ children: [cell("{{CONCEPTO}}"), cell("{{IMPORTE|euros}}")] }),
            ],
          }),
          textPara("Atentamente,"),
        ],
      },
    ],
  });
  return Packer.toBuffer(doc);
}

export function buildSamplePptx(): Buffer {
  return buildPptx({
    master: sp(ap(ar("{{EMPRESA}}", 'sz="1000"'))),
    slides: [
      {
        shapes:
          sp(ap(ar("Resumen de ", 'sz="3200" b="1"'), ar("{{NOMBRE}}", 'sz="3200" b="1"'))) +
          tableFrame([
            [ap(ar("Concepto")), ap(ar("Importe"))],
            [ap(ar("{{CONCEPTO}}")), ap(ar("{{IMPORTE|euros}}"))],
          ]),
        notes: ap(ar("Fecha de pago: {{FECHA|dmy}}")),
      },
    ],
  });
}

const SAMPLE_ROWS = [
  ["TEMPLATE", "NOMBRE", "EMPRESA", "IMPORTE", "FECHA", "CONCEPTO", "REF", "SKIP", "OUTPUT"],
  ["carta.docx", "Ana Pérez", "Acme Ibérica", "1234,5", "2024-03-07", "Consultoría", "A-001", "", "cartas"],
  ["resumen.pptx", "Bruno Díaz", "Acme Ibérica", "980", "2024-03-09", "Formación", "", "", "resumenes"],
  ["carta.docx", "Carla Gil", "Acme Ibérica", "15000", "2024-04-01", "Licencias", "", "sí", ""],
  ["", "Dario Ruiz", "Acme Ibérica", "42,75", "2024-04-15", "Soporte", "B-17", "", ""],
];

export function buildSampleCsv(): string {
  return `${XLSX.utils.sheet_to_csv(XLSX.utils.aoa_to_sheet(SAMPLE_ROWS))}\n`;
}

async function main(): Promise<void> {
  const templatesDir = path.join(SAMPLES_DIR, "templates");
  mkdirSync(templatesDir, { recursive: true });

  writeFileSync(path.join(templatesDir, "carta.docx"), await buildSampleDocx());
  writeFileSync(path.join(templatesDir, "resumen.pptx"), buildSamplePptx());
  writeFileSync(path.join(SAMPLES_DIR, "data.csv"), buildSampleCsv(), "utf-8");

  console.log(`Sample templates written to ${templatesDir}`);
  console.log(`Sample data written to ${path.join(SAMPLES_DIR, "data.csv")}`);
  console.log("Row 3 has no TEMPLATE: pass --default-template carta.docx");
}

// ── CLI entry point ──────────────────────────────────────────────────
if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
}
