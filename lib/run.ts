// lib/run.ts
import { mkdir, readFile, rm, writeFile } from "fs/promises";
import { basename, dirname, join } from "path";
import { Bill, BillingParams, Layout } from "./types";
import { parseXlsx } from "./xlsx-parser";
import { buildBills } from "./bills";
import { formatInvoiceDate, invoiceFilename, makeInvoiceNumber, runStamp, toInvoiceRecord } from "./invoice";
import { renderInvoicePdf } from "./pdf-invoice";
import { buildMessagesCsv, buildSummaryWorkbook } from "./exports";

export type RunLogger = (message: string) => void;

export type RunOptions = {
  inputPath: string;
  outDir?: string;            // defaults to the manifest's folder
  params: BillingParams;
  now?: Date;                 // run date for invoice numbers, dates and the output folder
  log?: RunLogger;
};

export type RunResult = {
  runDir: string;
  layout: Layout;
  bills: Bill[];
  pdfFiles: string[];
  summaryFile: string;
  messagesFile: string;
};

const PROGRESS_EVERY = 20;

export const consoleLogger: RunLogger = (message) => console.log(`[bills] ${message}`);

/** Same customer name and phone twice would overwrite a PDF; number the repeats. */
function uniqueName(name: string, taken: Set<string>): string {
  let candidate = name;
  for (let i = 2; taken.has(candidate); i++) candidate = name.replace(/\.pdf$/, ` (${i}).pdf`);
  taken.add(candidate);
  return candidate;
}

async function readManifest(inputPath: string): Promise<Buffer> {
  try {
    return await readFile(inputPath);
  } catch (e: unknown) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new Error(`Cannot read manifest "${inputPath}": ${reason}`);
  }
}

type OutputFile = { path: string; data: Uint8Array | string };

function failure(runDir: string, e: unknown): Error {
  const reason = e instanceof Error ? e.message : String(e);
  return new Error(`Cannot write to output folder "${runDir}": ${reason}`);
}

/**
 * Write every file or none: on a failed write the files already written are
 * removed, along with the folders this call created.
 */
async function writeAll(runDir: string, files: OutputFile[]): Promise<void> {
  let created: string | undefined;
  const written: string[] = [];
  try {
    created = await mkdir(join(runDir, "PDFs"), { recursive: true });
    for (const f of files) {
      await writeFile(f.path, f.data);
      written.push(f.path);
    }
  } catch (e: unknown) {
    for (const path of written) await rm(path, { force: true });
    if (created) await rm(created, { recursive: true, force: true });
    throw failure(runDir, e);
  }
}

/**
 * Manifest workbook → one PDF per customer, Messages.csv and Summary.xlsx
 * in a fresh BILLS_<stamp> folder. Everything is rendered in memory before the first write.
 */
export async function generateBills(opts: RunOptions): Promise<RunResult> {
  const log = opts.log ?? consoleLogger;
  const now = opts.now ?? new Date();

  log(`Loading manifest: ${basename(opts.inputPath)}`);
  const buf = await readManifest(opts.inputPath);
  const { layout, rows, bills } = buildBills(parseXlsx(buf), opts.params);
  log(`Rows loaded: ${rows.length} (${layout.kind} layout)`);

  const runDir = join(opts.outDir ?? dirname(opts.inputPath), `BILLS_${runStamp(now)}`);
  const pdfDir = join(runDir, "PDFs");

  log(`Generating ${bills.length} bills...`);
  const invoice_date = formatInvoiceDate(now);
  const taken = new Set<string>();
  const files: OutputFile[] = [];

  for (const [i, bill] of bills.entries()) {
    const record = toInvoiceRecord(bill, { invoice_no: makeInvoiceNumber(now, i + 1), invoice_date });
    files.push({ path: join(pdfDir, uniqueName(invoiceFilename(bill), taken)), data: renderInvoicePdf(record) });
    if ((i + 1) % PROGRESS_EVERY === 0) log(`... ${i + 1}/${bills.length} PDFs done`);
  }
  const pdfFiles = files.map((f) => f.path);

  const messagesFile = join(runDir, "Messages.csv");
  files.push({ path: messagesFile, data: buildMessagesCsv(bills) });
  const summaryFile = join(runDir, "Summary.xlsx");
  files.push({ path: summaryFile, data: buildSummaryWorkbook(bills) });

  await writeAll(runDir, files);

  log(`Done. Output folder: ${runDir}`);
  return { runDir, layout, bills, pdfFiles, summaryFile, messagesFile };
}
