import * as fs from 'fs';
import * as path from 'path';
import { Readable } from 'stream';
import { Workbook } from 'exceljs';
import { v4 as uuidv4 } from 'uuid';
import type { Cell, Worksheet } from 'exceljs';
import { coerceRecord, fieldNames } from '../kyc/record-schema';
import type { KycRecord } from '../kyc/record-schema';
import { StoreFormatError, StoreIOError } from '../errors';

export const STORE_SHEET_NAME = 'KYC_Data';
export const RECORD_SHEET_NAME = 'KYC_Record';
export const XLSX_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export interface TabularStoreOptions {
  filePath: string;
  sheetName?: string;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function cellValue(cell: Cell): string | number | null {
  const value = cell.value;
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return value;
  return cell.text;
}

function buildWorkbook(sheetName: string, records: KycRecord[]): Workbook {
  const workbook = new Workbook();
  const sheet = workbook.addWorksheet(sheetName);
  sheet.columns = fieldNames().map((field) => ({ header: field, key: field }));
  for (const record of records) {
    sheet.addRow(record);
  }
  return workbook;
}

function readSheet(sheet: Worksheet): KycRecord[] {
  const fields = fieldNames();
  const header = sheet.getRow(1);
  const headerValues: string[] = [];
  for (let col = 1; col <= header.cellCount; col++) {
    headerValues.push(header.getCell(col).text);
  }
  const matches =
    headerValues.length === fields.length && headerValues.every((value, index) => value === fields[index]);
  if (!matches) {
    throw new StoreFormatError(
      `Sheet "${sheet.name}" has columns [${headerValues.join(', ')}], expected [${fields.join(', ')}]`
    );
  }

  const records: KycRecord[] = [];
  for (let rowNumber = 2; rowNumber <= sheet.rowCount; rowNumber++) {
    const row = sheet.getRow(rowNumber);
    const raw: Record<string, unknown> = {};
    fields.forEach((field, index) => {
      const value = cellValue(row.getCell(index + 1));
      if (field === 'confidence_score') {
        raw[field] = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
      } else {
        raw[field] = typeof value === 'number' ? String(value) : value;
      }
    });
    records.push(coerceRecord(raw));
  }
  return records;
}

/** Reads rows back from xlsx bytes written by this store or by `toXlsx`. */
export async function parseWorkbook(bytes: Buffer, sheetName: string = STORE_SHEET_NAME): Promise<KycRecord[]> {
  const workbook = new Workbook();
  try {
    await workbook.xlsx.read(Readable.from(bytes));
  } catch (error) {
    throw new StoreFormatError(`Not a readable workbook: ${errorMessage(error)}`);
  }
  const sheet = workbook.getWorksheet(sheetName);
  if (!sheet) {
    throw new StoreFormatError(`Sheet "${sheetName}" not found`);
  }
  return readSheet(sheet);
}

export async function toXlsx(records: KycRecord[], sheetName: string): Promise<Buffer> {
  const workbook = buildWorkbook(sheetName, records);
  return Buffer.from(await workbook.xlsx.writeBuffer());
}

/**
 * Append-only spreadsheet of finalized KYC records. Rows have no key; the whole file is
 * loaded for every read and rewritten for every append.
 *
 * Reads and appends made through one instance run one at a time, in call order, and every
 * rewrite lands through a rename so readers never see a half-written file. Two processes
 * writing the same file can still lose an update: only one writing process is supported.
 */
export class TabularStore {
  readonly filePath: string;
  readonly sheetName: string;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(options: TabularStoreOptions) {
    this.filePath = options.filePath;
    this.sheetName = options.sheetName ?? STORE_SHEET_NAME;
  }

  openOrCreate(): Promise<KycRecord[]> {
    return this.enqueue(() => this.load());
  }

  /**
   * Coerces `record` to the fixed columns (missing keys become null, unknown keys are
   * dropped) and adds it as the last row.
   */
  append(record: Record<string, unknown>): Promise<KycRecord> {
    return this.enqueue(() => this.appendNow(record));
  }

  async count(): Promise<number> {
    const records = await this.openOrCreate();
    return records.length;
  }

  async exportAll(): Promise<Buffer> {
    const records = await this.openOrCreate();
    return toXlsx(records, this.sheetName);
  }

  /** Single in-memory record as xlsx bytes; the file on disk is not read. */
  async exportOne(record: Record<string, unknown>): Promise<Buffer> {
    return toXlsx([coerceRecord(record)], RECORD_SHEET_NAME);
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    // keep the chain going after a failed task; the caller still gets the rejection from `run`
    this.tail = run.catch(() => undefined);
    return run;
  }

  private async load(): Promise<KycRecord[]> {
    let bytes: Buffer;
    try {
      bytes = await fs.promises.readFile(this.filePath);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        await this.writeRecords([]);
        console.log(`[Store] Created new database file: ${this.filePath}`);
        return [];
      }
      throw new StoreIOError(`Could not read ${this.filePath}: ${errorMessage(error)}`);
    }
    return parseWorkbook(bytes, this.sheetName);
  }

  private async appendNow(record: Record<string, unknown>): Promise<KycRecord> {
    const records = await this.load();
    const stored = coerceRecord(record);
    records.push(stored);
    await this.writeRecords(records);
    console.log(`[Store] Appended record ${records.length} to ${this.filePath}`);
    return stored;
  }

  private async writeRecords(records: KycRecord[]): Promise<void> {
    const workbook = buildWorkbook(this.sheetName, records);
    const tmpPath = `${this.filePath}.${uuidv4()}.tmp`;
    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await workbook.xlsx.writeFile(tmpPath);
      await fs.promises.rename(tmpPath, this.filePath);
    } catch (error) {
      await fs.promises.rm(tmpPath, { force: true });
      throw new StoreIOError(`Could not write ${this.filePath}: ${errorMessage(error)}`);
    }
  }
}
