import { describe, it, expect, beforeAll, afterEach } from 'vitest';
import chalk from 'chalk';
import { mkdtemp, readFile, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConsoleExporter } from '../console-exporter.js';
import { CsvExporter, formatTimestamp, toCsv } from '../csv-exporter.js';
import { TableExporter, formatTable } from '../table-exporter.js';
import { createExporter } from '../exporter-factory.js';
import { ConfigurationError } from '../../errors.js';
import type { TabularData } from '../report-exporter.js';

const SERVED_TABLE: TabularData = {
  header: 'Process Status Report: Served Business Processes',
  rows: [
    { 'Process Name': 'Invoice Generation', 'Serving Component': 'Billing System' },
    { 'Process Name': 'Order Processing', 'Serving Component': 'Order System' },
  ],
  columns: ['Process Name', 'Serving Component'],
};

beforeAll(() => {
  chalk.level = 0;
});

describe('ConsoleExporter', () => {
  it('prints the header, the item count and numbered rows', async () => {
    const lines: string[] = [];
    const exporter = new ConsoleExporter((line) => lines.push(line));

    const result = await exporter.exportData(SERVED_TABLE);

    expect(lines).toEqual([
      '\nProcess Status Report: Served Business Processes',
      'Found 2 items:',
      '1. Invoice Generation - Billing System',
      '2. Order Processing - Order System',
    ]);
    expect(result).toEqual({ rowCount: 2 });
  });

  it('leaves out columns without a value', async () => {
    const lines: string[] = [];
    const exporter = new ConsoleExporter((line) => lines.push(line));

    await exporter.exportData({
      header: 'Partial',
      rows: [{ 'Process Name': 'Lonely', 'Serving Component': undefined }],
      columns: ['Process Name', 'Serving Component'],
    });

    expect(lines[2]).toBe('1. Lonely');
  });

  it('prints a zero count for no rows', async () => {
    const lines: string[] = [];
    const exporter = new ConsoleExporter((line) => lines.push(line));

    await exporter.exportData({ header: 'Nothing', rows: [], columns: ['Process Name'] });

    expect(lines).toEqual(['\nNothing', 'Found 0 items:']);
  });
});

describe('toCsv', () => {
  it('writes a header row and one row per item with CRLF endings', () => {
    expect(toCsv(SERVED_TABLE.columns, SERVED_TABLE.rows)).toBe(
      'Process Name,Serving Component\r\n' +
        'Invoice Generation,Billing System\r\n' +
        'Order Processing,Order System\r\n'
    );
  });

  it('quotes values with commas, quotes and newlines', () => {
    const csv = toCsv(['Process Name'], [
      { 'Process Name': 'Plan, Build' },
      { 'Process Name': 'The "Big" Review' },
      { 'Process Name': 'Line\nBreak' },
    ]);

    expect(csv).toBe(
      'Process Name\r\n"Plan, Build"\r\n"The ""Big"" Review"\r\n"Line\nBreak"\r\n'
    );
  });

  it('quotes an empty single-column row so it is not a blank line', () => {
    expect(
      toCsv(['Process Name'], [{ 'Process Name': '' }, { 'Process Name': 'Audit' }])
    ).toBe('Process Name\r\n""\r\nAudit\r\n');
  });

  it('writes absent values as empty fields', () => {
    expect(toCsv(['A', 'B'], [{ A: 'x' }])).toBe('A,B\r\nx,\r\n');
  });
});

describe('formatTimestamp', () => {
  it('formats local time as YYYYMMDD_HHMMSS', () => {
    expect(formatTimestamp(new Date(2024, 0, 5, 9, 7, 3))).toBe('20240105_090703');
  });
});

describe('CsvExporter', () => {
  let outputDir: string | undefined;

  afterEach(async () => {
    if (outputDir) {
      await rm(outputDir, { recursive: true, force: true });
      outputDir = undefined;
    }
  });

  it('creates the output directory and writes a timestamped file', async () => {
    outputDir = await mkdtemp(join(tmpdir(), 'archi-reports-'));
    const target = join(outputDir, 'nested', 'reports');
    const exporter = new CsvExporter({
      reportName: 'process-status',
      outputDir: target,
      now: () => new Date(2024, 2, 15, 14, 30, 5),
    });

    const result = await exporter.exportData(SERVED_TABLE);

    const expectedPath = join(target, 'process-status_20240315_143005.csv');
    expect(result).toEqual({ rowCount: 2, destination: expectedPath });
    expect(await readdir(target)).toEqual(['process-status_20240315_143005.csv']);
    expect(await readFile(expectedPath, 'utf-8')).toBe(
      toCsv(SERVED_TABLE.columns, SERVED_TABLE.rows)
    );
  });
});

describe('formatTable', () => {
  it('aligns columns to the widest value', () => {
    const table = formatTable({
      rows: [
        { Component: 'CRM', Process: 'Quote' },
        { Component: 'Billing System', Process: 'Invoice' },
      ],
      columns: ['Component', 'Process'],
    });

    expect(table.split('\n')).toEqual([
      'Component      | Process',
      '---------------+--------',
      'CRM            | Quote  ',
      'Billing System | Invoice',
    ]);
  });

  it('truncates values longer than 50 characters', () => {
    const long = 'x'.repeat(60);
    const table = formatTable({ rows: [{ Name: long }], columns: ['Name'] });

    expect(table.split('\n')[2]).toBe('x'.repeat(47) + '...');
  });

  it('shows a placeholder for no rows', () => {
    expect(formatTable({ rows: [], columns: ['Name'] })).toBe('No data to display');
  });
});

describe('TableExporter', () => {
  it('writes a section title before the table', async () => {
    const lines: string[] = [];
    const exporter = new TableExporter((line) => lines.push(line));

    const result = await exporter.exportData({
      header: 'Unserved',
      rows: [{ 'Process Name': 'Manual Review' }],
      columns: ['Process Name'],
    });

    expect(lines).toEqual([
      '\n── Unserved ──',
      'Process Name \n-------------\nManual Review',
    ]);
    expect(result).toEqual({ rowCount: 1 });
  });
});

describe('createExporter', () => {
  const options = { reportName: 'process-status', outputDir: 'reports' };

  it('creates an exporter for each supported format', () => {
    expect(createExporter('console', options)).toBeInstanceOf(ConsoleExporter);
    expect(createExporter('csv', options)).toBeInstanceOf(CsvExporter);
    expect(createExporter('table', options)).toBeInstanceOf(TableExporter);
  });

  it('rejects unknown formats', () => {
    expect(() => createExporter('pdf', options)).toThrow(ConfigurationError);
  });
});
