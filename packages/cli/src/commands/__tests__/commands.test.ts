import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Command } from 'commander';

const { mockRunReport, mockHandleCliError, mockCreateProgress } = vi.hoisted(() => ({
  mockRunReport: vi.fn(),
  mockHandleCliError: vi.fn(),
  mockCreateProgress: vi.fn(),
}));

vi.mock('@archi-reports/core', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@archi-reports/core')>();
  return {
    ...actual,
    runReport: mockRunReport,
  };
});

vi.mock('../../utils/error-handler.js', () => ({
  ErrorHandler: {
    handleCliError: mockHandleCliError,
  },
}));

vi.mock('../../utils/cli-helpers.js', () => ({
  createProgress: mockCreateProgress,
}));

import { createProcessesCommand } from '../processes.js';
import { createComponentsCommand } from '../components.js';
import { createReportCommand } from '../report.js';

const PROGRESS = { section: vi.fn() };

async function run(command: Command, ...args: string[]): Promise<void> {
  command.exitOverride();
  await command.parseAsync(['node', 'test', ...args]);
}

beforeEach(() => {
  vi.clearAllMocks();
  mockCreateProgress.mockReturnValue(PROGRESS);
  mockRunReport.mockResolvedValue({
    report: 'process-status',
    servedCount: 0,
    unservedCount: 0,
    componentCount: 0,
    export: { rowCount: 0 },
  });
});

describe('createProcessesCommand', () => {
  it('reports unserved processes on the console by default', async () => {
    await run(createProcessesCommand(), 'model.xml');

    expect(mockRunReport).toHaveBeenCalledWith(
      {
        modelPath: 'model.xml',
        report: 'process-status',
        showServed: false,
        format: 'console',
        outputDir: 'reports',
      },
      undefined
    );
  });

  it('passes --served through', async () => {
    await run(createProcessesCommand(), 'model.xml', '--served');

    expect(mockRunReport).toHaveBeenCalledWith(
      expect.objectContaining({ showServed: true }),
      undefined
    );
  });

  it('shows progress when exporting CSV', async () => {
    await run(createProcessesCommand(), 'model.xml', '--format', 'csv', '--output-dir', 'out');

    expect(mockRunReport).toHaveBeenCalledWith(
      expect.objectContaining({ format: 'csv', outputDir: 'out' }),
      PROGRESS
    );
  });

  it('hands an invalid format to the error handler', async () => {
    await run(createProcessesCommand(), 'model.xml', '--format', 'pdf');

    expect(mockRunReport).not.toHaveBeenCalled();
    expect(mockHandleCliError).toHaveBeenCalledTimes(1);
  });

  it('hands pipeline failures to the error handler', async () => {
    const failure = new Error('boom');
    mockRunReport.mockRejectedValue(failure);

    await run(createProcessesCommand(), 'model.xml');

    expect(mockHandleCliError).toHaveBeenCalledWith(failure);
  });
});

describe('createComponentsCommand', () => {
  it('runs the component services report', async () => {
    await run(createComponentsCommand(), 'model.xml', '--format', 'table');

    expect(mockRunReport).toHaveBeenCalledWith(
      {
        modelPath: 'model.xml',
        report: 'component-services',
        format: 'table',
        outputDir: 'reports',
      },
      undefined
    );
  });
});

describe('createReportCommand', () => {
  it('defaults to report 1 on the configured model file', async () => {
    await run(createReportCommand());

    expect(mockRunReport).toHaveBeenCalledWith(
      {
        modelPath: 'data/kg-tax.xml',
        report: 'process-status',
        showServed: false,
        format: 'console',
        outputDir: 'reports',
      },
      undefined
    );
  });

  it('maps --report 2 to the component services report', async () => {
    await run(createReportCommand(), '--report', '2', '--file', 'bank.xml');

    expect(mockRunReport).toHaveBeenCalledWith(
      expect.objectContaining({ modelPath: 'bank.xml', report: 'component-services' }),
      undefined
    );
  });

  it('rejects report numbers other than 1 and 2', async () => {
    await run(createReportCommand(), '--report', '3');

    expect(mockRunReport).not.toHaveBeenCalled();
    expect(mockHandleCliError).toHaveBeenCalledTimes(1);
  });
});
