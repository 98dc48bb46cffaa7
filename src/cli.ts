import { Command, CommanderError, InvalidArgumentError } from 'commander';

import type { InterfaceMap } from './core/ast.js';
import { DiagnosticsLedger } from './core/diagnostics.js';
import { filterEntries, type CompatibilityReport } from './compare/comparator.js';
import {
  categoryOf,
  formatSeverity,
  isWarningCategory,
  Severity,
  WARNING_CATEGORIES,
  type WarningCategory
} from './compare/severity.js';
import { compareInterfaces, parseInterfaceFile } from './public/api.js';

/** Exit statuses of `dbus-interface-diff`. */
export const EXIT_CODES = {
  ok: 0,
  incompatible: 1,
  usage: 2,
  parseFailure: 3
} as const;

/** Output sinks, injectable so the command can run in-process. */
export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

type DiffCommandOptions = {
  warnings: WarningCategory[];
  fatalWarnings: WarningCategory[];
};

/**
 * Parse comma-separated CLI identifiers into a normalized list.
 * Empty/whitespace input returns `undefined` so callers can distinguish
 * "no filter" from "explicit empty filter."
 */
export function parseCsvArgument(raw: string | undefined): string[] | undefined {
  if (!raw) {
    return undefined;
  }

  const values = raw
    .split(',')
    .map((token) => token.trim())
    .filter((token) => token.length > 0);

  return values.length > 0 ? values : undefined;
}

/** commander argument parser for a comma-separated category list. */
function parseCategories(raw: string): WarningCategory[] {
  const out: WarningCategory[] = [];
  for (const value of parseCsvArgument(raw) ?? []) {
    if (!isWarningCategory(value)) {
      throw new InvalidArgumentError(`Unknown warning category '${value}'. Expected one of: ${WARNING_CATEGORIES.join(', ')}.`);
    }
    out.push(value);
  }
  return out;
}

function buildCommand(io: CliIo): Command {
  return new Command()
    .name('dbus-interface-diff')
    .description('Compare two D-Bus introspection files and report API breaks.')
    .argument('<old-file>', 'introspection XML of the old API')
    .argument('<new-file>', 'introspection XML of the new API')
    .option('--warnings <categories>', 'comma-separated categories to print', parseCategories, [
      ...WARNING_CATEGORIES
    ])
    .option(
      '--fatal-warnings <categories>',
      'comma-separated categories that make the exit status non-zero',
      parseCategories,
      ['backwards-compatibility']
    )
    .exitOverride()
    .configureOutput({
      writeOut: io.stdout,
      writeErr: io.stderr
    });
}

/**
 * Run `dbus-interface-diff` with user arguments (no node/script prefix) and
 * return the exit status.
 */
export async function runDiff(argv: readonly string[], io: CliIo): Promise<number> {
  const command = buildCommand(io);
  try {
    command.parse([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODES.ok : EXIT_CODES.usage;
    }
    throw error;
  }

  const [oldPath, newPath] = command.args;
  if (oldPath === undefined || newPath === undefined) {
    return EXIT_CODES.usage;
  }
  const options = command.opts<DiffCommandOptions>();

  const ledger = new DiagnosticsLedger();
  let oldInterfaces: InterfaceMap | undefined;
  let newInterfaces: InterfaceMap | undefined;
  try {
    oldInterfaces = await parseInterfaceFile(oldPath, { recover: true, ledger });
    newInterfaces = await parseInterfaceFile(newPath, { recover: true, ledger });
  } catch (error) {
    if (isFileSystemError(error)) {
      io.stderr(`dbus-interface-diff: ${error.message}\n`);
      return EXIT_CODES.usage;
    }
    throw error;
  }

  if (!oldInterfaces || !newInterfaces) {
    for (const entry of ledger.entries) {
      io.stderr(`${entry.sourceId}: ${entry.stage} error [${entry.code}]: ${entry.message}\n`);
    }
    return EXIT_CODES.parseFailure;
  }

  const report = compareInterfaces(oldInterfaces, newInterfaces);
  printReport(report, options.warnings, io);

  const fatal = new Set(options.fatalWarnings);
  const failed = report.entries.some((entry) => fatal.has(categoryOf(entry.severity)));
  return failed ? EXIT_CODES.incompatible : EXIT_CODES.ok;
}

/** Info goes to stdout; both incompatibility levels go to stderr. */
function printReport(report: CompatibilityReport, enabled: readonly WarningCategory[], io: CliIo): void {
  for (const entry of filterEntries(report, enabled)) {
    const line = `${formatSeverity(entry.severity)}: ${entry.message}\n`;
    if (entry.severity === Severity.Info) {
      io.stdout(line);
    } else {
      io.stderr(line);
    }
  }
}

function isFileSystemError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && 'syscall' in error;
}
