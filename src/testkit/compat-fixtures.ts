import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';

import type { DiffEntry } from '../compare/annotations.js';
import { Severity } from '../compare/severity.js';
import { compareInterfaces, parseInterfaceFile } from '../public/api.js';

/** Fixture activation status in the compatibility suite. */
export type FixtureStatus = 'active' | 'skip';

/** Severity spelling used in fixture sidecars. */
export type FixtureSeverity = 'info' | 'forwards-incompatible' | 'backwards-incompatible';

/** One expected diff entry as written in a sidecar. */
export interface FixtureExpectedEntry {
  severity: FixtureSeverity;
  message: string;
}

/** Metadata contract for one compatibility fixture sidecar file. */
export interface CompatFixtureMeta {
  id: string;
  category: string;
  status: FixtureStatus;
  old: string;
  new: string;
  expected: FixtureExpectedEntry[];
  notes?: string;
}

/** Resolved fixture record including metadata and document paths. */
export interface CompatFixtureRecord {
  metaPath: string;
  oldPath: string;
  newPath: string;
  meta: CompatFixtureMeta;
}

/** Outcome of running one fixture through parse and compare. */
export interface CompatFixtureResult {
  fixtureId: string;
  expected: DiffEntry[];
  observed: DiffEntry[];
  pass: boolean;
}

/** Validation error for malformed fixture metadata. */
export class CompatFixtureMetadataError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`Metadata error in ${filePath}: ${message}`);
    this.name = 'CompatFixtureMetadataError';
    this.filePath = filePath;
  }
}

/** Accepted metadata filename suffixes. */
const META_SUFFIXES = ['.meta.yaml', '.meta.yml'];

const SEVERITY_BY_NAME: Readonly<Record<FixtureSeverity, Severity>> = {
  info: Severity.Info,
  'forwards-incompatible': Severity.ForwardsIncompatible,
  'backwards-incompatible': Severity.BackwardsIncompatible
};

/** Load and validate all fixture records under `rootDir`, sorted by id. */
export async function loadCompatFixtures(rootDir: string): Promise<CompatFixtureRecord[]> {
  const metaFiles = await findMetadataFiles(rootDir);
  const records: CompatFixtureRecord[] = [];

  for (const metaPath of metaFiles) {
    const raw = await readFile(metaPath, 'utf8');
    const meta = parseAndValidateMeta(metaPath, parseYaml(raw));
    const dir = path.dirname(metaPath);
    records.push({
      metaPath,
      oldPath: path.resolve(dir, meta.old),
      newPath: path.resolve(dir, meta.new),
      meta
    });
  }

  records.sort((left, right) => left.meta.id.localeCompare(right.meta.id));
  return records;
}

/** Parse both documents of a fixture (fail-fast) and compare them. */
export async function executeCompatFixture(record: CompatFixtureRecord): Promise<CompatFixtureResult> {
  const oldInterfaces = await parseInterfaceFile(record.oldPath);
  const newInterfaces = await parseInterfaceFile(record.newPath);
  if (!oldInterfaces || !newInterfaces) {
    throw new CompatFixtureMetadataError(record.metaPath, 'fixture documents did not parse');
  }

  const observed = [...compareInterfaces(oldInterfaces, newInterfaces).entries];
  const expected = record.meta.expected.map((entry) => ({
    severity: SEVERITY_BY_NAME[entry.severity],
    message: entry.message
  }));

  return {
    fixtureId: record.meta.id,
    expected,
    observed,
    pass: sameEntries(expected, observed)
  };
}

function sameEntries(left: readonly DiffEntry[], right: readonly DiffEntry[]): boolean {
  return (
    left.length === right.length &&
    left.every((entry, index) => {
      const other = right[index];
      return other !== undefined && other.severity === entry.severity && other.message === entry.message;
    })
  );
}

/** Recursively discover metadata files from the fixture root. */
async function findMetadataFiles(rootDir: string): Promise<string[]> {
  const matches: string[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
        continue;
      }

      if (META_SUFFIXES.some((suffix) => entry.name.endsWith(suffix))) {
        matches.push(fullPath);
      }
    }
  }

  await walk(rootDir);
  return matches;
}

function isRecord(input: unknown): input is Record<string, unknown> {
  return typeof input === 'object' && input !== null && !Array.isArray(input);
}

/** Parse YAML metadata into a validated `CompatFixtureMeta` object. */
function parseAndValidateMeta(filePath: string, input: unknown): CompatFixtureMeta {
  if (!isRecord(input)) {
    throw new CompatFixtureMetadataError(filePath, 'metadata must be a YAML object');
  }

  const id = readRequiredString(filePath, input, 'id');
  const category = readRequiredString(filePath, input, 'category');
  const oldFile = readRequiredString(filePath, input, 'old');
  const newFile = readRequiredString(filePath, input, 'new');

  const statusRaw = readRequiredString(filePath, input, 'status');
  if (statusRaw !== 'active' && statusRaw !== 'skip') {
    throw new CompatFixtureMetadataError(filePath, "'status' must be 'active' or 'skip'");
  }

  const meta: CompatFixtureMeta = {
    id,
    category,
    status: statusRaw,
    old: oldFile,
    new: newFile,
    expected: readExpectedEntries(filePath, input, 'expected')
  };

  const notes = readOptionalString(filePath, input, 'notes');
  if (notes !== undefined) {
    meta.notes = notes;
  }

  return meta;
}

/** Read a required non-empty string metadata field. */
function readRequiredString(filePath: string, obj: Record<string, unknown>, key: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new CompatFixtureMetadataError(filePath, `missing or invalid '${key}'`);
  }
  return value;
}

/** Read an optional string metadata field. */
function readOptionalString(filePath: string, obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'string') {
    throw new CompatFixtureMetadataError(filePath, `'${key}' must be a string`);
  }

  return value;
}

/** Read the expected entry list; an absent list means "no differences". */
function readExpectedEntries(filePath: string, obj: Record<string, unknown>, key: string): FixtureExpectedEntry[] {
  const value = obj[key];
  if (value === undefined || value === null) {
    return [];
  }

  if (!Array.isArray(value)) {
    throw new CompatFixtureMetadataError(filePath, `'${key}' must be a list`);
  }

  return value.map((item: unknown, index) => {
    if (!isRecord(item)) {
      throw new CompatFixtureMetadataError(filePath, `'${key}[${index}]' must be an object`);
    }

    const severity = readRequiredString(filePath, item, 'severity');
    if (!isFixtureSeverity(severity)) {
      throw new CompatFixtureMetadataError(
        filePath,
        `'${key}[${index}].severity' must be 'info', 'forwards-incompatible' or 'backwards-incompatible'`
      );
    }

    return { severity, message: readRequiredString(filePath, item, 'message') };
  });
}

function isFixtureSeverity(value: string): value is FixtureSeverity {
  return value === 'info' || value === 'forwards-incompatible' || value === 'backwards-incompatible';
}
