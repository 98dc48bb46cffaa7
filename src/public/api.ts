import { readFile } from 'node:fs/promises';

import type { InterfaceMap } from '../core/ast.js';
import type { DiagnosticsLedger } from '../core/diagnostics.js';
import { compareInterfaceMaps, type CompatibilityReport } from '../compare/comparator.js';
import { parseIntrospectionXml } from '../parser/parse.js';

/** Parser configuration shared by text and file entry points. */
export interface ParseOptions {
  sourceName?: string;
  recover?: boolean;
  ledger?: DiagnosticsLedger;
}

/**
 * Parse introspection XML text into interfaces keyed by name.
 * See {@link parseIntrospectionXml} for the failure contract.
 */
export function parseInterfaces(xmlText: string, options: ParseOptions = {}): InterfaceMap | undefined {
  return parseIntrospectionXml(xmlText, options);
}

/** Read and parse one introspection file; the path becomes the source name. */
export async function parseInterfaceFile(
  filePath: string,
  options: Omit<ParseOptions, 'sourceName'> = {}
): Promise<InterfaceMap | undefined> {
  const xmlText = await readFile(filePath, 'utf8');
  return parseIntrospectionXml(xmlText, { ...options, sourceName: filePath });
}

/** Classify every difference between an old and a new interface set. */
export function compareInterfaces(oldInterfaces: InterfaceMap, newInterfaces: InterfaceMap): CompatibilityReport {
  return compareInterfaceMaps(oldInterfaces, newInterfaces);
}
