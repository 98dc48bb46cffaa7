/**
 * Registry of every error condition the toolchain can report.
 * Codes are stable identifiers; messages may change without notice.
 */
export const DIAGNOSTIC_CODES = Object.freeze({
  malformedXml: 'malformed-xml',
  unknownRootNode: 'unknown-root-node',
  unknownNode: 'unknown-node',
  missingAttribute: 'missing-attribute',
  duplicateNode: 'duplicate-node'
} as const);

/** Stable short identifier for one error condition. */
export type DiagnosticCode = (typeof DIAGNOSTIC_CODES)[keyof typeof DIAGNOSTIC_CODES];

/** Processing stage that produced a diagnostic. */
export type DiagnosticStage = 'parser';

/** Optional source location attached to a diagnostic record. */
export interface DiagnosticSource {
  line: number;
  column: number;
}

/** One ledger entry. */
export interface Diagnostic {
  sourceId: string;
  stage: DiagnosticStage;
  code: DiagnosticCode;
  message: string;
  source?: DiagnosticSource;
  xmlPath?: string;
}

/** Location details a caller may attach when logging. */
export interface DiagnosticLocation {
  source?: DiagnosticSource;
  xmlPath?: string;
}

/**
 * Append-only diagnostics log owned by the caller.
 *
 * One ledger may be shared by several sequential parse calls (the CLI parses
 * the old and new documents into the same ledger); `reset()` starts over.
 */
export class DiagnosticsLedger {
  private readonly items: Diagnostic[] = [];

  /** Every code any condition can produce, in registry order. */
  static registeredCodes(): DiagnosticCode[] {
    return Object.values(DIAGNOSTIC_CODES);
  }

  /** Entries in the order they were logged. */
  get entries(): readonly Diagnostic[] {
    return this.items;
  }

  log(
    sourceId: string,
    stage: DiagnosticStage,
    code: DiagnosticCode,
    message: string,
    location: DiagnosticLocation = {}
  ): void {
    const entry: Diagnostic = { sourceId, stage, code, message };
    if (location.source) {
      entry.source = location.source;
    }
    if (location.xmlPath !== undefined) {
      entry.xmlPath = location.xmlPath;
    }
    this.items.push(entry);
  }

  reset(): void {
    this.items.length = 0;
  }

  hasErrors(): boolean {
    return this.items.length > 0;
  }
}
