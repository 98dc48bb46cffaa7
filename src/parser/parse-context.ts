import { DiagnosticsLedger } from '../core/diagnostics.js';
import type { InterfaceParseError } from './errors.js';

/** Mutable parser state shared by helper passes. */
export interface ParseContext {
  /** Identifier logged with every diagnostic, usually the file path. */
  sourceId: string;
  /** Keep going after a violation instead of throwing it. */
  recover: boolean;
  ledger: DiagnosticsLedger;
  /** Set once any violation has been reported during this parse. */
  failed: boolean;
}

/** Options accepted by {@link createParseContext}. */
export interface ParseContextOptions {
  sourceName?: string;
  recover?: boolean;
  ledger?: DiagnosticsLedger;
}

/** Create a parser context for one parse invocation. */
export function createParseContext(options: ParseContextOptions = {}): ParseContext {
  return {
    sourceId: options.sourceName ?? '<string>',
    recover: options.recover ?? false,
    ledger: options.ledger ?? new DiagnosticsLedger(),
    failed: false
  };
}

/**
 * Record a grammar violation in the ledger, then throw it unless the parse is
 * recovering. Every violation goes through here so both modes log alike.
 */
export function reportError(ctx: ParseContext, error: InterfaceParseError): void {
  ctx.failed = true;
  ctx.ledger.log(ctx.sourceId, 'parser', error.code, error.message, {
    source: error.source,
    xmlPath: error.xmlPath
  });

  if (!ctx.recover) {
    throw error;
  }
}
