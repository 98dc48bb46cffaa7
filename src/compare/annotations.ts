import { annotationValue, formatName, WELL_KNOWN_ANNOTATIONS, type AnnotatedNode } from '../core/ast.js';
import { Severity } from './severity.js';

/** One classified difference. */
export interface DiffEntry {
  severity: Severity;
  message: string;
}

/** Values the EmitsChangedSignal annotation may take. */
export type EmitsChangedSignal = 'true' | 'invalidates' | 'false' | 'const';

/** One row of the EmitsChangedSignal transition table. */
export interface EmitsChangedTransition {
  from: readonly EmitsChangedSignal[];
  to: readonly EmitsChangedSignal[];
  severity: Severity;
  describe: (nodeName: string) => string;
}

const PROPERTIES_CHANGED = 'org.freedesktop.DBus.Properties.PropertiesChanged';

/**
 * Old→new EmitsChangedSignal transitions and their impact, first match wins.
 * Values outside {@link EmitsChangedSignal} never match a row.
 */
export const EMITS_CHANGED_TRANSITIONS: readonly EmitsChangedTransition[] = [
  {
    from: ['true', 'invalidates'],
    to: ['false', 'const'],
    severity: Severity.ForwardsIncompatible,
    describe: (name) => `Node '${name}' stopped emitting ${PROPERTIES_CHANGED}.`
  },
  {
    from: ['false', 'const'],
    to: ['true', 'invalidates'],
    severity: Severity.BackwardsIncompatible,
    describe: (name) => `Node '${name}' started emitting ${PROPERTIES_CHANGED}.`
  },
  {
    from: ['true'],
    to: ['invalidates'],
    severity: Severity.BackwardsIncompatible,
    describe: (name) => `Node '${name}' stopped emitting its new value in ${PROPERTIES_CHANGED}.`
  },
  {
    from: ['invalidates'],
    to: ['true'],
    severity: Severity.BackwardsIncompatible,
    describe: (name) => `Node '${name}' started emitting its new value in ${PROPERTIES_CHANGED}.`
  },
  {
    from: ['const'],
    to: ['false'],
    severity: Severity.BackwardsIncompatible,
    describe: (name) => `Node '${name}' stopped being a constant.`
  },
  {
    from: ['false'],
    to: ['const'],
    severity: Severity.ForwardsIncompatible,
    describe: (name) => `Node '${name}' became a constant.`
  }
];

/** Read a boolean annotation; only the literal `true` counts as true. */
export function readBooleanAnnotation(node: AnnotatedNode, name: string, fallback: boolean): boolean {
  const value = annotationValue(node, name);
  return value === undefined ? fallback : value === 'true';
}

export function readStringAnnotation(node: AnnotatedNode, name: string, fallback: string): string {
  return annotationValue(node, name) ?? fallback;
}

/**
 * Effective EmitsChangedSignal value. A property without its own annotation
 * inherits the declaring interface's; everything else defaults to `true`.
 */
export function readEmitsChangedSignal(node: AnnotatedNode): string {
  const value = annotationValue(node, WELL_KNOWN_ANNOTATIONS.emitsChangedSignal);
  if (value !== undefined) {
    return value;
  }

  return node.kind === 'property' ? readEmitsChangedSignal(node.parent) : 'true';
}

/** Diff the well-known annotations of two nodes of the same kind. */
export function compareAnnotations(oldNode: AnnotatedNode, newNode: AnnotatedNode): DiffEntry[] {
  const out: DiffEntry[] = [];
  const name = formatName(oldNode);

  const oldDeprecated = readBooleanAnnotation(oldNode, WELL_KNOWN_ANNOTATIONS.deprecated, false);
  const newDeprecated = readBooleanAnnotation(newNode, WELL_KNOWN_ANNOTATIONS.deprecated, false);
  if (oldDeprecated && !newDeprecated) {
    out.push({ severity: Severity.Info, message: `Node '${name}' has been un-deprecated.` });
  } else if (!oldDeprecated && newDeprecated) {
    out.push({ severity: Severity.Info, message: `Node '${name}' has been deprecated.` });
  }

  const oldSymbol = readStringAnnotation(oldNode, WELL_KNOWN_ANNOTATIONS.cSymbol, '');
  const newSymbol = readStringAnnotation(newNode, WELL_KNOWN_ANNOTATIONS.cSymbol, '');
  if (oldSymbol !== newSymbol) {
    out.push({
      severity: Severity.Info,
      message: `Node '${name}' has changed its C symbol from '${oldSymbol}' to '${newSymbol}'.`
    });
  }

  const oldNoReply = readBooleanAnnotation(oldNode, WELL_KNOWN_ANNOTATIONS.noReply, false);
  const newNoReply = readBooleanAnnotation(newNode, WELL_KNOWN_ANNOTATIONS.noReply, false);
  if (oldNoReply && !newNoReply) {
    out.push({ severity: Severity.BackwardsIncompatible, message: `Node '${name}' now returns a reply.` });
  } else if (!oldNoReply && newNoReply) {
    out.push({ severity: Severity.BackwardsIncompatible, message: `Node '${name}' no longer returns a reply.` });
  }

  const oldEmits = readEmitsChangedSignal(oldNode);
  const newEmits = readEmitsChangedSignal(newNode);
  const transition = EMITS_CHANGED_TRANSITIONS.find(
    (row) => includesValue(row.from, oldEmits) && includesValue(row.to, newEmits)
  );
  if (transition) {
    out.push({ severity: transition.severity, message: transition.describe(name) });
  }

  return out;
}

function includesValue(values: readonly EmitsChangedSignal[], value: string): boolean {
  return values.some((candidate) => candidate === value);
}
