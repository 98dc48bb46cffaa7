import {
  formatName,
  WELL_KNOWN_ANNOTATIONS,
  type Interface,
  type Method,
  type Property,
  type Signal
} from '../core/ast.js';
import { DuplicateNodeError, MissingAttributeError, UnknownNodeError } from './errors.js';
import { isElementKind, permitsChild, type ElementKind } from './grammar.js';
import { reportError, type ParseContext } from './parse-context.js';
import type { XmlNode } from './xml-ast.js';
import { childAnnotationValue, isDocumentationNode } from './xml-utils.js';

/** A child element the grammar permits, tagged with its kind. */
export interface StructuralChild {
  kind: ElementKind;
  node: XmlNode;
}

/** XML element whose listed attributes are known to be present. */
export type AttributedNode<K extends string> = XmlNode & { attributes: Record<K, string> };

/**
 * Check every required attribute of `element`, reporting each missing one in
 * grammar order. Returns false when any is missing.
 */
export function requireAttributes<K extends string>(
  ctx: ParseContext,
  node: XmlNode,
  element: ElementKind,
  required: readonly K[]
): node is AttributedNode<K> {
  let complete = true;
  for (const name of required) {
    if (node.attributes[name] === undefined) {
      complete = false;
      reportError(ctx, new MissingAttributeError(name, element, node));
    }
  }
  return complete;
}

/**
 * Visit the children of `node` the grammar permits for `element`, in document
 * order. Documentation elements are skipped; anything else is reported as
 * unknown in `context` at its position and skipped.
 */
export function visitChildren(
  ctx: ParseContext,
  node: XmlNode,
  element: ElementKind,
  context: string,
  visit: (child: StructuralChild) => void
): void {
  for (const child of node.children) {
    if (isDocumentationNode(child)) {
      continue;
    }

    if (child.namespace === '' && isElementKind(child.name) && permitsChild(element, child.name)) {
      visit({ kind: child.name, node: child });
      continue;
    }

    reportError(ctx, new UnknownNodeError(child.qualifiedName, context, child));
  }
}

/** DocString annotation text if present, otherwise the preceding XML comment. */
export function commentFor(node: XmlNode): string | undefined {
  return childAnnotationValue(node, WELL_KNOWN_ANNOTATIONS.docString) ?? node.comment;
}

/**
 * Insert `value` under its name, reporting a duplicate instead of
 * overwriting. The first definition is kept when recovering.
 */
export function insertUnique<T extends Interface | Method | Signal | Property>(
  ctx: ParseContext,
  target: Map<string, T>,
  value: T,
  node: XmlNode
): void {
  if (target.has(value.name)) {
    reportError(ctx, new DuplicateNodeError(value.kind, formatName(value), node));
    return;
  }

  target.set(value.name, value);
}
