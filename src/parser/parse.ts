import type { Annotation, Interface, InterfaceMap, Method, Property, Signal } from '../core/ast.js';
import { DIAGNOSTIC_CODES, type DiagnosticsLedger } from '../core/diagnostics.js';
import { UnknownNodeError } from './errors.js';
import { GRAMMAR } from './grammar.js';
import { createParseContext, reportError, type ParseContext } from './parse-context.js';
import { collectAnnotation, parseMethod, parseProperty, parseSignal } from './parse-members.js';
import { commentFor, insertUnique, requireAttributes, visitChildren } from './parse-validation.js';
import { parseXmlToAst, XmlParseError, type XmlNode } from './xml-ast.js';
import { isDocumentationNode, isSpecWrapper } from './xml-utils.js';

/** Parser entry options. */
export interface ParserOptions {
  /** Source identifier logged with diagnostics, usually the file path. */
  sourceName?: string;
  /**
   * Report every grammar violation to the ledger instead of throwing the first
   * one. A document with violations still yields no interfaces.
   */
  recover?: boolean;
  /** Ledger receiving diagnostics; a private one is used when omitted. */
  ledger?: DiagnosticsLedger;
}

/**
 * Parse D-Bus introspection XML into interfaces keyed by name.
 *
 * Without `recover`, the first grammar violation is thrown as an
 * `InterfaceParseError` subclass and malformed XML as `XmlParseError`. With
 * `recover`, violations are logged and the result is `undefined` whenever
 * anything was logged.
 */
export function parseIntrospectionXml(xmlText: string, options: ParserOptions = {}): InterfaceMap | undefined {
  const ctx = createParseContext(options);

  const root = parseRoot(xmlText, ctx);
  if (!root) {
    return undefined;
  }

  const interfaces = new Map<string, Interface>();
  visitChildren(ctx, root, 'node', 'root', (child) => {
    const parsed = parseInterface(ctx, child.node);
    if (parsed) {
      insertUnique(ctx, interfaces, parsed, child.node);
    }
  });

  return ctx.failed ? undefined : interfaces;
}

/** Parse XML text and locate the `<node>` interface set, unwrapping `tp:spec`. */
function parseRoot(xmlText: string, ctx: ParseContext): XmlNode | undefined {
  let root: XmlNode;
  try {
    root = parseXmlToAst(xmlText, ctx.sourceId);
  } catch (error) {
    if (!(error instanceof XmlParseError)) {
      throw error;
    }

    ctx.failed = true;
    ctx.ledger.log(ctx.sourceId, 'parser', DIAGNOSTIC_CODES.malformedXml, error.message, {
      source: error.source
    });
    if (!ctx.recover) {
      throw error;
    }
    return undefined;
  }

  if (isSpecWrapper(root)) {
    const inner = root.children.filter((child) => !isDocumentationNode(child));
    const only = inner.length === 1 ? inner[0] : undefined;
    if (only && isInterfaceSet(only)) {
      return only;
    }
  } else if (isInterfaceSet(root)) {
    return root;
  }

  reportError(ctx, new UnknownNodeError(root.qualifiedName, undefined, root));
  return undefined;
}

function isInterfaceSet(node: XmlNode): boolean {
  return node.namespace === '' && node.name === 'node';
}

/** Parse one `<interface>` and all of its members. */
function parseInterface(ctx: ParseContext, xml: XmlNode): Interface | undefined {
  if (!requireAttributes(ctx, xml, 'interface', GRAMMAR.interface.required)) {
    return undefined;
  }

  const methods = new Map<string, Method>();
  const signals = new Map<string, Signal>();
  const properties = new Map<string, Property>();
  const annotations = new Map<string, Annotation>();
  const iface: Interface = {
    kind: 'interface',
    name: xml.attributes.name,
    comment: commentFor(xml),
    methods,
    signals,
    properties,
    annotations
  };

  visitChildren(ctx, xml, 'interface', `interface '${iface.name}'`, (child) => {
    switch (child.kind) {
      case 'method': {
        const method = parseMethod(ctx, child.node, iface);
        if (method) {
          insertUnique(ctx, methods, method, child.node);
        }
        break;
      }
      case 'signal': {
        const signal = parseSignal(ctx, child.node, iface);
        if (signal) {
          insertUnique(ctx, signals, signal, child.node);
        }
        break;
      }
      case 'property': {
        const property = parseProperty(ctx, child.node, iface);
        if (property) {
          insertUnique(ctx, properties, property, child.node);
        }
        break;
      }
      default:
        collectAnnotation(ctx, child.node, iface, annotations);
        break;
    }
  });

  return iface;
}
