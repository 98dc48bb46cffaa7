import { DIAGNOSTIC_CODES, type DiagnosticCode } from '../core/diagnostics.js';
import type { XmlLocation, XmlNode } from './xml-ast.js';

/** Base class of every grammar violation the interface parser raises. */
export class InterfaceParseError extends Error {
  readonly code: DiagnosticCode;
  readonly source?: XmlLocation;
  readonly xmlPath?: string;

  constructor(message: string, code: DiagnosticCode, node?: XmlNode) {
    super(message);
    this.name = 'InterfaceParseError';
    this.code = code;
    this.source = node?.location;
    this.xmlPath = node?.path;
  }
}

/**
 * An element appeared where the grammar forbids it. `context` is undefined
 * for the document root.
 */
export class UnknownNodeError extends InterfaceParseError {
  readonly tag: string;
  readonly context?: string;

  constructor(tag: string, context: string | undefined, node?: XmlNode) {
    super(
      context === undefined ? `Unknown root node '${tag}'.` : `Unknown node '${tag}' in ${context}.`,
      context === undefined ? DIAGNOSTIC_CODES.unknownRootNode : DIAGNOSTIC_CODES.unknownNode,
      node
    );
    this.name = 'UnknownNodeError';
    this.tag = tag;
    this.context = context;
  }
}

/** A required attribute is absent. */
export class MissingAttributeError extends InterfaceParseError {
  readonly attribute: string;
  readonly element: string;

  constructor(attribute: string, element: string, node?: XmlNode) {
    super(`Missing required attribute '${attribute}' in ${element}.`, DIAGNOSTIC_CODES.missingAttribute, node);
    this.name = 'MissingAttributeError';
    this.attribute = attribute;
    this.element = element;
  }
}

/** Node kinds whose names must be unique within their container. */
export type UniqueNodeKind = 'interface' | 'method' | 'signal' | 'property';

/** A name collides with a same-kind sibling. */
export class DuplicateNodeError extends InterfaceParseError {
  readonly kind: UniqueNodeKind;
  readonly qualifiedName: string;

  constructor(kind: UniqueNodeKind, qualifiedName: string, node?: XmlNode) {
    super(`Duplicate ${kind} definition '${qualifiedName}'.`, DIAGNOSTIC_CODES.duplicateNode, node);
    this.name = 'DuplicateNodeError';
    this.kind = kind;
    this.qualifiedName = qualifiedName;
  }
}
