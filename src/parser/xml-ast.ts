import { SaxesParser, type SaxesTag } from 'saxes';

/** Line and column origin for diagnostics and traceability. */
export interface XmlLocation {
  line: number;
  column: number;
}

/** Minimal immutable XML element shape consumed by the interface parser. */
export interface XmlNode {
  /** Namespace-local element name. */
  name: string;
  /** Element name as written, prefix included. */
  qualifiedName: string;
  /** Resolved namespace URI; empty when the element has none. */
  namespace: string;
  attributes: Record<string, string>;
  children: XmlNode[];
  /** Body of the comment immediately preceding this element, if any. */
  comment?: string;
  location: XmlLocation;
  path: string;
}

/** Parse failure wrapper that keeps source coordinates when available. */
export class XmlParseError extends Error {
  readonly source?: XmlLocation;

  constructor(message: string, source?: XmlLocation) {
    super(message);
    this.name = 'XmlParseError';
    this.source = source;
  }
}

/** Mutable node used while SAX callbacks are still building the tree. */
interface MutableXmlNode {
  name: string;
  qualifiedName: string;
  namespace: string;
  attributes: Record<string, string>;
  children: MutableXmlNode[];
  comment?: string;
  location: XmlLocation;
  path: string;
  childNameCount: Map<string, number>;
}

/**
 * Parse XML into a lightweight element tree with locations, stable XPath-like
 * paths and comment attachment. Text content is dropped: the introspection
 * vocabulary carries everything in attributes.
 */
export function parseXmlToAst(xmlText: string, sourceName?: string): XmlNode {
  const parser = new SaxesParser({
    xmlns: true,
    position: true,
    fileName: sourceName
  });

  let root: MutableXmlNode | undefined;
  const stack: MutableXmlNode[] = [];
  const openTagLocations: XmlLocation[] = [];
  let parseError: XmlParseError | undefined;
  // A comment only attaches to the very next element at the same level.
  let pendingComment: string | undefined;

  parser.on('error', (error) => {
    if (!parseError) {
      parseError = new XmlParseError(error.message, {
        line: parser.line,
        column: parser.column + 1
      });
    }
  });

  parser.on('comment', (text) => {
    pendingComment = text;
  });

  parser.on('opentagstart', () => {
    openTagLocations.push({
      line: parser.line,
      column: parser.column + 1
    });
  });

  parser.on('opentag', (tag) => {
    const start = openTagLocations.pop() ?? { line: parser.line, column: parser.column + 1 };
    const parent = stack.at(-1);
    const name = getNodeName(tag);

    const node: MutableXmlNode = {
      name,
      qualifiedName: tag.name,
      namespace: tag.uri ?? '',
      attributes: toAttributeMap(tag),
      children: [],
      location: start,
      path: buildPath(parent, name),
      childNameCount: new Map<string, number>()
    };
    if (pendingComment !== undefined) {
      node.comment = pendingComment;
      pendingComment = undefined;
    }

    if (parent) {
      parent.children.push(node);
    } else {
      root = node;
    }

    stack.push(node);
  });

  parser.on('closetag', () => {
    pendingComment = undefined;
    stack.pop();
  });

  parser.write(xmlText).close();

  if (parseError) {
    throw parseError;
  }

  if (!root) {
    throw new XmlParseError('No XML root element found');
  }

  return freezeNode(root);
}

/** Prefer namespace-local names so downstream logic can stay prefix-agnostic. */
function getNodeName(tag: SaxesTag): string {
  if (tag.local && tag.local.length > 0) {
    return tag.local;
  }

  const name = tag.name;
  const index = name.indexOf(':');
  return index === -1 ? name : name.slice(index + 1);
}

/** Normalize SAX attribute payload into plain string values keyed as written. */
function toAttributeMap(tag: SaxesTag): Record<string, string> {
  const out: Record<string, string> = {};

  for (const [key, value] of Object.entries(tag.attributes)) {
    out[key] = typeof value === 'string' ? value : value.value;
  }

  return out;
}

/** Build deterministic node paths with sibling indexes (for diagnostics). */
function buildPath(parent: MutableXmlNode | undefined, name: string): string {
  if (!parent) {
    return `/${name}[1]`;
  }

  const next = (parent.childNameCount.get(name) ?? 0) + 1;
  parent.childNameCount.set(name, next);
  return `${parent.path}/${name}[${next}]`;
}

/** Freeze mutable builder nodes into immutable AST nodes. */
function freezeNode(node: MutableXmlNode): XmlNode {
  const frozen: XmlNode = {
    name: node.name,
    qualifiedName: node.qualifiedName,
    namespace: node.namespace,
    attributes: node.attributes,
    children: node.children.map(freezeNode),
    location: node.location,
    path: node.path
  };
  if (node.comment !== undefined) {
    frozen.comment = node.comment;
  }
  return frozen;
}
