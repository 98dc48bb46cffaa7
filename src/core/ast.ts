/** Well-known annotation names with compatibility or documentation meaning. */
export const WELL_KNOWN_ANNOTATIONS = Object.freeze({
  deprecated: 'org.freedesktop.DBus.Deprecated',
  cSymbol: 'org.freedesktop.DBus.GLib.CSymbol',
  noReply: 'org.freedesktop.DBus.Method.NoReply',
  emitsChangedSignal: 'org.freedesktop.DBus.Property.EmitsChangedSignal',
  docString: 'org.gtk.GDBus.DocString'
} as const);

/** Discriminant shared by every AST node. */
export type AstNodeKind = 'interface' | 'method' | 'signal' | 'property' | 'argument' | 'annotation';

/** Fields every node carries. */
interface AstNodeBase {
  readonly kind: AstNodeKind;
  readonly name: string;
  /** Free text from a preceding XML comment or a DocString annotation. */
  readonly comment?: string;
  /** Annotations keyed by name; the last duplicate wins. */
  readonly annotations: ReadonlyMap<string, Annotation>;
}

export interface Interface extends AstNodeBase {
  readonly kind: 'interface';
  readonly methods: ReadonlyMap<string, Method>;
  readonly signals: ReadonlyMap<string, Signal>;
  readonly properties: ReadonlyMap<string, Property>;
}

export interface Method extends AstNodeBase {
  readonly kind: 'method';
  readonly parent: Interface;
  readonly arguments: readonly Argument[];
}

export interface Signal extends AstNodeBase {
  readonly kind: 'signal';
  readonly parent: Interface;
  readonly arguments: readonly Argument[];
}

/**
 * `type` is an opaque D-Bus type signature. `access` keeps the attribute text
 * as written; the format defines `read`, `write` and `readwrite`.
 */
export interface Property extends AstNodeBase {
  readonly kind: 'property';
  readonly parent: Interface;
  readonly type: string;
  readonly access: string;
}

/**
 * A method or signal parameter. `name` is empty for unnamed arguments;
 * `direction` is `in`, `out` or absent as written.
 */
export interface Argument extends AstNodeBase {
  readonly kind: 'argument';
  readonly parent: Method | Signal;
  readonly index: number;
  readonly type: string;
  readonly direction?: string;
}

export interface Annotation extends AstNodeBase {
  readonly kind: 'annotation';
  readonly parent: AnnotatedNode;
  readonly value: string;
}

/** Closed set of node variants. */
export type AstNode = Interface | Method | Signal | Property | Argument | Annotation;

/** Nodes that may own annotations. */
export type AnnotatedNode = Interface | Method | Signal | Property | Argument;

/** Nodes that own an argument list. */
export type Callable = Method | Signal;

/** Parse output: interfaces keyed by name, in document order. */
export type InterfaceMap = ReadonlyMap<string, Interface>;

/** Human-facing name of an argument; unnamed arguments read `unnamed`. */
export function displayName(argument: Argument): string {
  return argument.name.length > 0 ? argument.name : 'unnamed';
}

/** Qualified node name used in diagnostics and comparison messages. */
export function formatName(node: AstNode): string {
  switch (node.kind) {
    case 'interface':
      return node.name;
    case 'method':
    case 'signal':
    case 'property':
      return `${node.parent.name}.${node.name}`;
    case 'argument':
      return node.name.length > 0 ? `${node.index} ('${node.name}')` : `${node.index}`;
    case 'annotation':
      return `${formatName(node.parent)}@${node.name}`;
  }
}

/** Look up the value of annotation `name` on `node`, if present. */
export function annotationValue(node: AstNode, name: string): string | undefined {
  return node.annotations.get(name)?.value;
}
