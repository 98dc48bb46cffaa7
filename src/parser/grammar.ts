/** Structural element names of the introspection vocabulary. */
export type ElementKind = 'node' | 'interface' | 'method' | 'signal' | 'property' | 'arg' | 'annotation';

/** What one element kind may contain and must declare. */
export interface ElementRule {
  /** Required attributes, in reporting order. */
  readonly required: readonly string[];
  /** Permitted structural children. Documentation elements are always permitted. */
  readonly children: readonly ElementKind[];
}

/**
 * Grammar of the introspection format. `node` is the interface set; its
 * optional `tp:spec` wrapper is handled by the root check, not by this table.
 */
export const GRAMMAR = {
  node: { required: [], children: ['interface'] },
  interface: { required: ['name'], children: ['method', 'signal', 'property', 'annotation'] },
  method: { required: ['name'], children: ['arg', 'annotation'] },
  signal: { required: ['name'], children: ['arg', 'annotation'] },
  property: { required: ['name', 'type', 'access'], children: ['annotation'] },
  arg: { required: ['type'], children: ['annotation'] },
  annotation: { required: ['name', 'value'], children: [] }
} as const satisfies Record<ElementKind, ElementRule>;

const ELEMENT_KINDS: ReadonlySet<string> = new Set(Object.keys(GRAMMAR));

export function isElementKind(name: string): name is ElementKind {
  return ELEMENT_KINDS.has(name);
}

/** True when `child` may appear directly inside `parent`. */
export function permitsChild(parent: ElementKind, child: ElementKind): boolean {
  const rule: ElementRule = GRAMMAR[parent];
  return rule.children.includes(child);
}
