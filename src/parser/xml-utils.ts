import type { XmlNode } from './xml-ast.js';

/** Telepathy specification extensions (`tp:` prefix by convention). */
export const TELEPATHY_NAMESPACE = 'http://telepathy.freedesktop.org/wiki/DbusSpec#extensions-v0';

/** D-Bus documentation extensions (`doc:` prefix by convention). */
export const DOC_NAMESPACE = 'http://www.freedesktop.org/dbus/1.0/doc.dtd';

/** Read attribute `name` from a node, if available. */
export function attribute(node: XmlNode | undefined, name: string): string | undefined {
  return node?.attributes[name];
}

/** True for documentation-only elements, which are never structural. */
export function isDocumentationNode(node: XmlNode): boolean {
  return node.namespace === TELEPATHY_NAMESPACE || node.namespace === DOC_NAMESPACE;
}

/** True for the `tp:spec` wrapper some specifications use as document root. */
export function isSpecWrapper(node: XmlNode): boolean {
  return node.namespace === TELEPATHY_NAMESPACE && node.name === 'spec';
}

/** Value of the last child annotation named `annotationName`, if any. */
export function childAnnotationValue(node: XmlNode, annotationName: string): string | undefined {
  const match = [...node.children].reverse().find(
    (child) =>
      child.name === 'annotation' && child.namespace === '' && attribute(child, 'name') === annotationName
  );
  return attribute(match, 'value');
}
