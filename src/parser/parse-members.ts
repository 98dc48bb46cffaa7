import {
  displayName,
  type AnnotatedNode,
  type Annotation,
  type Argument,
  type Callable,
  type Interface,
  type Method,
  type Property,
  type Signal
} from '../core/ast.js';
import { GRAMMAR } from './grammar.js';
import type { ParseContext } from './parse-context.js';
import { commentFor, requireAttributes, visitChildren } from './parse-validation.js';
import type { XmlNode } from './xml-ast.js';
import { attribute } from './xml-utils.js';

/** Parse one `<method>`; undefined when its attributes are incomplete. */
export function parseMethod(ctx: ParseContext, xml: XmlNode, parent: Interface): Method | undefined {
  if (!requireAttributes(ctx, xml, 'method', GRAMMAR.method.required)) {
    return undefined;
  }

  const args: Argument[] = [];
  const annotations = new Map<string, Annotation>();
  const method: Method = {
    kind: 'method',
    name: xml.attributes.name,
    comment: commentFor(xml),
    parent,
    arguments: args,
    annotations
  };

  parseCallableChildren(ctx, xml, method, args, annotations);
  return method;
}

/** Parse one `<signal>`; undefined when its attributes are incomplete. */
export function parseSignal(ctx: ParseContext, xml: XmlNode, parent: Interface): Signal | undefined {
  if (!requireAttributes(ctx, xml, 'signal', GRAMMAR.signal.required)) {
    return undefined;
  }

  const args: Argument[] = [];
  const annotations = new Map<string, Annotation>();
  const signal: Signal = {
    kind: 'signal',
    name: xml.attributes.name,
    comment: commentFor(xml),
    parent,
    arguments: args,
    annotations
  };

  parseCallableChildren(ctx, xml, signal, args, annotations);
  return signal;
}

/** Parse one `<property>`; undefined when its attributes are incomplete. */
export function parseProperty(ctx: ParseContext, xml: XmlNode, parent: Interface): Property | undefined {
  if (!requireAttributes(ctx, xml, 'property', GRAMMAR.property.required)) {
    return undefined;
  }

  const annotations = new Map<string, Annotation>();
  const property: Property = {
    kind: 'property',
    name: xml.attributes.name,
    comment: commentFor(xml),
    parent,
    type: xml.attributes.type,
    access: xml.attributes.access,
    annotations
  };

  visitChildren(ctx, xml, 'property', `property '${property.name}'`, (child) => {
    collectAnnotation(ctx, child.node, property, annotations);
  });

  return property;
}

/**
 * Parse one `<arg>` at position `index`. A missing name is not an error:
 * the argument is reported as `unnamed` from then on.
 */
function parseArgument(
  ctx: ParseContext,
  xml: XmlNode,
  parent: Callable,
  index: number
): Argument | undefined {
  if (!requireAttributes(ctx, xml, 'arg', GRAMMAR.arg.required)) {
    return undefined;
  }

  const annotations = new Map<string, Annotation>();
  const argument: Argument = {
    kind: 'argument',
    name: attribute(xml, 'name') ?? '',
    comment: commentFor(xml),
    parent,
    index,
    type: xml.attributes.type,
    direction: attribute(xml, 'direction'),
    annotations
  };

  visitChildren(ctx, xml, 'arg', `argument '${displayName(argument)}'`, (child) => {
    collectAnnotation(ctx, child.node, argument, annotations);
  });

  return argument;
}

/**
 * Parse one `<annotation>` owned by `parent` into `target`. Later duplicates
 * replace earlier ones.
 */
export function collectAnnotation(
  ctx: ParseContext,
  xml: XmlNode,
  parent: AnnotatedNode,
  target: Map<string, Annotation>
): void {
  if (!requireAttributes(ctx, xml, 'annotation', GRAMMAR.annotation.required)) {
    return;
  }

  const annotation: Annotation = {
    kind: 'annotation',
    name: xml.attributes.name,
    comment: xml.comment,
    parent,
    value: xml.attributes.value,
    annotations: new Map<string, Annotation>()
  };

  // Annotations hold documentation children only, so nothing is visited.
  visitChildren(ctx, xml, 'annotation', `annotation '${annotation.name}'`, () => undefined);
  target.set(annotation.name, annotation);
}

/** Arguments and annotations of a method or signal, in document order. */
function parseCallableChildren(
  ctx: ParseContext,
  xml: XmlNode,
  owner: Callable,
  args: Argument[],
  annotations: Map<string, Annotation>
): void {
  visitChildren(ctx, xml, owner.kind, `${owner.kind} '${owner.name}'`, (child) => {
    if (child.kind === 'arg') {
      const argument = parseArgument(ctx, child.node, owner, args.length);
      if (argument) {
        args.push(argument);
      }
      return;
    }

    collectAnnotation(ctx, child.node, owner, annotations);
  });
}
