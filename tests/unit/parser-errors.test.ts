import { describe, expect, it } from 'vitest';

import { DiagnosticsLedger } from '../../src/core/diagnostics.js';
import {
  DuplicateNodeError,
  InterfaceParseError,
  MissingAttributeError,
  UnknownNodeError
} from '../../src/parser/errors.js';
import { parseIntrospectionXml } from '../../src/parser/parse.js';
import { XmlParseError } from '../../src/parser/xml-ast.js';

type ErrorClass = new (...args: never[]) => InterfaceParseError;

/** Assert that fail-fast parsing throws `errorClass` with exactly `message`. */
function expectParseFailure(xml: string, errorClass: ErrorClass, message: string): void {
  let caught: unknown;
  try {
    parseIntrospectionXml(xml);
  } catch (error) {
    caught = error;
  }

  expect(caught).toBeInstanceOf(errorClass);
  expect(caught).toBeInstanceOf(InterfaceParseError);
  expect(caught instanceof Error ? caught.message : undefined).toBe(message);
}

describe('fail-fast parser errors', () => {
  it('rejects an unknown root node', () => {
    expectParseFailure('<notnode><irrelevant/></notnode>', UnknownNodeError, "Unknown root node 'notnode'.");
  });

  it('rejects a duplicate interface', () => {
    expectParseFailure(
      "<node><interface name='I'/><interface name='I'/></node>",
      DuplicateNodeError,
      "Duplicate interface definition 'I'."
    );
  });

  it('rejects an unknown node in the root', () => {
    expectParseFailure('<node><badnode/></node>', UnknownNodeError, "Unknown node 'badnode' in root.");
  });

  it('rejects an interface without a name', () => {
    expectParseFailure(
      '<node><interface/></node>',
      MissingAttributeError,
      "Missing required attribute 'name' in interface."
    );
  });

  it('rejects a duplicate method', () => {
    expectParseFailure(
      "<node><interface name='I'><method name='M'/><method name='M'/></interface></node>",
      DuplicateNodeError,
      "Duplicate method definition 'I.M'."
    );
  });

  it('rejects a duplicate signal', () => {
    expectParseFailure(
      "<node><interface name='I'><signal name='S'/><signal name='S'/></interface></node>",
      DuplicateNodeError,
      "Duplicate signal definition 'I.S'."
    );
  });

  it('rejects a duplicate property', () => {
    expectParseFailure(
      "<node><interface name='I'>" +
        "<property name='P' type='s' access='readwrite'/>" +
        "<property name='P' type='s' access='readwrite'/>" +
        '</interface></node>',
      DuplicateNodeError,
      "Duplicate property definition 'I.P'."
    );
  });

  it('allows a method and a signal to share a name', () => {
    const interfaces = parseIntrospectionXml(
      "<node><interface name='I'><method name='Changed'/><signal name='Changed'/></interface></node>"
    );

    expect(interfaces?.get('I')?.methods.has('Changed')).toBe(true);
    expect(interfaces?.get('I')?.signals.has('Changed')).toBe(true);
  });

  it('rejects an unknown node in an interface', () => {
    expectParseFailure(
      "<node><interface name='I'><badnode/></interface></node>",
      UnknownNodeError,
      "Unknown node 'badnode' in interface 'I'."
    );
  });

  it('rejects a method without a name', () => {
    expectParseFailure(
      "<node><interface name='I'><method/></interface></node>",
      MissingAttributeError,
      "Missing required attribute 'name' in method."
    );
  });

  it('rejects an unknown node in a method', () => {
    expectParseFailure(
      "<node><interface name='I'><method name='M'><badnode/></method></interface></node>",
      UnknownNodeError,
      "Unknown node 'badnode' in method 'M'."
    );
  });

  it('rejects a signal without a name', () => {
    expectParseFailure(
      "<node><interface name='I'><signal/></interface></node>",
      MissingAttributeError,
      "Missing required attribute 'name' in signal."
    );
  });

  it('rejects an unknown node in a signal', () => {
    expectParseFailure(
      "<node><interface name='I'><signal name='S'><badnode/></signal></interface></node>",
      UnknownNodeError,
      "Unknown node 'badnode' in signal 'S'."
    );
  });

  it.each([
    ["<property type='s' access='readwrite'/>", 'name'],
    ["<property name='P' access='readwrite'/>", 'type'],
    ["<property name='P' type='s'/>", 'access']
  ])('rejects a property missing an attribute: %s', (property, attributeName) => {
    expectParseFailure(
      `<node><interface name='I'>${property}</interface></node>`,
      MissingAttributeError,
      `Missing required attribute '${attributeName}' in property.`
    );
  });

  it('reports the first missing property attribute in grammar order', () => {
    expectParseFailure(
      "<node><interface name='I'><property/></interface></node>",
      MissingAttributeError,
      "Missing required attribute 'name' in property."
    );
  });

  it('rejects an unknown node in a property', () => {
    expectParseFailure(
      "<node><interface name='I'><property name='P' type='s' access='readwrite'><badnode/></property></interface></node>",
      UnknownNodeError,
      "Unknown node 'badnode' in property 'P'."
    );
  });

  it('rejects an unknown node in an unnamed argument', () => {
    expectParseFailure(
      "<node><interface name='I'><method name='M'><arg type='s'><badnode/></arg></method></interface></node>",
      UnknownNodeError,
      "Unknown node 'badnode' in argument 'unnamed'."
    );
  });

  it('names a named argument in its context', () => {
    expectParseFailure(
      "<node><interface name='I'><method name='M'><arg name='x' type='s'><badnode/></arg></method></interface></node>",
      UnknownNodeError,
      "Unknown node 'badnode' in argument 'x'."
    );
  });

  it('rejects an argument without a type', () => {
    expectParseFailure(
      "<node><interface name='I'><method name='M'><arg/></method></interface></node>",
      MissingAttributeError,
      "Missing required attribute 'type' in arg."
    );
  });

  it('rejects an annotation without a name', () => {
    expectParseFailure(
      "<node><interface name='I'><annotation value='V'/></interface></node>",
      MissingAttributeError,
      "Missing required attribute 'name' in annotation."
    );
  });

  it('rejects an annotation without a value', () => {
    expectParseFailure(
      "<node><interface name='I'><annotation name='N'/></interface></node>",
      MissingAttributeError,
      "Missing required attribute 'value' in annotation."
    );
  });

  it('rejects an unknown node in an annotation', () => {
    expectParseFailure(
      "<node><interface name='I'><annotation name='N' value='V'><badnode/></annotation></interface></node>",
      UnknownNodeError,
      "Unknown node 'badnode' in annotation 'N'."
    );
  });

  it('rejects a vendor wrapper that does not contain an interface set', () => {
    expectParseFailure(
      "<tp:spec xmlns:tp='http://telepathy.freedesktop.org/wiki/DbusSpec#extensions-v0'><other/></tp:spec>",
      UnknownNodeError,
      "Unknown root node 'tp:spec'."
    );
  });

  it('throws XmlParseError for documents that are not well-formed', () => {
    expect(() => parseIntrospectionXml('<node><interface name="I"></node>')).toThrow(XmlParseError);
  });

  it('logs the thrown failure to the ledger as well', () => {
    const ledger = new DiagnosticsLedger();

    expect(() =>
      parseIntrospectionXml('<node><interface/><interface/></node>', { ledger, sourceName: 'bad.xml' })
    ).toThrow(MissingAttributeError);
    expect(ledger.entries).toHaveLength(1);
    expect(ledger.entries[0]).toMatchObject({
      sourceId: 'bad.xml',
      stage: 'parser',
      code: 'missing-attribute',
      xmlPath: '/node[1]/interface[1]'
    });
  });

  it('attaches the element location to the failure', () => {
    let caught: unknown;
    try {
      parseIntrospectionXml('<node>\n  <interface name="I">\n    <bogus/>\n  </interface>\n</node>');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(UnknownNodeError);
    if (caught instanceof UnknownNodeError) {
      expect(caught.source?.line).toBe(3);
      expect(caught.xmlPath).toBe('/node[1]/interface[1]/bogus[1]');
      expect(caught.tag).toBe('bogus');
      expect(caught.context).toBe("interface 'I'");
    }
  });
});
