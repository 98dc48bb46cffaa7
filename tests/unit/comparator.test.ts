import { describe, expect, it } from 'vitest';

import {
  compareInterfaceMaps,
  filterEntries,
  hasBackwardsIncompatibilities
} from '../../src/compare/comparator.js';
import { Severity } from '../../src/compare/severity.js';
import type { InterfaceMap } from '../../src/core/ast.js';
import { parseIntrospectionXml } from '../../src/parser/parse.js';

function parse(xml: string): InterfaceMap {
  const interfaces = parseIntrospectionXml(xml);
  if (!interfaces) {
    throw new Error('expected the document to parse');
  }
  return interfaces;
}

function node(body: string): InterfaceMap {
  return parse(`<node>${body}</node>`);
}

const RICH = node(
  "<interface name='com.example.A'>" +
    "<annotation name='org.freedesktop.DBus.Property.EmitsChangedSignal' value='invalidates'/>" +
    "<method name='Get'><arg name='key' type='s' direction='in'/><arg type='v' direction='out'/></method>" +
    "<method name='Ping'><annotation name='org.freedesktop.DBus.Method.NoReply' value='true'/></method>" +
    "<signal name='Changed'><arg name='key' type='s'/></signal>" +
    "<property name='Size' type='t' access='read'><annotation name='org.freedesktop.DBus.Deprecated' value='true'/></property>" +
    '</interface>' +
    "<interface name='com.example.B'/>"
);

describe('interface comparator', () => {
  it('reports nothing when comparing a model with itself', () => {
    expect(compareInterfaceMaps(RICH, RICH).entries).toEqual([]);
  });

  it('reports nothing for two parses of the same document', () => {
    const body = "<interface name='I'><method name='M'><arg type='s'/></method></interface>";

    expect(compareInterfaceMaps(node(body), node(body)).entries).toEqual([]);
  });

  it('reports a removed interface', () => {
    const report = compareInterfaceMaps(node("<interface name='I'/>"), node(''));

    expect(report.entries).toEqual([
      { severity: Severity.BackwardsIncompatible, message: "Interface 'I' has been removed." }
    ]);
  });

  it('treats an empty old set as everything added', () => {
    const report = compareInterfaceMaps(new Map(), RICH);

    expect(report.entries).toEqual([
      { severity: Severity.ForwardsIncompatible, message: "Interface 'com.example.A' has been added." },
      { severity: Severity.ForwardsIncompatible, message: "Interface 'com.example.B' has been added." }
    ]);
  });

  it('treats an empty new set as everything removed', () => {
    const report = compareInterfaceMaps(RICH, new Map());

    expect(report.entries.map((entry) => entry.severity)).toEqual([
      Severity.BackwardsIncompatible,
      Severity.BackwardsIncompatible
    ]);
  });

  it('orders removals and changes before additions', () => {
    const report = compareInterfaceMaps(
      node("<interface name='Old'/><interface name='Kept'><method name='Gone'/></interface>"),
      node("<interface name='New'/><interface name='Kept'/>")
    );

    expect(report.entries.map((entry) => entry.message)).toEqual([
      "Interface 'Old' has been removed.",
      "Method 'Kept.Gone' has been removed.",
      "Interface 'New' has been added."
    ]);
  });

  it('orders members as methods, properties, signals, then interface annotations', () => {
    const report = compareInterfaceMaps(
      node(
        "<interface name='I'><signal name='S'/><property name='P' type='s' access='read'/><method name='M'/></interface>"
      ),
      node(
        "<interface name='I'><annotation name='org.freedesktop.DBus.Deprecated' value='true'/>" +
          "<method name='M2'/></interface>"
      )
    );

    expect(report.entries).toEqual([
      { severity: Severity.BackwardsIncompatible, message: "Method 'I.M' has been removed." },
      { severity: Severity.ForwardsIncompatible, message: "Method 'I.M2' has been added." },
      { severity: Severity.BackwardsIncompatible, message: "Property 'I.P' has been removed." },
      { severity: Severity.BackwardsIncompatible, message: "Signal 'I.S' has been removed." },
      { severity: Severity.Info, message: "Node 'I' has been deprecated." }
    ]);
  });

  it('classifies property type and access changes', () => {
    const report = compareInterfaceMaps(
      node("<interface name='I'><property name='P' type='s' access='read'/></interface>"),
      node("<interface name='I'><property name='P' type='i' access='readwrite'/></interface>")
    );

    expect(report.entries).toEqual([
      { severity: Severity.BackwardsIncompatible, message: "Property 'I.P' has changed type from 's' to 'i'." },
      {
        severity: Severity.ForwardsIncompatible,
        message: "Property 'I.P' has changed access from 'read' to 'readwrite', becoming less restrictive."
      }
    ]);
  });

  it('treats restricting property access as backwards-incompatible', () => {
    const report = compareInterfaceMaps(
      node("<interface name='I'><property name='P' type='s' access='readwrite'/></interface>"),
      node("<interface name='I'><property name='P' type='s' access='write'/></interface>")
    );

    expect(report.entries).toEqual([
      {
        severity: Severity.BackwardsIncompatible,
        message: "Property 'I.P' has changed access from 'readwrite' to 'write'."
      }
    ]);
  });

  it('compares method arguments by position', () => {
    const report = compareInterfaceMaps(
      node(
        "<interface name='I'><method name='M'>" +
          "<arg name='a' type='s' direction='in'/><arg type='i' direction='in'/><arg name='gone' type='b'/>" +
          '</method></interface>'
      ),
      node(
        "<interface name='I'><method name='M'>" +
          "<arg type='s' direction='in'/><arg name='b' type='u' direction='out'/>" +
          '</method></interface>'
      )
    );

    expect(report.entries).toEqual([
      { severity: Severity.Info, message: "Argument 0 of 'I.M' has changed name from 'a' to 'unnamed'." },
      { severity: Severity.Info, message: "Argument 1 of 'I.M' has changed name from 'unnamed' to 'b'." },
      { severity: Severity.BackwardsIncompatible, message: "Argument 1 of 'I.M' has changed type from 'i' to 'u'." },
      {
        severity: Severity.BackwardsIncompatible,
        message: "Argument 1 of 'I.M' has changed direction from 'in' to 'out'."
      },
      {
        severity: Severity.BackwardsIncompatible,
        message: "Argument 2 ('gone') of method 'I.M' has been removed."
      }
    ]);
  });

  it('treats an added signal argument as backwards-incompatible', () => {
    const report = compareInterfaceMaps(
      node("<interface name='I'><signal name='S'/></interface>"),
      node("<interface name='I'><signal name='S'><arg type='s'/></signal></interface>")
    );

    expect(report.entries).toEqual([
      { severity: Severity.BackwardsIncompatible, message: "Argument 0 of signal 'I.S' has been added." }
    ]);
  });

  it('reports a method losing its no-reply annotation', () => {
    const report = compareInterfaceMaps(
      node(
        "<interface name='I'><method name='M'>" +
          "<annotation name='org.freedesktop.DBus.Method.NoReply' value='true'/></method></interface>"
      ),
      node("<interface name='I'><method name='M'/></interface>")
    );

    expect(report.entries).toEqual([
      { severity: Severity.BackwardsIncompatible, message: "Node 'I.M' now returns a reply." }
    ]);
  });

  it('compares argument annotations', () => {
    const report = compareInterfaceMaps(
      node("<interface name='I'><method name='M'><arg name='x' type='s'/></method></interface>"),
      node(
        "<interface name='I'><method name='M'><arg name='x' type='s'>" +
          "<annotation name='org.freedesktop.DBus.Deprecated' value='true'/></arg></method></interface>"
      )
    );

    expect(report.entries).toEqual([{ severity: Severity.Info, message: "Node '0 ('x')' has been deprecated." }]);
  });

  it('reports a missing direction as unspecified', () => {
    const report = compareInterfaceMaps(
      node("<interface name='I'><method name='M'><arg type='s'/></method></interface>"),
      node("<interface name='I'><method name='M'><arg type='s' direction='in'/></method></interface>")
    );

    expect(report.entries).toEqual([
      {
        severity: Severity.BackwardsIncompatible,
        message: "Argument 0 of 'I.M' has changed direction from 'unspecified' to 'in'."
      }
    ]);
  });
});

describe('report filtering', () => {
  const report = compareInterfaceMaps(
    node("<interface name='Gone'/><interface name='I'><method name='M'><arg name='a' type='s'/></method></interface>"),
    node("<interface name='I'><method name='M'><arg name='b' type='s'/></method></interface><interface name='New'/>")
  );

  it('keeps every entry by default', () => {
    expect(filterEntries(report)).toHaveLength(3);
  });

  it('filters by category on read without changing the stored report', () => {
    expect(filterEntries(report, ['info']).map((entry) => entry.message)).toEqual([
      "Argument 0 of 'I.M' has changed name from 'a' to 'b'."
    ]);
    expect(filterEntries(report, ['forwards-compatibility']).map((entry) => entry.message)).toEqual([
      "Interface 'New' has been added."
    ]);
    expect(filterEntries(report, [])).toEqual([]);
    expect(report.entries).toHaveLength(3);
  });

  it('detects backwards incompatibilities', () => {
    expect(hasBackwardsIncompatibilities(report)).toBe(true);
    expect(hasBackwardsIncompatibilities(compareInterfaceMaps(new Map(), RICH))).toBe(false);
  });
});
