import {
  displayName,
  formatName,
  type Argument,
  type Callable,
  type Interface,
  type InterfaceMap,
  type Property
} from '../core/ast.js';
import { compareAnnotations, type DiffEntry } from './annotations.js';
import { categoryOf, Severity, WARNING_CATEGORIES, type WarningCategory } from './severity.js';

/**
 * Every difference between two interface sets, in emission order. Filtering
 * by category happens on read, so one comparison serves any filter.
 */
export interface CompatibilityReport {
  readonly entries: readonly DiffEntry[];
}

/**
 * Compare an old and a new interface set.
 *
 * Removed and changed interfaces come first, in old-document order, followed
 * by added interfaces in new-document order. Within one interface: methods,
 * properties, signals, then the interface's own annotations.
 */
export function compareInterfaceMaps(oldInterfaces: InterfaceMap, newInterfaces: InterfaceMap): CompatibilityReport {
  const entries: DiffEntry[] = [];

  for (const [name, oldInterface] of oldInterfaces) {
    const newInterface = newInterfaces.get(name);
    if (!newInterface) {
      entries.push(backwards(`Interface '${name}' has been removed.`));
      continue;
    }

    entries.push(...compareInterface(oldInterface, newInterface));
  }

  for (const name of newInterfaces.keys()) {
    if (!oldInterfaces.has(name)) {
      entries.push(forwards(`Interface '${name}' has been added.`));
    }
  }

  return { entries };
}

/** Entries whose severity category is enabled. Defaults to all categories. */
export function filterEntries(
  report: CompatibilityReport,
  enabled: Iterable<WarningCategory> = WARNING_CATEGORIES
): DiffEntry[] {
  const allowed = new Set(enabled);
  return report.entries.filter((entry) => allowed.has(categoryOf(entry.severity)));
}

export function hasBackwardsIncompatibilities(report: CompatibilityReport): boolean {
  return report.entries.some((entry) => entry.severity === Severity.BackwardsIncompatible);
}

function compareInterface(oldInterface: Interface, newInterface: Interface): DiffEntry[] {
  return [
    ...compareMembers('Method', oldInterface.methods, newInterface.methods, compareCallables),
    ...compareMembers('Property', oldInterface.properties, newInterface.properties, compareProperties),
    ...compareMembers('Signal', oldInterface.signals, newInterface.signals, compareCallables),
    ...compareAnnotations(oldInterface, newInterface)
  ];
}

/** Removed and changed members in old order, then added members in new order. */
function compareMembers<T extends Callable | Property>(
  label: 'Method' | 'Property' | 'Signal',
  oldMembers: ReadonlyMap<string, T>,
  newMembers: ReadonlyMap<string, T>,
  compareMember: (oldMember: T, newMember: T) => DiffEntry[]
): DiffEntry[] {
  const out: DiffEntry[] = [];

  for (const [name, oldMember] of oldMembers) {
    const newMember = newMembers.get(name);
    if (!newMember) {
      out.push(backwards(`${label} '${formatName(oldMember)}' has been removed.`));
      continue;
    }

    out.push(...compareMember(oldMember, newMember));
  }

  for (const [name, newMember] of newMembers) {
    if (!oldMembers.has(name)) {
      out.push(forwards(`${label} '${formatName(newMember)}' has been added.`));
    }
  }

  return out;
}

/**
 * Arguments are compared by position. Adding or removing one breaks existing
 * callers (and existing signal handlers) either way.
 */
function compareCallables(oldMember: Callable, newMember: Callable): DiffEntry[] {
  const out: DiffEntry[] = [];
  const count = Math.max(oldMember.arguments.length, newMember.arguments.length);

  for (let index = 0; index < count; index += 1) {
    const oldArgument = oldMember.arguments[index];
    const newArgument = newMember.arguments[index];

    if (oldArgument && newArgument) {
      out.push(...compareArguments(oldArgument, newArgument));
    } else if (newArgument) {
      out.push(
        backwards(
          `Argument ${formatName(newArgument)} of ${newMember.kind} '${formatName(newMember)}' has been added.`
        )
      );
    } else if (oldArgument) {
      out.push(
        backwards(
          `Argument ${formatName(oldArgument)} of ${oldMember.kind} '${formatName(oldMember)}' has been removed.`
        )
      );
    }
  }

  out.push(...compareAnnotations(oldMember, newMember));
  return out;
}

function compareArguments(oldArgument: Argument, newArgument: Argument): DiffEntry[] {
  const out: DiffEntry[] = [];
  const prefix = `Argument ${oldArgument.index} of '${formatName(oldArgument.parent)}' has changed`;

  if (oldArgument.name !== newArgument.name) {
    out.push({
      severity: Severity.Info,
      message: `${prefix} name from '${displayName(oldArgument)}' to '${displayName(newArgument)}'.`
    });
  }

  if (oldArgument.type !== newArgument.type) {
    out.push(backwards(`${prefix} type from '${oldArgument.type}' to '${newArgument.type}'.`));
  }

  if (oldArgument.direction !== newArgument.direction) {
    out.push(
      backwards(
        `${prefix} direction from '${oldArgument.direction ?? 'unspecified'}' to '${newArgument.direction ?? 'unspecified'}'.`
      )
    );
  }

  out.push(...compareAnnotations(oldArgument, newArgument));
  return out;
}

function compareProperties(oldProperty: Property, newProperty: Property): DiffEntry[] {
  const out: DiffEntry[] = [];
  const name = formatName(oldProperty);

  if (oldProperty.type !== newProperty.type) {
    out.push(backwards(`Property '${name}' has changed type from '${oldProperty.type}' to '${newProperty.type}'.`));
  }

  if ((oldProperty.access === 'read' || oldProperty.access === 'write') && newProperty.access === 'readwrite') {
    out.push(
      forwards(
        `Property '${name}' has changed access from '${oldProperty.access}' to '${newProperty.access}', becoming less restrictive.`
      )
    );
  } else if (oldProperty.access !== newProperty.access) {
    out.push(
      backwards(`Property '${name}' has changed access from '${oldProperty.access}' to '${newProperty.access}'.`)
    );
  }

  out.push(...compareAnnotations(oldProperty, newProperty));
  return out;
}

function backwards(message: string): DiffEntry {
  return { severity: Severity.BackwardsIncompatible, message };
}

function forwards(message: string): DiffEntry {
  return { severity: Severity.ForwardsIncompatible, message };
}
