export { compareInterfaces, parseInterfaceFile, parseInterfaces, type ParseOptions } from './api.js';
export {
  annotationValue,
  displayName,
  formatName,
  WELL_KNOWN_ANNOTATIONS,
  type AnnotatedNode,
  type Annotation,
  type Argument,
  type AstNode,
  type AstNodeKind,
  type Callable,
  type Interface,
  type InterfaceMap,
  type Method,
  type Property,
  type Signal
} from '../core/ast.js';
export {
  DIAGNOSTIC_CODES,
  DiagnosticsLedger,
  type Diagnostic,
  type DiagnosticCode,
  type DiagnosticSource,
  type DiagnosticStage
} from '../core/diagnostics.js';
export {
  DuplicateNodeError,
  InterfaceParseError,
  MissingAttributeError,
  UnknownNodeError,
  type UniqueNodeKind
} from '../parser/errors.js';
export { XmlParseError } from '../parser/xml-ast.js';
export {
  filterEntries,
  hasBackwardsIncompatibilities,
  type CompatibilityReport
} from '../compare/comparator.js';
export { EMITS_CHANGED_TRANSITIONS, type DiffEntry, type EmitsChangedSignal } from '../compare/annotations.js';
export {
  categoryOf,
  formatSeverity,
  Severity,
  WARNING_CATEGORIES,
  type WarningCategory
} from '../compare/severity.js';
