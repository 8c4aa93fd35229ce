/**
 * Class-graph types for hierarchy refactoring.
 *
 * Every node lives in one arena (see model.ts). Relationships such as the
 * supertype or the owning class are stored as ids, never as object
 * references, so the graph has no reference cycles.
 */

/** Visibility levels, ordered from narrowest to widest */
export type Visibility = 'private' | 'package-private' | 'protected' | 'public';

export const VISIBILITY_ORDER: readonly Visibility[] = [
  'private',
  'package-private',
  'protected',
  'public',
];

export type ClassId = number;
export type MemberId = number;

/** A method or constructor parameter */
export interface Parameter {
  name: string;
  /** Declared (or inferred) type text */
  type: string;
  /** Original parameter text, e.g. `count: number = 1` */
  text: string;
}

/** Leading comments and decorators carried with a member */
export interface MemberTrivia {
  /** Leading comment block, re-indented on print */
  docs: string | null;
  /** Raw decorator texts, e.g. `@Memoize()` */
  decorators: string[];
}

export interface MethodNode extends MemberTrivia {
  id: MemberId;
  name: string;
  parameters: Parameter[];
  returnType: string;
  /** False when the return type was inferred and is not printed */
  returnTypeIsExplicit: boolean;
  visibility: Visibility;
  /** Whether `public` was written out in source */
  explicitPublic: boolean;
  isAbstract: boolean;
  isStatic: boolean;
  isAsync: boolean;
  isOverride: boolean;
  /** Raw type parameter list including angle brackets */
  typeParameters: string | null;
  /** Block text including braces; null for abstract declarations */
  body: string | null;
  /** Overload signatures written before the implementation, from the name onward */
  overloads: string[];
  owner: ClassId;
}

export interface FieldNode extends MemberTrivia {
  id: MemberId;
  name: string;
  type: string;
  typeIsExplicit: boolean;
  visibility: Visibility;
  explicitPublic: boolean;
  isStatic: boolean;
  isReadonly: boolean;
  isOptional: boolean;
  isDefinite: boolean;
  initializer: string | null;
  /** Declared through a constructor parameter property */
  isParameterProperty: boolean;
  owner: ClassId;
}

/** A member the engine re-emits verbatim (constructor, accessor, index signature, static block) */
export interface OpaqueMember {
  kind: 'opaque';
  /** Accessor name, when the member introduces one */
  name: string | null;
  text: string;
}

/** Position of a member inside its class body */
export type MemberRef =
  | { kind: 'method'; id: MemberId }
  | { kind: 'field'; id: MemberId }
  | OpaqueMember;

export interface ClassNode {
  id: ClassId;
  name: string;
  /** `<module path relative to the model root, no extension>#<ClassName>` */
  qualifiedName: string;
  filePath: string;
  /** Supertype inside the model; null at the top or when the supertype is external */
  superclass: ClassId | null;
  /** Raw `extends` expression text, kept even when the supertype is external */
  extendsText: string | null;
  implementsText: string | null;
  typeParameters: string | null;
  /** Names declared in `typeParameters` */
  typeParameterNames: string[];
  isAbstract: boolean;
  isExported: boolean;
  isDefaultExport: boolean;
  decorators: string[];
  /** Constructor parameters, or null when the class declares no constructor */
  constructorParameters: Parameter[] | null;
  members: MemberRef[];
  /** Indentation of the class keyword line */
  indent: string;
  /** Indentation used for members */
  memberIndent: string;
  /** Span of the declaration in the original file content */
  span: { start: number; end: number };
}

/** A named binding introduced by an import declaration */
export interface ImportBinding {
  /** Local name in the importing file */
  localName: string;
  /** Exported name in the source module ('default' for default imports) */
  importedName: string;
  specifier: string;
  typeOnly: boolean;
}

/** The package a source file belongs to */
export interface PackageInfo {
  /** Directory holding the package.json */
  root: string;
  name: string | null;
  version: string | null;
}

/** Per-file facts recorded by the model builder */
export interface SourceFileInfo {
  filePath: string;
  content: string;
  package: PackageInfo | null;
  imports: ImportBinding[];
  /** Top-level declarations (types, classes, functions, variables) and whether they are exported */
  declarations: Map<string, { exported: boolean }>;
  /** Top-level function parameter lists, used to type call arguments */
  functions: Map<string, Parameter[]>;
  classIds: ClassId[];
}

/** Node kinds the engine hands around when it does not care which one it has */
export type MemberNode =
  | { kind: 'method'; node: MethodNode }
  | { kind: 'field'; node: FieldNode };
