import * as ts from 'typescript';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { glob } from 'glob';
import { SourceModel, stripExtension } from '../graph/model.js';
import type {
  ClassNode,
  FieldNode,
  ImportBinding,
  MethodNode,
  PackageInfo,
  Parameter,
  Visibility,
} from '../graph/types.js';
import type { ModelBuildOptions, PackageLocator, SourceInput } from './types.js';

export const DEFAULT_IGNORE = ['**/node_modules/**', '**/dist/**', '**/*.d.ts', '**/.hoist/**'];

/**
 * Discover every TypeScript file under the given roots and build a model of
 * their class declarations.
 */
export async function buildSourceModel(roots: string[], options: ModelBuildOptions): Promise<SourceModel> {
  const files: SourceInput[] = [];
  const seen = new Set<string>();

  for (const root of roots) {
    const cwd = path.resolve(options.rootDir, root);
    if (!fs.existsSync(cwd)) continue;

    const matches = await glob('**/*.{ts,tsx}', {
      cwd,
      absolute: true,
      ignore: [...DEFAULT_IGNORE, ...(options.ignore ?? [])],
    });

    for (const filePath of matches.sort()) {
      if (seen.has(filePath)) continue;
      seen.add(filePath);
      files.push({ filePath, content: fs.readFileSync(filePath, 'utf-8') });
    }
  }

  return buildModelFromSources(files, {
    ...options,
    packages: options.packages ?? new DiskPackageLocator(),
  });
}

/** Build a model from sources already in memory */
export function buildModelFromSources(files: SourceInput[], options: ModelBuildOptions): SourceModel {
  return new TypeScriptModelBuilder(options).build(files);
}

/**
 * Resolve a relative import specifier to a file of the model, trying the
 * `.js` to `.ts` mapping and index files.
 */
export function resolveModuleFile(model: SourceModel, fromFile: string, specifier: string): string | undefined {
  if (!specifier.startsWith('.')) return undefined;

  const base = path.resolve(path.dirname(fromFile), specifier.replace(/\.(js|mjs|jsx)$/, ''));
  const candidates = [base, `${base}.ts`, `${base}.tsx`, path.join(base, 'index.ts'), path.join(base, 'index.tsx')];
  return candidates.find(candidate => model.getFile(candidate) !== undefined);
}

/** The module path used in qualified class names */
export function modulePath(rootDir: string, filePath: string): string {
  return stripExtension(path.relative(rootDir, filePath).replace(/\\/g, '/'));
}

// ============================================================================
// Packages
// ============================================================================

/**
 * Finds the nearest package.json above a file. Results are cached per
 * directory.
 */
export class DiskPackageLocator implements PackageLocator {
  private readonly cache = new Map<string, PackageInfo | null>();

  locate(filePath: string): PackageInfo | null {
    return this.locateDir(path.dirname(filePath));
  }

  private locateDir(dir: string): PackageInfo | null {
    const cached = this.cache.get(dir);
    if (cached !== undefined) return cached;

    let result: PackageInfo | null;
    const manifestPath = path.join(dir, 'package.json');
    if (fs.existsSync(manifestPath)) {
      result = readPackageInfo(dir, manifestPath);
    } else {
      const parent = path.dirname(dir);
      result = parent === dir ? null : this.locateDir(parent);
    }

    this.cache.set(dir, result);
    return result;
  }
}

function readPackageInfo(root: string, manifestPath: string): PackageInfo {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(manifestPath, 'utf-8'));
    if (typeof parsed !== 'object' || parsed === null) {
      return { root, name: null, version: null };
    }
    const name = 'name' in parsed && typeof parsed.name === 'string' ? parsed.name : null;
    const version = 'version' in parsed && typeof parsed.version === 'string' ? parsed.version : null;
    return { root, name, version };
  } catch {
    // Unreadable manifests still mark a package boundary
    return { root, name: null, version: null };
  }
}

// ============================================================================
// Builder
// ============================================================================

interface PendingSuperclass {
  cls: ClassNode;
  baseName: string | null;
}

/**
 * Parses TypeScript sources into a SourceModel. Missing types are filled
 * in lazily from a type-checker program over the same sources.
 */
export class TypeScriptModelBuilder {
  private readonly sources = new Map<string, string>();
  private program: ts.Program | null = null;

  constructor(private readonly options: ModelBuildOptions) {}

  // --- Public API Methods ---

  build(files: SourceInput[]): SourceModel {
    const model = new SourceModel(this.options.rootDir);
    const pending: PendingSuperclass[] = [];

    for (const file of files) {
      this.sources.set(file.filePath, file.content);
    }

    for (const file of files) {
      const sourceFile = ts.createSourceFile(
        file.filePath,
        file.content,
        ts.ScriptTarget.Latest,
        true,
        this.getScriptKind(file.filePath)
      );

      model.addFile({
        filePath: file.filePath,
        content: file.content,
        package: this.options.packages?.locate(file.filePath) ?? null,
        imports: this.collectImports(sourceFile),
        declarations: this.collectDeclarations(sourceFile),
        functions: this.collectFunctions(sourceFile),
        classIds: [],
      });

      for (const statement of sourceFile.statements) {
        if (ts.isClassDeclaration(statement) && statement.name) {
          pending.push(this.readClass(model, statement, sourceFile));
        }
      }
    }

    // Superclasses may live in files parsed later, so resolve them last
    for (const { cls, baseName } of pending) {
      cls.superclass = baseName ? this.resolveClassName(model, baseName, cls.filePath) : null;
    }

    model.clearChanges();
    return model;
  }

  // --- Class Reading ---

  private readClass(model: SourceModel, node: ts.ClassDeclaration, sourceFile: ts.SourceFile): PendingSuperclass {
    const content = sourceFile.text;
    const start = node.getStart(sourceFile);
    const name = node.name?.text ?? 'default';
    const indent = lineIndent(content, start);

    const extendsClause = node.heritageClauses?.find(h => h.token === ts.SyntaxKind.ExtendsKeyword);
    const implementsClause = node.heritageClauses?.find(h => h.token === ts.SyntaxKind.ImplementsKeyword);
    const base = extendsClause?.types[0];

    const firstMember = node.members[0];
    const memberIndent =
      firstMember && lineStart(content, firstMember.getStart(sourceFile)) !== lineStart(content, start)
        ? lineIndent(content, firstMember.getStart(sourceFile))
        : indent + '  ';

    const cls = model.addClass({
      name,
      qualifiedName: `${modulePath(this.options.rootDir, sourceFile.fileName)}#${name}`,
      filePath: sourceFile.fileName,
      superclass: null,
      extendsText: base ? base.getText(sourceFile) : null,
      implementsText: implementsClause ? implementsClause.types.map(t => t.getText(sourceFile)).join(', ') : null,
      typeParameters: node.typeParameters
        ? `<${node.typeParameters.map(t => t.getText(sourceFile)).join(', ')}>`
        : null,
      typeParameterNames: node.typeParameters?.map(t => t.name.text) ?? [],
      isAbstract: this.hasModifier(node, ts.SyntaxKind.AbstractKeyword),
      isExported: this.hasModifier(node, ts.SyntaxKind.ExportKeyword),
      isDefaultExport: this.hasModifier(node, ts.SyntaxKind.DefaultKeyword),
      decorators: ts.getDecorators(node)?.map(d => d.getText(sourceFile)) ?? [],
      constructorParameters: null,
      indent,
      memberIndent,
      span: { start, end: node.getEnd() },
    });

    this.readMembers(model, cls, node, sourceFile);

    const baseName = base && ts.isIdentifier(base.expression) ? base.expression.text : null;
    return { cls, baseName };
  }

  private readMembers(model: SourceModel, cls: ClassNode, node: ts.ClassDeclaration, sourceFile: ts.SourceFile): void {
    let overloads: string[] = [];

    for (const member of node.members) {
      if (ts.isSemicolonClassElement(member)) continue;

      if (ts.isMethodDeclaration(member) && ts.isIdentifier(member.name)) {
        if (!member.body && !this.hasModifier(member, ts.SyntaxKind.AbstractKeyword)) {
          overloads.push(this.overloadText(member, sourceFile));
          continue;
        }
        model.addMethod(cls.id, this.readMethod(member, sourceFile, cls, overloads));
        overloads = [];
      } else if (ts.isPropertyDeclaration(member) && ts.isIdentifier(member.name)) {
        model.addField(cls.id, this.readField(member, sourceFile), 'end');
      } else if (ts.isConstructorDeclaration(member)) {
        if (member.body) {
          cls.constructorParameters = member.parameters.map(p => this.readParameter(p, sourceFile));
          this.readParameterProperties(model, cls, member, sourceFile);
        }
        model.addOpaque(cls.id, { kind: 'opaque', name: null, text: this.opaqueText(member, sourceFile, cls) });
      } else {
        model.addOpaque(cls.id, {
          kind: 'opaque',
          name: this.opaqueName(member),
          text: this.opaqueText(member, sourceFile, cls),
        });
      }
    }
  }

  private readMethod(
    member: ts.MethodDeclaration,
    sourceFile: ts.SourceFile,
    cls: ClassNode,
    overloads: string[]
  ): Omit<MethodNode, 'id' | 'owner'> {
    const docs = this.leadingDocs(member, sourceFile);

    return {
      name: member.name.getText(sourceFile),
      parameters: member.parameters.map(p => this.readParameter(p, sourceFile)),
      returnType: member.type
        ? member.type.getText(sourceFile)
        : this.inferType(member, sourceFile) ?? 'any',
      returnTypeIsExplicit: member.type !== undefined,
      visibility: this.readVisibility(member, docs),
      explicitPublic: this.hasModifier(member, ts.SyntaxKind.PublicKeyword),
      isAbstract: this.hasModifier(member, ts.SyntaxKind.AbstractKeyword),
      isStatic: this.hasModifier(member, ts.SyntaxKind.StaticKeyword),
      isAsync: this.hasModifier(member, ts.SyntaxKind.AsyncKeyword),
      isOverride: this.hasModifier(member, ts.SyntaxKind.OverrideKeyword),
      typeParameters: member.typeParameters
        ? `<${member.typeParameters.map(t => t.getText(sourceFile)).join(', ')}>`
        : null,
      body: member.body ? dedent(member.body.getText(sourceFile), cls.memberIndent) : null,
      overloads: [...overloads],
      docs,
      decorators: ts.getDecorators(member)?.map(d => d.getText(sourceFile)) ?? [],
    };
  }

  private readField(member: ts.PropertyDeclaration, sourceFile: ts.SourceFile): Omit<FieldNode, 'id' | 'owner'> {
    const docs = this.leadingDocs(member, sourceFile);
    const initializer = member.initializer;

    return {
      name: member.name.getText(sourceFile),
      type: member.type
        ? member.type.getText(sourceFile)
        : (initializer && literalType(initializer)) ?? this.inferType(member, sourceFile) ?? 'any',
      typeIsExplicit: member.type !== undefined,
      visibility: this.readVisibility(member, docs),
      explicitPublic: this.hasModifier(member, ts.SyntaxKind.PublicKeyword),
      isStatic: this.hasModifier(member, ts.SyntaxKind.StaticKeyword),
      isReadonly: this.hasModifier(member, ts.SyntaxKind.ReadonlyKeyword),
      isOptional: member.questionToken !== undefined,
      isDefinite: member.exclamationToken !== undefined,
      initializer: initializer ? initializer.getText(sourceFile) : null,
      isParameterProperty: false,
      docs,
      decorators: ts.getDecorators(member)?.map(d => d.getText(sourceFile)) ?? [],
    };
  }

  private readParameter(param: ts.ParameterDeclaration, sourceFile: ts.SourceFile): Parameter {
    const type = param.type
      ? param.type.getText(sourceFile)
      : (param.initializer && literalType(param.initializer)) ?? 'any';

    return {
      name: param.name.getText(sourceFile),
      type,
      text: param.getText(sourceFile),
    };
  }

  /** `constructor(private readonly name: string)` declares a field too */
  private readParameterProperties(
    model: SourceModel,
    cls: ClassNode,
    ctor: ts.ConstructorDeclaration,
    sourceFile: ts.SourceFile
  ): void {
    for (const param of ctor.parameters) {
      if (!ts.isParameterPropertyDeclaration(param, ctor) || !ts.isIdentifier(param.name)) continue;

      let visibility: Visibility = 'public';
      if (this.hasModifier(param, ts.SyntaxKind.PrivateKeyword)) visibility = 'private';
      else if (this.hasModifier(param, ts.SyntaxKind.ProtectedKeyword)) visibility = 'protected';

      const parameter = this.readParameter(param, sourceFile);
      model.addField(
        cls.id,
        {
          name: param.name.text,
          type: parameter.type,
          typeIsExplicit: param.type !== undefined,
          visibility,
          explicitPublic: this.hasModifier(param, ts.SyntaxKind.PublicKeyword),
          isStatic: false,
          isReadonly: this.hasModifier(param, ts.SyntaxKind.ReadonlyKeyword),
          isOptional: param.questionToken !== undefined,
          isDefinite: false,
          initializer: null,
          isParameterProperty: true,
          docs: null,
          decorators: [],
        },
        'end'
      );
    }
  }

  private readVisibility(member: ts.ClassElement, docs: string | null): Visibility {
    if (member.name && ts.isPrivateIdentifier(member.name)) return 'private';
    if (this.hasModifier(member, ts.SyntaxKind.PrivateKeyword)) return 'private';
    if (this.hasModifier(member, ts.SyntaxKind.ProtectedKeyword)) return 'protected';
    if (docs !== null && /@internal\b/.test(docs)) return 'package-private';
    return 'public';
  }

  private overloadText(member: ts.MethodDeclaration, sourceFile: ts.SourceFile): string {
    return sourceFile.text
      .slice(member.name.getStart(sourceFile), member.getEnd())
      .trim()
      .replace(/;$/, '');
  }

  private opaqueName(member: ts.ClassElement): string | null {
    if (!member.name) return null;
    if (ts.isIdentifier(member.name) || ts.isPrivateIdentifier(member.name)) return member.name.text;
    return null;
  }

  private opaqueText(member: ts.ClassElement, sourceFile: ts.SourceFile, cls: ClassNode): string {
    const ranges = ts.getLeadingCommentRanges(sourceFile.text, member.getFullStart()) ?? [];
    const start = ranges[0]?.pos ?? member.getStart(sourceFile);
    return dedent(sourceFile.text.slice(start, member.getEnd()), cls.memberIndent);
  }

  /** Leading comments, one line per source line, continuation lines re-based */
  private leadingDocs(member: ts.Node, sourceFile: ts.SourceFile): string | null {
    const ranges = ts.getLeadingCommentRanges(sourceFile.text, member.getFullStart());
    if (!ranges || ranges.length === 0) return null;

    return ranges
      .map(range => sourceFile.text.slice(range.pos, range.end))
      .join('\n')
      .split('\n')
      .map((line, index) => {
        const trimmed = line.trim();
        if (index === 0) return trimmed;
        return trimmed.startsWith('*') ? ` ${trimmed}` : trimmed;
      })
      .join('\n');
  }

  // --- File Facts ---

  private collectImports(sourceFile: ts.SourceFile): ImportBinding[] {
    const bindings: ImportBinding[] = [];

    for (const statement of sourceFile.statements) {
      if (!ts.isImportDeclaration(statement) || !ts.isStringLiteral(statement.moduleSpecifier)) continue;
      const clause = statement.importClause;
      if (!clause) continue;

      const specifier = statement.moduleSpecifier.text;

      if (clause.name) {
        bindings.push({ localName: clause.name.text, importedName: 'default', specifier, typeOnly: clause.isTypeOnly });
      }

      const named = clause.namedBindings;
      if (named && ts.isNamedImports(named)) {
        for (const element of named.elements) {
          bindings.push({
            localName: element.name.text,
            importedName: element.propertyName?.text ?? element.name.text,
            specifier,
            typeOnly: clause.isTypeOnly || element.isTypeOnly,
          });
        }
      } else if (named && ts.isNamespaceImport(named)) {
        bindings.push({ localName: named.name.text, importedName: '*', specifier, typeOnly: clause.isTypeOnly });
      }
    }

    return bindings;
  }

  private collectDeclarations(sourceFile: ts.SourceFile): Map<string, { exported: boolean }> {
    const declarations = new Map<string, { exported: boolean }>();

    for (const statement of sourceFile.statements) {
      const exported = this.hasModifier(statement, ts.SyntaxKind.ExportKeyword);

      if (
        (ts.isClassDeclaration(statement) ||
          ts.isFunctionDeclaration(statement) ||
          ts.isInterfaceDeclaration(statement) ||
          ts.isTypeAliasDeclaration(statement) ||
          ts.isEnumDeclaration(statement)) &&
        statement.name
      ) {
        declarations.set(statement.name.text, { exported });
      } else if (ts.isVariableStatement(statement)) {
        for (const decl of statement.declarationList.declarations) {
          if (ts.isIdentifier(decl.name)) declarations.set(decl.name.text, { exported });
        }
      }
    }

    // `export { Name }` without a module specifier exports a local declaration
    for (const statement of sourceFile.statements) {
      if (!ts.isExportDeclaration(statement) || statement.moduleSpecifier) continue;
      const clause = statement.exportClause;
      if (!clause || !ts.isNamedExports(clause)) continue;
      for (const element of clause.elements) {
        const localName = element.propertyName?.text ?? element.name.text;
        if (declarations.has(localName)) declarations.set(localName, { exported: true });
      }
    }

    return declarations;
  }

  private collectFunctions(sourceFile: ts.SourceFile): Map<string, Parameter[]> {
    const functions = new Map<string, Parameter[]>();
    for (const statement of sourceFile.statements) {
      if (ts.isFunctionDeclaration(statement) && statement.name && !functions.has(statement.name.text)) {
        functions.set(statement.name.text, statement.parameters.map(p => this.readParameter(p, sourceFile)));
      }
    }
    return functions;
  }

  // --- Superclass Resolution ---

  private resolveClassName(model: SourceModel, name: string, fromFile: string): number | null {
    const file = model.getFile(fromFile);
    if (!file) return null;

    for (const id of file.classIds) {
      if (model.getClass(id)?.name === name) return id;
    }

    const binding = file.imports.find(b => b.localName === name);
    if (!binding) return null;

    const candidates = this.filesForSpecifier(model, fromFile, binding.specifier);
    for (const candidate of candidates) {
      const target = model.getFile(candidate);
      if (!target) continue;
      for (const id of target.classIds) {
        const cls = model.getClass(id);
        if (!cls) continue;
        const matches = binding.importedName === 'default'
          ? cls.isDefaultExport
          : cls.name === binding.importedName && cls.isExported && !cls.isDefaultExport;
        if (matches) return id;
      }
    }

    return null;
  }

  private filesForSpecifier(model: SourceModel, fromFile: string, specifier: string): string[] {
    if (specifier.startsWith('.')) {
      const resolved = resolveModuleFile(model, fromFile, specifier);
      return resolved ? [resolved] : [];
    }

    // Bare specifiers may name another package of the workspace
    return model
      .allFiles()
      .filter(f => f.package?.name === packageOfSpecifier(specifier))
      .map(f => f.filePath);
  }

  // --- Type Inference ---

  private inferType(node: ts.MethodDeclaration | ts.PropertyDeclaration, sourceFile: ts.SourceFile): string | null {
    if (this.options.inferTypes === false) return null;

    const programFile = this.getProgram().getSourceFile(sourceFile.fileName);
    if (!programFile) return null;

    const target = findNodeAt(programFile, node.getStart(sourceFile), node.kind);
    if (!target) return null;

    const checker = this.getProgram().getTypeChecker();
    let type: ts.Type | undefined;

    if (ts.isMethodDeclaration(target)) {
      const signature = checker.getSignatureFromDeclaration(target);
      type = signature ? checker.getReturnTypeOfSignature(signature) : undefined;
    } else {
      type = checker.getTypeAtLocation(target);
    }

    return type ? checker.typeToString(type, target, ts.TypeFormatFlags.NoTruncation) : null;
  }

  private getProgram(): ts.Program {
    if (this.program) return this.program;

    const compilerOptions: ts.CompilerOptions = {
      target: ts.ScriptTarget.ES2022,
      module: ts.ModuleKind.ESNext,
      moduleResolution: ts.ModuleResolutionKind.Bundler,
      strict: true,
      noEmit: true,
      skipLibCheck: true,
    };

    const base = ts.createCompilerHost(compilerOptions, true);
    const host: ts.CompilerHost = {
      ...base,
      fileExists: fileName => this.sources.has(fileName) || base.fileExists(fileName),
      readFile: fileName => this.sources.get(fileName) ?? base.readFile(fileName),
      getSourceFile: (fileName, languageVersion, onError) => {
        const content = this.sources.get(fileName);
        if (content !== undefined) {
          return ts.createSourceFile(fileName, content, languageVersion, true, this.getScriptKind(fileName));
        }
        return base.getSourceFile(fileName, languageVersion, onError);
      },
    };

    this.program = ts.createProgram([...this.sources.keys()], compilerOptions, host);
    return this.program;
  }

  // --- Private Parsing Helpers ---

  private getScriptKind(filePath: string): ts.ScriptKind {
    return path.extname(filePath) === '.tsx' ? ts.ScriptKind.TSX : ts.ScriptKind.TS;
  }

  private hasModifier(node: ts.Node, kind: ts.SyntaxKind): boolean {
    if (!ts.canHaveModifiers(node)) return false;
    return ts.getModifiers(node)?.some(m => m.kind === kind) ?? false;
  }
}

// ============================================================================
// Utilities
// ============================================================================

/** `@scope/name/sub` gives `@scope/name`, `name/sub` gives `name` */
export function packageOfSpecifier(specifier: string): string {
  const parts = specifier.split('/');
  return specifier.startsWith('@') ? parts.slice(0, 2).join('/') : parts[0] ?? specifier;
}

function literalType(expression: ts.Expression): string | null {
  if (ts.isNumericLiteral(expression)) return 'number';
  if (ts.isStringLiteral(expression) || ts.isNoSubstitutionTemplateLiteral(expression) || ts.isTemplateExpression(expression)) {
    return 'string';
  }
  if (expression.kind === ts.SyntaxKind.TrueKeyword || expression.kind === ts.SyntaxKind.FalseKeyword) return 'boolean';
  if (ts.isBigIntLiteral(expression)) return 'bigint';
  if (ts.isNewExpression(expression) && ts.isIdentifier(expression.expression) && !expression.typeArguments) {
    return expression.expression.text;
  }
  return null;
}

function findNodeAt(root: ts.Node, start: number, kind: ts.SyntaxKind): ts.Node | undefined {
  let found: ts.Node | undefined;
  const visit = (node: ts.Node): void => {
    if (found) return;
    if (node.kind === kind && node.getStart() === start) {
      found = node;
      return;
    }
    if (node.pos <= start && start < node.end) ts.forEachChild(node, visit);
  };
  ts.forEachChild(root, visit);
  return found;
}

function lineStart(content: string, offset: number): number {
  return content.lastIndexOf('\n', offset - 1) + 1;
}

function lineIndent(content: string, offset: number): string {
  const start = lineStart(content, offset);
  const match = /^[ \t]*/.exec(content.slice(start, offset));
  return match ? match[0] : '';
}

/** Strip a member indentation prefix from every line after the first */
export function dedent(text: string, indent: string): string {
  return text
    .split('\n')
    .map((line, index) => (index > 0 && line.startsWith(indent) ? line.slice(indent.length) : line))
    .join('\n');
}
