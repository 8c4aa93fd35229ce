/**
 * Import Fix-up
 *
 * Members that move into a file bring their type annotations, `new`
 * expressions and helper calls with them. This pass finds the names a
 * rewritten file now uses without declaring or importing them and adds the
 * imports, taking the specifier from the file that declares the name or
 * from another file that already imports it.
 */

import * as path from 'node:path';
import * as ts from 'typescript';
import type { SourceModel } from '../graph/model.js';
import type { SourceFileInfo } from '../graph/types.js';
import { resolveModuleFile } from '../parsers/typescript.js';
import {
  calculateRelativeImport,
  detectExtensionStyle,
  type ImportExtensionStyle,
} from './import-rewriter.helpers.js';

// ============================================================================
// Types
// ============================================================================

/** How a name is bound by the import we add */
type BindingKind = 'named' | 'default' | 'namespace';

export interface PlannedImport {
  localName: string;
  /** Exported name for named imports */
  importedName: string;
  specifier: string;
  kind: BindingKind;
  typeOnly: boolean;
}

export interface ImportFixResult {
  content: string;
  added: PlannedImport[];
  warnings: string[];
}

/** Names a file uses, split by whether any use needs a runtime value */
interface NameUsage {
  used: Map<string, { valueUse: boolean }>;
  bound: Set<string>;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Add imports for names that `content` uses but that the file's original
 * content did not already leave dangling. Names no model file declares or
 * imports (globals, for instance) are left alone.
 */
export function fixImports(model: SourceModel, filePath: string, content: string): ImportFixResult {
  const file = model.getFile(filePath);
  const before = file ? missingNames(analyzeUsage(filePath, file.content)) : new Set<string>();
  const usage = analyzeUsage(filePath, content);

  const added: PlannedImport[] = [];
  const warnings: string[] = [];

  for (const name of missingNames(usage)) {
    if (before.has(name)) continue;

    const typeOnly = usage.used.get(name)?.valueUse !== true;
    const found = findSource(model, filePath, name, typeOnly);
    if (found.kind === 'import') {
      added.push(found.plan);
    } else if (found.kind === 'hidden') {
      warnings.push(
        `${name} is declared in ${relativeTo(model.rootDir, found.filePath)} but not exported; ` +
          `export it so ${relativeTo(model.rootDir, filePath)} can import it`
      );
    }
  }

  if (added.length === 0) {
    return { content, added, warnings };
  }

  return { content: insertImports(filePath, content, added), added, warnings };
}

// ============================================================================
// Usage Analysis
// ============================================================================

function missingNames(usage: NameUsage): Set<string> {
  return new Set([...usage.used.keys()].filter(name => !usage.bound.has(name)));
}

/**
 * Collect the free names a file refers to. Any identifier declared anywhere
 * in the file counts as bound, regardless of scope.
 */
function analyzeUsage(filePath: string, content: string): NameUsage {
  const sourceFile = ts.createSourceFile(filePath, content, ts.ScriptTarget.Latest, true, scriptKind(filePath));
  const used = new Map<string, { valueUse: boolean }>();
  const bound = new Set<string>();

  const use = (name: string, valueUse: boolean): void => {
    const entry = used.get(name);
    if (entry) entry.valueUse = entry.valueUse || valueUse;
    else used.set(name, { valueUse });
  };

  const visit = (node: ts.Node): void => {
    if (ts.isImportDeclaration(node)) {
      const clause = node.importClause;
      if (clause?.name) bound.add(clause.name.text);
      const named = clause?.namedBindings;
      if (named && ts.isNamespaceImport(named)) bound.add(named.name.text);
      if (named && ts.isNamedImports(named)) named.elements.forEach(e => bound.add(e.name.text));
      return;
    }

    if (
      (ts.isClassDeclaration(node) ||
        ts.isFunctionDeclaration(node) ||
        ts.isInterfaceDeclaration(node) ||
        ts.isTypeAliasDeclaration(node) ||
        ts.isEnumDeclaration(node) ||
        ts.isTypeParameterDeclaration(node) ||
        ts.isClassExpression(node) ||
        ts.isFunctionExpression(node) ||
        ts.isModuleDeclaration(node)) &&
      node.name &&
      ts.isIdentifier(node.name)
    ) {
      bound.add(node.name.text);
    }

    if (
      (ts.isVariableDeclaration(node) || ts.isParameter(node) || ts.isBindingElement(node)) &&
      ts.isIdentifier(node.name)
    ) {
      bound.add(node.name.text);
    }

    if (ts.isTypeReferenceNode(node)) {
      const name = leftmost(node.typeName);
      if (name) use(name, false);
    } else if (ts.isTypeQueryNode(node)) {
      const name = leftmost(node.exprName);
      if (name) use(name, false);
    } else if (ts.isExpressionWithTypeArguments(node)) {
      const name = leftmost(node.expression);
      const clause = node.parent;
      const isImplements = ts.isHeritageClause(clause) && clause.token === ts.SyntaxKind.ImplementsKeyword;
      if (name) use(name, !isImplements && !ts.isInterfaceDeclaration(clause.parent));
    } else if (ts.isIdentifier(node) && isValueReference(node)) {
      use(node.text, true);
    }

    ts.forEachChild(node, visit);
  };

  visit(sourceFile);
  return { used, bound };
}

/** Whether an identifier reads a value, as opposed to naming a property or declaration */
function isValueReference(id: ts.Identifier): boolean {
  const parent = id.parent;
  if (ts.isPropertyAccessExpression(parent)) return parent.expression === id;
  if (
    ts.isPropertyAssignment(parent) ||
    ts.isVariableDeclaration(parent) ||
    ts.isParameter(parent) ||
    ts.isPropertyDeclaration(parent) ||
    ts.isBindingElement(parent)
  ) {
    return parent.initializer === id;
  }
  return (
    ts.isShorthandPropertyAssignment(parent) ||
    ts.isCallExpression(parent) ||
    ts.isNewExpression(parent) ||
    ts.isBinaryExpression(parent) ||
    ts.isReturnStatement(parent) ||
    ts.isArrayLiteralExpression(parent) ||
    ts.isSpreadElement(parent) ||
    ts.isConditionalExpression(parent) ||
    ts.isTemplateSpan(parent) ||
    ts.isPrefixUnaryExpression(parent) ||
    ts.isPostfixUnaryExpression(parent) ||
    ts.isParenthesizedExpression(parent) ||
    ts.isElementAccessExpression(parent) ||
    ts.isAsExpression(parent) ||
    ts.isSatisfiesExpression(parent) ||
    ts.isAwaitExpression(parent) ||
    ts.isTypeOfExpression(parent) ||
    ts.isExpressionStatement(parent)
  );
}

function leftmost(name: ts.EntityName | ts.Expression): string | null {
  if (ts.isIdentifier(name)) return name.text;
  if (ts.isQualifiedName(name)) return leftmost(name.left);
  if (ts.isPropertyAccessExpression(name)) return leftmost(name.expression);
  return null;
}

// ============================================================================
// Source Lookup
// ============================================================================

type SourceLookup =
  | { kind: 'import'; plan: PlannedImport }
  | { kind: 'hidden'; filePath: string }
  | { kind: 'none' };

function findSource(model: SourceModel, fromFile: string, name: string, typeOnly: boolean): SourceLookup {
  const style = extensionStyle(model, fromFile);
  let hidden: string | null = null;

  // A model file that declares the name
  for (const file of model.allFiles()) {
    if (file.filePath === fromFile) continue;
    const declaration = file.declarations.get(name);
    if (!declaration) continue;

    if (!declaration.exported) {
      hidden ??= file.filePath;
      continue;
    }

    const isDefault = file.classIds.some(id => {
      const cls = model.getClass(id);
      return cls?.name === name && cls.isDefaultExport;
    });
    return {
      kind: 'import',
      plan: {
        localName: name,
        importedName: isDefault ? 'default' : name,
        specifier: specifierFor(model, fromFile, file, style),
        kind: isDefault ? 'default' : 'named',
        typeOnly,
      },
    };
  }

  // Another file that already imports it, e.g. from a package
  for (const file of model.allFiles()) {
    if (file.filePath === fromFile) continue;
    const binding = file.imports.find(b => b.localName === name);
    if (!binding) continue;

    let specifier = binding.specifier;
    if (specifier.startsWith('.')) {
      const target = resolveModuleFile(model, file.filePath, specifier);
      const targetFile = target ? model.getFile(target) : undefined;
      if (!targetFile) continue;
      specifier = specifierFor(model, fromFile, targetFile, style);
    }

    const kind: BindingKind =
      binding.importedName === 'default' ? 'default' : binding.importedName === '*' ? 'namespace' : 'named';
    return {
      kind: 'import',
      plan: { localName: name, importedName: binding.importedName, specifier, kind, typeOnly },
    };
  }

  return hidden !== null ? { kind: 'hidden', filePath: hidden } : { kind: 'none' };
}

/** Relative path within a package, the package name across packages */
function specifierFor(model: SourceModel, fromFile: string, target: SourceFileInfo, style: ImportExtensionStyle): string {
  const from = model.getFile(fromFile)?.package ?? null;
  const to = target.package;
  if (from !== null && to !== null && from.root !== to.root && to.name !== null) {
    return to.name;
  }
  return calculateRelativeImport(fromFile, target.filePath, style);
}

/** The file's own convention, or the project's when it has no relative imports */
function extensionStyle(model: SourceModel, fromFile: string): ImportExtensionStyle {
  const own = model.getFile(fromFile)?.imports.map(b => b.specifier) ?? [];
  if (own.some(s => s.startsWith('.'))) return detectExtensionStyle(own);
  return detectExtensionStyle(model.allFiles().flatMap(f => f.imports.map(b => b.specifier)));
}

// ============================================================================
// Insertion
// ============================================================================

/** Add import statements after the file's last import, or at the top */
export function insertImports(filePath: string, content: string, imports: PlannedImport[]): string {
  const sourceFile = ts.createSourceFile(filePath, content, ts.ScriptTarget.Latest, true, scriptKind(filePath));
  const existing = sourceFile.statements.filter(ts.isImportDeclaration);
  const quote = existing[0]?.moduleSpecifier.getText(sourceFile).startsWith('"') ? '"' : "'";

  const statements = renderImports(imports, quote);
  const last = existing[existing.length - 1];
  if (last) {
    const end = last.getEnd();
    return content.slice(0, end) + '\n' + statements.join('\n') + content.slice(end);
  }

  const separator = content.length > 0 ? '\n' : '';
  return statements.join('\n') + '\n' + separator + content;
}

function renderImports(imports: PlannedImport[], quote: string): string[] {
  const named = new Map<string, { keyword: string; from: string; plans: PlannedImport[] }>();
  const lines: string[] = [];

  for (const plan of imports) {
    const from = `${quote}${plan.specifier}${quote}`;
    const keyword = plan.typeOnly ? 'import type' : 'import';

    if (plan.kind === 'default') {
      lines.push(`${keyword} ${plan.localName} from ${from};`);
    } else if (plan.kind === 'namespace') {
      lines.push(`${keyword} * as ${plan.localName} from ${from};`);
    } else {
      const key = `${keyword} ${from}`;
      const group = named.get(key) ?? { keyword, from, plans: [] };
      group.plans.push(plan);
      named.set(key, group);
    }
  }

  for (const { keyword, from, plans } of named.values()) {
    const names = plans
      .map(p => (p.importedName === p.localName ? p.localName : `${p.importedName} as ${p.localName}`))
      .sort();
    lines.push(`${keyword} { ${names.join(', ')} } from ${from};`);
  }

  return lines;
}

function scriptKind(filePath: string): ts.ScriptKind {
  return path.extname(filePath) === '.tsx' ? ts.ScriptKind.TSX : ts.ScriptKind.TS;
}

function relativeTo(rootDir: string, filePath: string): string {
  return path.relative(rootDir, filePath).replace(/\\/g, '/');
}
