import * as ts from 'typescript';

// ============================================================================
// Visitor Types
// ============================================================================

/** Offsets are relative to the start of the walked body text */
export interface Span {
  start: number;
  end: number;
}

/** `this.name` or `this.name(...)` */
export interface MemberAccess extends Span {
  name: string;
  isCall: boolean;
  argumentCount: number;
}

/** `super.name` or `super.name(...)` */
export interface SuperAccess extends Span {
  name: string;
  isCall: boolean;
  argumentCount: number;
  /** The enclosing expression statement when the call stands alone */
  statement: Span | null;
}

/** What a call or `new` expression targets */
export type CallTarget =
  | { kind: 'this-member'; name: string }
  | { kind: 'super-member'; name: string }
  | { kind: 'constructor'; className: string }
  | { kind: 'static'; className: string; name: string }
  | { kind: 'function'; name: string }
  | { kind: 'other' };

/** A bare `this` passed as a call or constructor argument */
export interface SelfArgument extends Span {
  callee: CallTarget;
  index: number;
}

/** A local variable with a written type annotation */
export interface LocalAnnotation extends Span {
  name: string;
  /** The annotation text; the span covers it */
  type: string;
}

export interface BodyVisitor {
  onMemberAccess?(access: MemberAccess): void;
  onSuperAccess?(access: SuperAccess): void;
  onSelfArgument?(argument: SelfArgument): void;
  onLocalAnnotation?(annotation: LocalAnnotation): void;
}

// ============================================================================
// Walking
// ============================================================================

const HOST_PREFIX = 'class __HoistHost__ extends Object {\n__hoist__() ';
const HOST_SUFFIX = '\n}\n';

/**
 * Walk a method body (block text including braces) and report every member
 * access, super access, self argument and annotated local through the
 * visitor. Nested functions and classes that rebind `this` are skipped;
 * arrow functions are walked.
 */
export function walkBody(body: string, visitor: BodyVisitor): void {
  const source = HOST_PREFIX + body + HOST_SUFFIX;
  const sourceFile = ts.createSourceFile('__body__.ts', source, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
  const block = findHostBlock(sourceFile);
  if (!block) return;

  const offset = HOST_PREFIX.length;
  const span = (node: ts.Node): Span => ({
    start: node.getStart(sourceFile) - offset,
    end: node.getEnd() - offset,
  });

  const visit = (node: ts.Node): void => {
    if (rebindsThis(node)) return;

    if (ts.isPropertyAccessExpression(node)) {
      const call = callOf(node);
      const name = node.name.text;
      const argumentCount = call ? call.arguments.length : 0;

      if (node.expression.kind === ts.SyntaxKind.ThisKeyword) {
        visitor.onMemberAccess?.({ name, isCall: call !== null, argumentCount, ...span(node) });
      } else if (node.expression.kind === ts.SyntaxKind.SuperKeyword) {
        const statement = call ? enclosingStatement(call) : null;
        visitor.onSuperAccess?.({
          name,
          isCall: call !== null,
          argumentCount,
          statement: statement ? span(statement) : null,
          ...span(node),
        });
      }
    }

    if (ts.isCallExpression(node) || ts.isNewExpression(node)) {
      const args = node.arguments ?? [];
      args.forEach((arg, index) => {
        if (arg.kind === ts.SyntaxKind.ThisKeyword) {
          visitor.onSelfArgument?.({ callee: classifyCallee(node), index, ...span(arg) });
        }
      });
    }

    if (ts.isVariableDeclaration(node) && node.type && ts.isIdentifier(node.name)) {
      visitor.onLocalAnnotation?.({ name: node.name.text, type: node.type.getText(sourceFile), ...span(node.type) });
    }

    ts.forEachChild(node, visit);
  };

  ts.forEachChild(block, visit);
}

/**
 * Every type a body writes out: annotations, casts, `satisfies` and type
 * arguments, nested functions included. Classes constructed with `new`
 * count as well, by name.
 */
export function bodyTypeTexts(body: string): string[] {
  const source = HOST_PREFIX + body + HOST_SUFFIX;
  const sourceFile = ts.createSourceFile('__body__.ts', source, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
  const block = findHostBlock(sourceFile);
  if (!block) return [];

  const texts: string[] = [];
  const visit = (node: ts.Node): void => {
    if (ts.isTypeNode(node)) {
      texts.push(node.getText(sourceFile));
      return;
    }
    if (ts.isNewExpression(node) && ts.isIdentifier(node.expression)) {
      texts.push(node.expression.text);
    }
    ts.forEachChild(node, visit);
  };

  ts.forEachChild(block, visit);
  return [...new Set(texts)];
}

/** Walk an expression such as a field initializer */
export function walkExpression(expression: string, visitor: BodyVisitor): void {
  walkBody(`{ void (${expression}); }`, visitor);
}

function findHostBlock(sourceFile: ts.SourceFile): ts.Block | undefined {
  const host = sourceFile.statements[0];
  if (!host || !ts.isClassDeclaration(host)) return undefined;
  const method = host.members.find(ts.isMethodDeclaration);
  return method?.body;
}

function rebindsThis(node: ts.Node): boolean {
  return (
    ts.isFunctionExpression(node) ||
    ts.isFunctionDeclaration(node) ||
    ts.isClassExpression(node) ||
    ts.isClassDeclaration(node) ||
    ts.isMethodDeclaration(node) ||
    ts.isGetAccessorDeclaration(node) ||
    ts.isSetAccessorDeclaration(node)
  );
}

function callOf(access: ts.PropertyAccessExpression): ts.CallExpression | null {
  const parent = access.parent;
  return ts.isCallExpression(parent) && parent.expression === access ? parent : null;
}

function enclosingStatement(call: ts.CallExpression): ts.ExpressionStatement | null {
  let current: ts.Node = call.parent;
  if (ts.isAwaitExpression(current)) current = current.parent;
  return ts.isExpressionStatement(current) ? current : null;
}

function classifyCallee(node: ts.CallExpression | ts.NewExpression): CallTarget {
  const callee = node.expression;

  if (ts.isNewExpression(node)) {
    return ts.isIdentifier(callee) ? { kind: 'constructor', className: callee.text } : { kind: 'other' };
  }

  if (ts.isIdentifier(callee)) {
    return { kind: 'function', name: callee.text };
  }

  if (ts.isPropertyAccessExpression(callee)) {
    const name = callee.name.text;
    if (callee.expression.kind === ts.SyntaxKind.ThisKeyword) return { kind: 'this-member', name };
    if (callee.expression.kind === ts.SyntaxKind.SuperKeyword) return { kind: 'super-member', name };
    if (ts.isIdentifier(callee.expression)) {
      return { kind: 'static', className: callee.expression.text, name };
    }
  }

  return { kind: 'other' };
}

// ============================================================================
// Type Text Helpers
// ============================================================================

/**
 * Names a type annotation refers to, leftmost segment only
 * (`Map<Key, ns.Value>` gives `Map`, `Key`, `ns`). Type parameters declared
 * inside the annotation itself are left out.
 */
export function typeReferences(typeText: string): string[] {
  const sourceFile = ts.createSourceFile('__type__.ts', `type __T = ${typeText};`, ts.ScriptTarget.Latest, true);
  const names: string[] = [];
  const declared = new Set<string>();

  const leftmost = (name: ts.EntityName | ts.Expression): string | null => {
    if (ts.isIdentifier(name)) return name.text;
    if (ts.isQualifiedName(name)) return leftmost(name.left);
    if (ts.isPropertyAccessExpression(name)) return leftmost(name.expression);
    return null;
  };

  const visit = (node: ts.Node): void => {
    if (ts.isTypeParameterDeclaration(node)) {
      declared.add(node.name.text);
    } else if (ts.isTypeReferenceNode(node)) {
      const name = leftmost(node.typeName);
      if (name) names.push(name);
    } else if (ts.isTypeQueryNode(node)) {
      const name = leftmost(node.exprName);
      if (name) names.push(name);
    } else if (ts.isExpressionWithTypeArguments(node)) {
      const name = leftmost(node.expression);
      if (name) names.push(name);
    }
    ts.forEachChild(node, visit);
  };

  const alias = sourceFile.statements[0];
  if (alias && ts.isTypeAliasDeclaration(alias)) visit(alias.type);

  return [...new Set(names)].filter(name => !declared.has(name));
}

/** Names declared by a type parameter list such as `<T, K extends keyof T>` */
export function typeParameterNames(list: string): string[] {
  const sourceFile = ts.createSourceFile('__params__.ts', `function __f${list}() {}`, ts.ScriptTarget.Latest, true);
  const fn = sourceFile.statements[0];
  if (!fn || !ts.isFunctionDeclaration(fn)) return [];
  return fn.typeParameters?.map(t => t.name.text) ?? [];
}

/** Collapse whitespace and comments so two bodies can be compared */
export function normalizeBody(body: string | null): string {
  if (body === null) return '';
  return body
    .replace(/\/\*[\s\S]*?\*\//g, '')
    .replace(/(^|[^:])\/\/.*$/gm, '$1')
    .replace(/\s+/g, ' ')
    .replace(/\s*([{}()[\];,.=:+\-*/<>!?&|])\s*/g, '$1')
    .trim();
}
