/**
 * Class Printer
 *
 * Turns mutated class nodes back into source text. Only the span of each
 * changed class declaration is replaced; everything else in the file,
 * including the comments above the class, is left byte for byte.
 */

import type { SourceModel } from '../graph/model.js';
import type { ClassNode, FieldNode, MemberRef, MethodNode, Visibility } from '../graph/types.js';
import { applyTextEdits } from './import-rewriter.helpers.js';
import type { TextEdit } from './types.js';

// ============================================================================
// Files
// ============================================================================

/**
 * Render a file with the given classes re-serialized. Classes from other
 * files are ignored.
 */
export function renderFile(model: SourceModel, filePath: string, classes: ClassNode[]): string {
  const file = model.getFile(filePath);
  if (!file) {
    throw new Error(`File ${filePath} is not part of the model`);
  }

  const edits: TextEdit[] = classes
    .filter(cls => cls.filePath === filePath)
    .map(cls => ({
      startOffset: cls.span.start,
      endOffset: cls.span.end,
      newText: renderClass(model, cls),
      description: `Re-render ${cls.name}`,
    }));

  return applyTextEdits(file.content, edits);
}

// ============================================================================
// Classes
// ============================================================================

/**
 * Render one class declaration. The first line carries no indentation,
 * since it replaces text that starts after the original indentation.
 */
export function renderClass(model: SourceModel, cls: ClassNode): string {
  const lines: string[] = [];

  cls.decorators.forEach((decorator, index) => {
    lines.push(index === 0 ? decorator : cls.indent + decorator);
  });
  const header = classHeader(cls);
  lines.push(lines.length === 0 ? header : cls.indent + header);

  let previous: MemberRef['kind'] | null = null;
  for (const ref of cls.members) {
    const text = renderMember(model, cls, ref);
    if (text === null) continue;

    // Methods and opaque members get a blank line before them; fields stay packed
    if (previous !== null && (ref.kind !== 'field' || previous !== 'field')) {
      lines.push('');
    }
    lines.push(text);
    previous = ref.kind;
  }

  lines.push(`${cls.indent}}`);
  return lines.join('\n');
}

function classHeader(cls: ClassNode): string {
  let header = '';
  if (cls.isExported) header += 'export ';
  if (cls.isDefaultExport) header += 'default ';
  if (cls.isAbstract) header += 'abstract ';
  header += `class ${cls.name}`;
  if (cls.typeParameters) header += cls.typeParameters;
  if (cls.extendsText) header += ` extends ${cls.extendsText}`;
  if (cls.implementsText) header += ` implements ${cls.implementsText}`;
  return `${header} {`;
}

function renderMember(model: SourceModel, cls: ClassNode, ref: MemberRef): string | null {
  switch (ref.kind) {
    case 'opaque':
      return indentBlock(ref.text, cls.memberIndent);
    case 'method': {
      const method = model.getMethod(ref.id);
      return method ? renderMethod(method, cls.memberIndent) : null;
    }
    case 'field': {
      const field = model.getField(ref.id);
      // Parameter properties are printed by the constructor they live in
      if (!field || field.isParameterProperty) return null;
      return renderField(field, cls.memberIndent);
    }
  }
}

// ============================================================================
// Members
// ============================================================================

export function renderMethod(method: MethodNode, indent: string): string {
  const lines = leadingLines(method.docs, method.decorators, method.visibility, indent);

  const modifiers = methodModifiers(method);
  for (const overload of method.overloads) {
    lines.push(`${indent}${modifiers}${overload};`);
  }

  let signature = `${modifiers}${method.name}${method.typeParameters ?? ''}(${method.parameters.map(p => p.text).join(', ')})`;
  if (method.returnTypeIsExplicit || method.body === null) {
    signature += `: ${method.returnType}`;
  }

  if (method.body === null) {
    lines.push(`${indent}${signature};`);
  } else {
    lines.push(indentBlock(`${signature} ${method.body}`, indent));
  }

  return lines.join('\n');
}

export function renderField(field: FieldNode, indent: string): string {
  const lines = leadingLines(field.docs, field.decorators, field.visibility, indent);

  let text = fieldModifiers(field) + field.name;
  if (field.isOptional) text += '?';
  else if (field.isDefinite) text += '!';
  if (field.typeIsExplicit) text += `: ${field.type}`;
  if (field.initializer !== null) text += ` = ${field.initializer}`;

  lines.push(indentBlock(`${text};`, indent));
  return lines.join('\n');
}

function methodModifiers(method: MethodNode): string {
  const parts: string[] = [];
  const access = accessModifier(method.visibility, method.explicitPublic);
  if (access) parts.push(access);
  if (method.isStatic) parts.push('static');
  if (method.isAbstract) parts.push('abstract');
  if (method.isOverride) parts.push('override');
  if (method.isAsync && method.body !== null) parts.push('async');
  return parts.map(p => `${p} `).join('');
}

function fieldModifiers(field: FieldNode): string {
  const parts: string[] = [];
  const access = accessModifier(field.visibility, field.explicitPublic);
  if (access) parts.push(access);
  if (field.isStatic) parts.push('static');
  if (field.isReadonly) parts.push('readonly');
  return parts.map(p => `${p} `).join('');
}

function accessModifier(visibility: Visibility, explicitPublic: boolean): string | null {
  switch (visibility) {
    case 'private':
      return 'private';
    case 'protected':
      return 'protected';
    case 'public':
      return explicitPublic ? 'public' : null;
    case 'package-private':
      return null;
  }
}

function leadingLines(docs: string | null, decorators: string[], visibility: Visibility, indent: string): string[] {
  const lines: string[] = [];
  const comment = withInternalTag(docs, visibility === 'package-private');
  if (comment !== null) {
    lines.push(...comment.split('\n').map(line => indent + line));
  }
  for (const decorator of decorators) {
    lines.push(indentBlock(decorator, indent));
  }
  return lines;
}

// ============================================================================
// Doc Comments
// ============================================================================

/**
 * Add or drop the `@internal` tag so the comment matches the member's
 * visibility. Returns null when nothing is left of the comment.
 */
export function withInternalTag(docs: string | null, internal: boolean): string | null {
  const hasTag = docs !== null && /@internal\b/.test(docs);

  if (internal) {
    if (hasTag) return docs;
    if (docs === null) return '/** @internal */';

    const lines = docs.split('\n');
    const last = lines[lines.length - 1] ?? '';
    if (!docs.startsWith('/**')) {
      return `${docs}\n/** @internal */`;
    }
    if (lines.length === 1) {
      const inner = docs.replace(/^\/\*\*\s*/, '').replace(/\s*\*\/$/, '');
      return `/**\n * ${inner}\n * @internal\n */`;
    }
    return [...lines.slice(0, -1), ' * @internal', last].join('\n');
  }

  if (!hasTag) return docs;

  const stripped = docs
    .split('\n')
    .filter(line => !/^\s*\*\s*@internal\s*$/.test(line))
    .join('\n')
    .replace(/[ \t]*@internal\b/g, '');

  if (/^\/\*\*[\s*]*\*\/$/.test(stripped)) return null;
  return stripped;
}

// ============================================================================
// Indentation
// ============================================================================

/** Prefix the first line and every non-empty continuation line with `indent` */
export function indentBlock(text: string, indent: string): string {
  return text
    .split('\n')
    .map(line => (line.length === 0 ? line : indent + line))
    .join('\n');
}
