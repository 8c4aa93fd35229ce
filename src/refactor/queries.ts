import * as path from 'node:path';
import { HierarchyNavigator } from '../graph/hierarchy.js';
import type { SourceModel } from '../graph/model.js';
import type { ClassNode, Visibility } from '../graph/types.js';

export interface ClassSummary {
  name: string;
  qualifiedName: string;
  filePath: string;
  superclass: string | null;
  isAbstract: boolean;
  methodCount: number;
  fieldCount: number;
}

export interface MethodSummary {
  name: string;
  signature: string;
  visibility: Visibility;
  isAbstract: boolean;
  isStatic: boolean;
}

/** Every class in discovery order */
export function listClasses(model: SourceModel): ClassSummary[] {
  return model.allClasses().map(cls => ({
    name: cls.name,
    qualifiedName: cls.qualifiedName,
    filePath: path.relative(model.rootDir, cls.filePath).replace(/\\/g, '/'),
    superclass: model.superclassOf(cls)?.qualifiedName ?? cls.extendsText,
    isAbstract: cls.isAbstract,
    methodCount: model.methodsOf(cls).length,
    fieldCount: model.fieldsOf(cls).length,
  }));
}

/** Methods declared on a class, or null when the class is unknown */
export function listMethods(model: SourceModel, className: string): MethodSummary[] | null {
  const cls = model.findClass(className);
  if (!cls) return null;

  return model.methodsOf(cls).map(method => ({
    name: method.name,
    signature: `${method.name}${method.typeParameters ?? ''}(${method.parameters.map(p => p.type).join(', ')}): ${method.returnType}`,
    visibility: method.visibility,
    isAbstract: method.isAbstract,
    isStatic: method.isStatic,
  }));
}

/**
 * Ancestors of a class, nearest first.
 * A supertype outside the scanned sources is listed last, by its written name.
 */
export function listAncestors(model: SourceModel, className: string): string[] | null {
  const cls = model.findClass(className);
  if (!cls) return null;

  const chain: ClassNode[] = new HierarchyNavigator(model).ancestorsOf(cls);
  const names = chain.map(c => c.qualifiedName);
  const top = chain[chain.length - 1] ?? cls;
  if (top.superclass === null && top.extendsText !== null) {
    names.push(top.extendsText);
  }
  return names;
}
