import type { SourceModel } from '../../graph/model.js';
import type { ClassNode, MethodNode } from '../../graph/types.js';
import { bodyTypeTexts, typeParameterNames, typeReferences } from '../../parsers/body.js';

/**
 * Names a type annotation uses that cannot be reached from the destination:
 * type parameters of the origin class and declarations the origin's module
 * keeps private. Anything else is either visible already, importable, or a
 * global.
 */
export function unresolvableNames(
  model: SourceModel,
  typeText: string,
  origin: ClassNode,
  destination: ClassNode,
  inScope: string[] = []
): string[] {
  if (origin.filePath === destination.filePath && origin.typeParameterNames.length === 0) return [];

  const originFile = model.getFile(origin.filePath);
  const destinationFile = model.getFile(destination.filePath);

  return typeReferences(typeText).filter(name => {
    if (inScope.includes(name) || destination.typeParameterNames.includes(name)) return false;
    if (origin.typeParameterNames.includes(name)) return true;
    if (origin.filePath === destination.filePath) return false;

    if (destinationFile?.declarations.has(name)) return false;
    if (destinationFile?.imports.some(b => b.localName === name)) return false;

    const local = originFile?.declarations.get(name);
    return local !== undefined && !local.exported;
  });
}

/** Type parameter names a method declares itself */
export function methodTypeParameterNames(method: MethodNode): string[] {
  return method.typeParameters ? typeParameterNames(method.typeParameters) : [];
}

/** Every type text a method signature mentions */
export function signatureTypes(method: MethodNode): string[] {
  return [...method.parameters.map(p => p.type), method.returnType];
}

/** Signature types plus every type the body writes out */
export function methodTypes(method: MethodNode): string[] {
  return [...signatureTypes(method), ...(method.body === null ? [] : bodyTypeTexts(method.body))];
}
