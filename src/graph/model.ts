import type {
  ClassId,
  ClassNode,
  FieldNode,
  MemberId,
  MemberRef,
  MethodNode,
  SourceFileInfo,
} from './types.js';

export type ClassInit = Omit<ClassNode, 'id' | 'members'>;
export type MethodInit = Omit<MethodNode, 'id' | 'owner'>;
export type FieldInit = Omit<FieldNode, 'id' | 'owner'>;

/** Type text used when no more specific common supertype exists */
export const TOP_TYPE = 'unknown';

/** Return types that need no value in a synthesized body */
export const VOID_TYPES: ReadonlySet<string> = new Set(['void', 'Promise<void>']);

/**
 * Arena holding every class, method and field of one refactoring run.
 *
 * Nodes are created once by the model builder and then mutated in place.
 * The model remembers which classes were touched so callers know what to
 * re-serialize.
 */
export class SourceModel {
  private readonly classes: ClassNode[] = [];
  private readonly methods = new Map<MemberId, MethodNode>();
  private readonly fields = new Map<MemberId, FieldNode>();
  private readonly files = new Map<string, SourceFileInfo>();
  private readonly changed = new Set<ClassId>();
  private nextMemberId = 1;

  constructor(readonly rootDir: string) {}

  // --- Files ---

  addFile(info: SourceFileInfo): void {
    this.files.set(info.filePath, info);
  }

  getFile(filePath: string): SourceFileInfo | undefined {
    return this.files.get(filePath);
  }

  allFiles(): SourceFileInfo[] {
    return [...this.files.values()];
  }

  // --- Classes ---

  addClass(init: ClassInit): ClassNode {
    const node: ClassNode = { ...init, id: this.classes.length, members: [] };
    this.classes.push(node);
    this.files.get(init.filePath)?.classIds.push(node.id);
    return node;
  }

  getClass(id: ClassId): ClassNode | undefined {
    return this.classes[id];
  }

  allClasses(): readonly ClassNode[] {
    return this.classes;
  }

  /**
   * Find a class by qualified name (`module#Name`, extension optional) or by
   * simple name. Simple names resolve to the first class in discovery order.
   */
  findClass(name: string): ClassNode | undefined {
    const exact = this.classes.find(c => c.qualifiedName === name);
    if (exact) return exact;

    const separator = name.lastIndexOf('#');
    if (separator > 0) {
      const modulePath = stripExtension(name.slice(0, separator).replace(/^\.\//, ''));
      const simple = name.slice(separator + 1);
      return this.classes.find(c => c.qualifiedName === `${modulePath}#${simple}`);
    }

    return this.classes.find(c => c.name === name);
  }

  /** Resolve a type annotation such as `Dog` or `Dog<string>` to a model class */
  classForType(typeText: string): ClassNode | undefined {
    const name = typeText.trim().replace(/<.*>$/s, '').trim();
    if (!/^[A-Za-z_$][\w$]*$/.test(name)) return undefined;
    return this.classes.find(c => c.name === name);
  }

  superclassOf(cls: ClassNode): ClassNode | undefined {
    return cls.superclass === null ? undefined : this.classes[cls.superclass];
  }

  // --- Members ---

  methodsOf(cls: ClassNode): MethodNode[] {
    const result: MethodNode[] = [];
    for (const ref of cls.members) {
      if (ref.kind !== 'method') continue;
      const method = this.methods.get(ref.id);
      if (method) result.push(method);
    }
    return result;
  }

  fieldsOf(cls: ClassNode): FieldNode[] {
    const result: FieldNode[] = [];
    for (const ref of cls.members) {
      if (ref.kind !== 'field') continue;
      const field = this.fields.get(ref.id);
      if (field) result.push(field);
    }
    return result;
  }

  /** Names of accessors declared on a class */
  accessorsOf(cls: ClassNode): string[] {
    const names: string[] = [];
    for (const ref of cls.members) {
      if (ref.kind === 'opaque' && ref.name !== null) names.push(ref.name);
    }
    return names;
  }

  getMethod(id: MemberId): MethodNode | undefined {
    return this.methods.get(id);
  }

  getField(id: MemberId): FieldNode | undefined {
    return this.fields.get(id);
  }

  ownerOf(member: MethodNode | FieldNode): ClassNode {
    const owner = this.classes[member.owner];
    if (!owner) {
      throw new Error(`Member ${member.name} points at unknown class #${member.owner}`);
    }
    return owner;
  }

  addMethod(classId: ClassId, init: MethodInit): MethodNode {
    const cls = this.requireClass(classId);
    const method: MethodNode = { ...init, id: this.nextMemberId++, owner: classId };
    this.methods.set(method.id, method);
    cls.members.push({ kind: 'method', id: method.id });
    this.changed.add(classId);
    return method;
  }

  /**
   * Synthesized fields go after the last existing field so they stay
   * grouped; the builder appends in source order instead.
   */
  addField(classId: ClassId, init: FieldInit, placement: 'after-fields' | 'end' = 'after-fields'): FieldNode {
    const cls = this.requireClass(classId);
    const field: FieldNode = { ...init, id: this.nextMemberId++, owner: classId };
    this.fields.set(field.id, field);

    let insertAt = placement === 'end' ? cls.members.length : 0;
    if (placement === 'after-fields') {
      cls.members.forEach((ref, index) => {
        if (ref.kind === 'field') insertAt = index + 1;
      });
    }
    cls.members.splice(insertAt, 0, { kind: 'field', id: field.id });
    this.changed.add(classId);
    return field;
  }

  addOpaque(classId: ClassId, member: MemberRef): void {
    this.requireClass(classId).members.push(member);
  }

  cloneMethod(method: MethodNode, classId: ClassId, overrides: Partial<MethodInit> = {}): MethodNode {
    return this.addMethod(classId, {
      ...copyMethodInit(method),
      ...overrides,
    });
  }

  cloneField(field: FieldNode, classId: ClassId, overrides: Partial<FieldInit> = {}): FieldNode {
    return this.addField(classId, {
      ...copyFieldInit(field),
      ...overrides,
    });
  }

  removeMethod(method: MethodNode): void {
    const cls = this.requireClass(method.owner);
    cls.members = cls.members.filter(ref => !(ref.kind === 'method' && ref.id === method.id));
    this.methods.delete(method.id);
    this.changed.add(cls.id);
  }

  removeField(field: FieldNode): void {
    const cls = this.requireClass(field.owner);
    cls.members = cls.members.filter(ref => !(ref.kind === 'field' && ref.id === field.id));
    this.fields.delete(field.id);
    this.changed.add(cls.id);
  }

  // --- Change tracking ---

  markChanged(cls: ClassNode): void {
    this.changed.add(cls.id);
  }

  /** Forget changes recorded while the model was being built */
  clearChanges(): void {
    this.changed.clear();
  }

  changedClasses(): ClassNode[] {
    return [...this.changed]
      .sort((a, b) => a - b)
      .map(id => this.requireClass(id));
  }

  private requireClass(id: ClassId): ClassNode {
    const cls = this.classes[id];
    if (!cls) throw new Error(`Unknown class #${id}`);
    return cls;
  }
}

function copyMethodInit(method: MethodNode): MethodInit {
  return {
    name: method.name,
    parameters: method.parameters.map(p => ({ ...p })),
    returnType: method.returnType,
    returnTypeIsExplicit: method.returnTypeIsExplicit,
    visibility: method.visibility,
    explicitPublic: method.explicitPublic,
    isAbstract: method.isAbstract,
    isStatic: method.isStatic,
    isAsync: method.isAsync,
    isOverride: method.isOverride,
    typeParameters: method.typeParameters,
    body: method.body,
    overloads: [...method.overloads],
    docs: method.docs,
    decorators: [...method.decorators],
  };
}

function copyFieldInit(field: FieldNode): FieldInit {
  return {
    name: field.name,
    type: field.type,
    typeIsExplicit: field.typeIsExplicit,
    visibility: field.visibility,
    explicitPublic: field.explicitPublic,
    isStatic: field.isStatic,
    isReadonly: field.isReadonly,
    isOptional: field.isOptional,
    isDefinite: field.isDefinite,
    initializer: field.initializer,
    isParameterProperty: field.isParameterProperty,
    docs: field.docs,
    decorators: [...field.decorators],
  };
}

export function stripExtension(filePath: string): string {
  return filePath.replace(/\.(ts|tsx|mts|cts)$/, '');
}
