import type { ClassNode, FieldNode } from '../../graph/types.js';
import type { MigrationContext } from '../context.js';
import { analyzeInitializer, type DependencyReport } from './dependencies.js';
import { unresolvableNames } from './type-resolution.js';
import { unifyTypes } from './type-unifier.js';
import { widest } from './visibility.js';

/** Called with the dependencies of a pulled-up field's initializer */
export type DependencyHandler = (report: DependencyReport) => void;

/**
 * Move one field to the destination. A field that cannot move is skipped
 * with a warning; the rest of the migration carries on.
 *
 * @returns whether the field now lives on the destination
 */
export function migrateField(
  ctx: MigrationContext,
  field: FieldNode,
  destination: ClassNode,
  onDependencies: DependencyHandler
): boolean {
  if (ctx.visited.has(field.id)) return true;
  ctx.visited.add(field.id);

  const { model, navigator } = ctx;
  const owner = model.ownerOf(field);
  const label = `${owner.name}.${field.name}`;

  if (field.isStatic) {
    ctx.warn(`Static field ${label} is not pulled up`);
    return false;
  }

  if (field.isParameterProperty) {
    ctx.warn(`Field ${label} is a constructor parameter property and stays in ${owner.name}`);
    return false;
  }

  if (model.fieldsOf(destination).some(f => f.name === field.name)) {
    ctx.warn(`${destination.name} already has a field named ${field.name}; ${label} was not pulled up`);
    return false;
  }

  const unresolved = unresolvableNames(model, field.type, owner, destination);
  if (unresolved.length > 0) {
    ctx.warn(`Type ${unresolved.join(', ')} of ${label} cannot be resolved from ${destination.name}; field not pulled up`);
    return false;
  }

  const visibility = ctx.isCrossModule(owner, destination) ? 'public' : widest(field.visibility, 'protected');

  const others = navigator
    .descendantsOf(destination)
    .flatMap(cls => model.fieldsOf(cls))
    .filter(f => f.name === field.name && f.id !== field.id && !f.isStatic)
    .map(f => f.type);
  const unified = unifyTypes(model, navigator, field.type, others);
  if (unified.widenedToTop) {
    ctx.warn(`No common type for field ${field.name} below ${destination.name}; declared as ${unified.type}`);
  }

  let isReadonly = field.isReadonly;
  if (isReadonly && field.initializer === null) {
    isReadonly = false;
    ctx.warn(`Dropped readonly from ${field.name}: ${owner.name} assigns it outside ${destination.name}'s constructor`);
  }

  // Subclass constructors still assign it; the destination's never does
  const isDefinite = field.initializer === null && !field.isOptional;

  model.cloneField(field, destination.id, {
    visibility,
    type: unified.type,
    typeIsExplicit: field.typeIsExplicit || unified.type !== field.type || isDefinite,
    isReadonly,
    isDefinite,
  });
  model.removeField(field);

  if (ctx.announced.has(field.id)) {
    ctx.debug(`Pulled up field ${label} to ${destination.name} as ${visibility}`);
  } else {
    ctx.warn(`Field ${label} was pulled up to ${destination.name} as ${visibility}`);
  }
  ctx.pulledFields.push(label);

  for (const between of navigator.pathBetween(owner, destination)) {
    for (const shadow of model.fieldsOf(between).filter(f => f.name === field.name && !f.isStatic)) {
      if (shadow.isParameterProperty) {
        ctx.warn(`${between.name}.${shadow.name} is a constructor parameter property and still shadows the pulled-up field`);
        continue;
      }
      model.removeField(shadow);
      ctx.warn(`Removed ${between.name}.${shadow.name}, which shadowed the pulled-up field`);
    }
  }

  if (field.initializer !== null) {
    onDependencies(analyzeInitializer(model, navigator, field.initializer, { origin: owner, destination, self: field.id }));
  }

  return true;
}
