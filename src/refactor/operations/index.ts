export { migrate } from './migrate.js';
export { checkConflict, sameSignature } from './conflicts.js';
export { analyzeDependencies, analyzeInitializer, type DependencyReport, type DependencyScope } from './dependencies.js';
export { resolveVisibility, applyVisibility, widest } from './visibility.js';
export { unifyTypes, sameType } from './type-unifier.js';
export { planMigration, migrateMethod } from './method-migration.js';
export { migrateField } from './field-migration.js';
export { rewriteBody, type RewriteRules, type RewriteScope } from './rewriter.js';
