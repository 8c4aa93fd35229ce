import type { ClassNode, Parameter } from '../../graph/types.js';
import { walkBody, type CallTarget } from '../../parsers/body.js';
import type { MigrationContext } from '../context.js';
import { applyTextEdits } from '../import-rewriter.helpers.js';
import type { TextEdit } from '../types.js';
import { classifyOwner, lookupMember } from './dependencies.js';
import { sameType } from './type-unifier.js';

export interface RewriteScope {
  /** Class the body was written in */
  origin: ClassNode;
  /** Class the body lives in after the move */
  host: ClassNode;
  /** Method owning the body, for messages */
  methodName: string;
}

export interface RewriteRules {
  /** Downcast `this` arguments the host type no longer satisfies */
  selfCasts?: boolean;
  /**
   * Turn `super.x()` into `this.x()` when `x` was declared between the
   * origin and the host and so is no longer reachable through `super`.
   */
  redirectSuperCalls?: boolean;
  /** Rewrite local annotations naming the old return type */
  retype?: { from: string; to: string };
  /** `super.name()` statements to replace, keyed by name, with the marker comment */
  removeSuperCalls?: Map<string, string>;
}

/**
 * Rewrite a method body in one pass over its call arguments, super accesses
 * and local annotations. Returns the body unchanged when no rule applies.
 */
export function rewriteBody(ctx: MigrationContext, body: string, scope: RewriteScope, rules: RewriteRules): string {
  const edits: TextEdit[] = [];
  const { model, navigator } = ctx;
  const label = `${scope.host.name}.${scope.methodName}()`;

  walkBody(body, {
    onSelfArgument: argument => {
      if (!rules.selfCasts) return;

      const expected = expectedParameterType(ctx, scope.origin, argument.callee, argument.index);
      if (expected === null) return;
      if (navigator.isAssignable(scope.host.name, expected)) return;
      if (!navigator.isAssignable(scope.origin.name, expected)) return;

      edits.push({
        startOffset: argument.start,
        endOffset: argument.end,
        newText: `(this as ${castTarget(scope.origin)})`,
        description: 'self downcast',
      });
      ctx.warn(`Cast this to ${scope.origin.name} in ${label}: ${describeCallee(argument.callee)} expects ${expected}`);
    },

    onSuperAccess: access => {
      const marker = rules.removeSuperCalls?.get(access.name);
      if (marker !== undefined && access.isCall) {
        if (access.statement) {
          edits.push({ startOffset: access.statement.start, endOffset: access.statement.end, newText: marker });
          ctx.warn(`Removed super.${access.name}() from ${label}; ${access.name} is now abstract above it`);
        } else {
          ctx.warn(`super.${access.name}() in ${label} is part of a larger expression and was left in place`);
        }
        return;
      }

      if (!rules.redirectSuperCalls || access.name === scope.methodName) return;

      const start = model.superclassOf(scope.origin);
      const found = start ? lookupMember(model, navigator, start, access.name) : null;
      if (!found) return;

      if (classifyOwner(navigator, found.owner, scope.origin, scope.host) === 'intermediate') {
        edits.push({ startOffset: access.start, endOffset: access.start + 'super'.length, newText: 'this' });
        ctx.warn(`super.${access.name} in ${label} now reads this.${access.name}; it was declared in ${found.owner.name}`);
      } else if (found.owner.id === scope.host.id) {
        ctx.warn(`super.${access.name} in ${label} now skips ${scope.host.name}.${access.name}`);
      }
    },

    onLocalAnnotation: annotation => {
      const retype = rules.retype;
      if (!retype || !sameType(annotation.type, retype.from)) return;

      edits.push({ startOffset: annotation.start, endOffset: annotation.end, newText: retype.to });
      ctx.debug(`Retyped local ${annotation.name} in ${label}: ${retype.from} -> ${retype.to}`);
    },
  });

  return edits.length === 0 ? body : applyTextEdits(body, edits);
}

/** `Origin`, or `Origin<unknown, ...>` for a generic class */
function castTarget(cls: ClassNode): string {
  if (cls.typeParameterNames.length === 0) return cls.name;
  return `${cls.name}<${cls.typeParameterNames.map(() => 'unknown').join(', ')}>`;
}

function describeCallee(callee: CallTarget): string {
  switch (callee.kind) {
    case 'this-member': return `this.${callee.name}()`;
    case 'super-member': return `super.${callee.name}()`;
    case 'constructor': return `new ${callee.className}()`;
    case 'static': return `${callee.className}.${callee.name}()`;
    case 'function': return `${callee.name}()`;
    default: return 'the call';
  }
}

/**
 * Declared type of the parameter a `this` argument lands in, looked up from
 * where the body was written. Null when the callee is not in the model.
 */
function expectedParameterType(
  ctx: MigrationContext,
  origin: ClassNode,
  callee: CallTarget,
  index: number
): string | null {
  const { model, navigator } = ctx;
  let parameters: Parameter[] | null = null;

  switch (callee.kind) {
    case 'this-member':
    case 'super-member': {
      const start = callee.kind === 'this-member' ? origin : model.superclassOf(origin);
      const found = start ? lookupMember(model, navigator, start, callee.name) : null;
      if (found && 'member' in found && found.member.kind === 'method') {
        parameters = found.member.node.parameters;
      }
      break;
    }
    case 'constructor': {
      let cls = model.classForType(callee.className);
      while (cls && cls.constructorParameters === null) cls = model.superclassOf(cls);
      parameters = cls?.constructorParameters ?? null;
      break;
    }
    case 'static': {
      const cls = model.classForType(callee.className);
      if (!cls) break;
      for (const candidate of [cls, ...navigator.ancestorsOf(cls)]) {
        const method = model.methodsOf(candidate).find(m => m.isStatic && m.name === callee.name);
        if (method) {
          parameters = method.parameters;
          break;
        }
      }
      break;
    }
    case 'function':
      parameters = model.getFile(origin.filePath)?.functions.get(callee.name) ?? null;
      break;
    default:
      break;
  }

  return parameters ? parameterTypeAt(parameters, index) : null;
}

function parameterTypeAt(parameters: Parameter[], index: number): string | null {
  const direct = parameters[index];
  const last = parameters[parameters.length - 1];

  if (last && last.text.startsWith('...') && index >= parameters.length - 1) {
    const match = /^(?:Array<(.+)>|(.+)\[\])$/s.exec(last.type.trim());
    return match ? (match[1] ?? match[2] ?? null) : null;
  }

  return direct ? direct.type : null;
}
