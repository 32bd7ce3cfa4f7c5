import { InvalidAnnotationTargetError } from '../errors/index.js';
import { AnnotationRegistry } from '../registry/index.js';
import type { AnnotationKind, Constructor } from '../types/index.js';

/**
 * Decorator usable on a class or on one of its (static or instance) methods.
 */
export type AnnotationDecorator = (
  target: object,
  propertyKey?: string | symbol,
  descriptor?: PropertyDescriptor
) => void;

/**
 * Runtime type guard for class constructors.
 */
export function isConstructor(value: unknown): value is Constructor {
  return typeof value === 'function' && typeof value.prototype === 'object';
}

/**
 * Human-readable name of a decorated member, used in diagnostics.
 */
export function memberLabel(owner: Constructor, key: string | symbol, isStatic: boolean): string {
  return `${owner.name}${isStatic ? '.' : '#'}${String(key)}`;
}

/**
 * Resolve the declaring class of a decorated method.
 *
 * Legacy decorators receive the constructor for static members and the
 * prototype for instance members.
 */
export function declaringClassOf(
  kind: string,
  target: object,
  propertyKey: string | symbol
): { owner: Constructor; isStatic: boolean } {
  if (isConstructor(target)) return { owner: target, isStatic: true };
  const owner: unknown = target.constructor;
  if (!isConstructor(owner)) {
    throw new InvalidAnnotationTargetError(kind, `member '${String(propertyKey)}'`);
  }
  return { owner, isStatic: false };
}

/**
 * Build a decorator factory for an annotation kind.
 *
 * The returned factory takes the annotation's attributes and yields a
 * decorator that records them under `kind` in the {@link AnnotationRegistry},
 * either at class level or on the decorated method. Properties, accessors and
 * parameters are rejected.
 *
 * @param kind - Stable annotation name
 * @param normalize - Validates and shapes attributes before they are stored
 *
 * @example
 * ```typescript
 * const Tier = defineAnnotation<{ value: string }>('tier');
 *
 * @Tier({ value: 'gold' })
 * class GoldPlan {}
 * ```
 */
export function defineAnnotation<A extends object>(
  kind: AnnotationKind,
  normalize: (attributes: A) => A = (attributes) => attributes
): (attributes: A) => AnnotationDecorator {
  return (attributes) => {
    const entries = new Map<string, unknown>(Object.entries(normalize(attributes)));

    return (target, propertyKey, descriptor) => {
      if (propertyKey === undefined) {
        if (!isConstructor(target)) {
          throw new InvalidAnnotationTargetError(kind, 'a non-class value');
        }
        AnnotationRegistry.annotateType(target, kind, entries);
        return;
      }

      const { owner, isStatic } = declaringClassOf(kind, target, propertyKey);
      if (typeof descriptor?.value !== 'function') {
        throw new InvalidAnnotationTargetError(kind, memberLabel(owner, propertyKey, isStatic));
      }
      AnnotationRegistry.annotateMethod(owner, propertyKey, isStatic, kind, entries);
    };
  };
}
