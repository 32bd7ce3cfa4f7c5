import { isConstructor } from '../decorators/annotation.js';
import { AnnotationRegistry } from '../registry/index.js';
import type {
  AnnotationKind,
  AnnotationReader,
  AttributeMap,
  Constructor,
  ProducerMethodMetadata,
} from '../types/index.js';

/**
 * Iterate a class and its superclasses, nearest first.
 *
 * Stops at the root of user-defined classes (the chain ends at
 * Function.prototype, which is not a constructor).
 */
export function* classHierarchy(type: Constructor): IterableIterator<Constructor> {
  let current: unknown = type;
  while (isConstructor(current) && current !== Object) {
    yield current;
    current = Object.getPrototypeOf(current);
  }
}

/**
 * Class in the hierarchy of `producer.declaringClass` that actually declares
 * the producer method. An override without annotations therefore hides the
 * annotations of the overridden method.
 */
function methodOwner(producer: ProducerMethodMetadata): Constructor {
  for (const ctor of classHierarchy(producer.declaringClass)) {
    const holder: object = producer.isStatic ? ctor : ctor.prototype;
    if (Object.prototype.hasOwnProperty.call(holder, producer.methodName)) return ctor;
  }
  return producer.declaringClass;
}

/**
 * Annotation reader backed by decorator metadata in the
 * {@link AnnotationRegistry}.
 */
export const staticAnnotations: AnnotationReader = {
  findAnnotation(type: Constructor, kind: AnnotationKind): AttributeMap | undefined {
    for (const ctor of classHierarchy(type)) {
      const found = AnnotationRegistry.typeAnnotation(ctor, kind);
      if (found) return found;
    }
    return undefined;
  },

  attributesOf(producer: ProducerMethodMetadata, kind: AnnotationKind): AttributeMap | undefined {
    return AnnotationRegistry.methodAnnotation(
      methodOwner(producer),
      producer.methodName,
      producer.isStatic,
      kind
    );
  },

  isAnnotated(producer: ProducerMethodMetadata, kind: AnnotationKind): boolean {
    return staticAnnotations.attributesOf(producer, kind) !== undefined;
  },
};
