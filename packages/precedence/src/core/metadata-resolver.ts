import { isConstructor } from '../decorators/annotation.js';
import type {
  AnnotationKind,
  AnnotationReader,
  AttributeMap,
  Constructor,
  RegistrationMetadata,
  RegistrationRegistry,
} from '../types/index.js';
import { staticAnnotations } from './annotations.js';
import { mergeAttributes } from './attributes.js';

/**
 * Runtime type of a candidate: the `constructor` of its prototype.
 *
 * Returns undefined for null-prototype objects and for values whose
 * prototype does not point back to a constructor.
 */
export function runtimeTypeOf(candidate: object): Constructor | undefined {
  const proto: unknown = Object.getPrototypeOf(candidate);
  if (typeof proto !== 'object' || proto === null) return undefined;
  const ctor: unknown = proto.constructor;
  return isConstructor(ctor) ? ctor : undefined;
}

/**
 * Registrations of `type` whose producer method carries `kind`, in registry
 * iteration order.
 *
 * Ids returned by lookupByType() but no longer registered are skipped.
 */
export function annotatedProducers(
  registry: RegistrationRegistry,
  type: Constructor,
  kind: AnnotationKind,
  reader: AnnotationReader = staticAnnotations
): RegistrationMetadata[] {
  const matches: RegistrationMetadata[] = [];
  for (const id of registry.lookupByType(type)) {
    if (!registry.isRegistered(id)) continue;
    const metadata = registry.metadataFor(id);
    if (metadata.producer && reader.isAnnotated(metadata.producer, kind)) {
      matches.push(metadata);
    }
  }
  return matches;
}

/**
 * Calculates the attributes of annotation `kind` for a candidate, merging
 * the annotation on the candidate's class with the one on the producer
 * method that registered it.
 *
 * Take the following example:
 *
 * ```typescript
 * @Order(1)
 * class Listener {}
 * ```
 *
 * Resolving `'order'` on an instance of `Listener` yields `{ value: 1 }`.
 * If the same class is also registered by a producer method:
 *
 * ```typescript
 * class ListenerModule {
 *   @Produces({ type: Listener })
 *   @Order(2)
 *   listener() {
 *     return new Listener();
 *   }
 * }
 * ```
 *
 * then resolving it yields `{ value: 2 }`: producer attributes replace class
 * attributes key by key.
 *
 * When several producers of the candidate's type are annotated, the first
 * one in registry order contributes. Which producer actually created a given
 * instance is not tracked.
 *
 * Plain objects (runtime type `Object`) carry no metadata, since every
 * registration is assignable to `Object`.
 *
 * The returned map is always a fresh copy. Missing metadata is not an error
 * and yields an empty map. Failures raised by the registry or reader
 * propagate unchanged.
 */
export function resolveAttributes(
  registry: RegistrationRegistry,
  kind: AnnotationKind,
  candidate: object,
  reader: AnnotationReader = staticAnnotations
): AttributeMap {
  const type = runtimeTypeOf(candidate);
  if (!type || type === Object) return new Map<string, unknown>();

  const producers = annotatedProducers(registry, type, kind, reader);
  const base = reader.findAnnotation(type, kind);
  const first = producers[0]?.producer;
  if (!first) return mergeAttributes(base, undefined);

  return mergeAttributes(base, reader.attributesOf(first, kind));
}
