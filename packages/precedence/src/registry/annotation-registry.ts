import type { AnnotationKind, AttributeMap, Constructor, RegistrationId } from '../types/index.js';

/**
 * Annotations recorded on one target: kind -> decoded attributes.
 */
type AnnotationSet = Map<AnnotationKind, AttributeMap>;

/**
 * Producer method captured by `@Produces()`.
 */
export interface ProducerDefinition {
  /** Registration id the produced component is registered under */
  readonly name: RegistrationId;
  readonly methodName: string | symbol;
  readonly isStatic: boolean;
  /** Declared type of the produced component */
  readonly type: Constructor;
}

/**
 * A bag of decorator metadata.
 *
 * Fields:
 * - types: class-level annotations keyed by constructor
 * - methods: instance-method annotations keyed by declaring constructor
 * - statics: static-method annotations keyed by declaring constructor
 * - producers: `@Produces()` methods keyed by declaring constructor, in
 *   decoration order
 *
 * WeakMaps let unused constructors be garbage collected.
 */
type AnnotationBag = {
  types: WeakMap<Constructor, AnnotationSet>;
  methods: WeakMap<Constructor, Map<string | symbol, AnnotationSet>>;
  statics: WeakMap<Constructor, Map<string | symbol, AnnotationSet>>;
  producers: WeakMap<Constructor, ProducerDefinition[]>;
};

declare global {
  /**
   * Process-wide annotation store.
   *
   * Lives on globalThis so decorators evaluated by a second copy of this
   * module (monorepos, duplicated bundles) still write to the same place.
   */
  // eslint-disable-next-line no-var
  var __PRECEDENCE_ANNOTATIONS__: AnnotationBag | undefined;
}

/**
 * Create a fresh, empty AnnotationBag.
 */
function createBag(): AnnotationBag {
  return {
    types: new WeakMap(),
    methods: new WeakMap(),
    statics: new WeakMap(),
    producers: new WeakMap(),
  };
}

function ensureBag(): AnnotationBag {
  return (globalThis.__PRECEDENCE_ANNOTATIONS__ ??= createBag());
}

/**
 * Get or create the nested value stored under `key`.
 */
function setFor<K, V>(
  map: { get(key: K): V | undefined; set(key: K, value: V): unknown },
  key: K,
  create: () => V
): V {
  let value = map.get(key);
  if (value === undefined) {
    value = create();
    map.set(key, value);
  }
  return value;
}

/**
 * Global registry for decorator-based annotation metadata.
 *
 * Architecture:
 * - Decorators call annotateType() / annotateMethod() / registerProducer()
 *   at module load time
 * - The static annotation reader queries typeAnnotation() and
 *   methodAnnotation() while resolving order
 * - Catalog.registerModule() reads producersOf() to register producer methods
 *
 * Lookups here are exact: they never walk the class hierarchy. Inheritance is
 * the reader's concern.
 */
export class AnnotationRegistry {
  /**
   * Record a class-level annotation.
   *
   * Annotating the same class twice with one kind replaces the attributes.
   */
  static annotateType(target: Constructor, kind: AnnotationKind, attributes: AttributeMap): void {
    const bag = ensureBag();
    setFor(bag.types, target, (): AnnotationSet => new Map()).set(kind, new Map(attributes));
  }

  /**
   * Record a method-level annotation.
   *
   * @param owner - Class declaring the method
   * @param methodName - Method key
   * @param isStatic - True for static methods (decorated on the constructor)
   */
  static annotateMethod(
    owner: Constructor,
    methodName: string | symbol,
    isStatic: boolean,
    kind: AnnotationKind,
    attributes: AttributeMap
  ): void {
    const bag = ensureBag();
    const methods = setFor(
      isStatic ? bag.statics : bag.methods,
      owner,
      (): Map<string | symbol, AnnotationSet> => new Map()
    );
    setFor(methods, methodName, (): AnnotationSet => new Map()).set(kind, new Map(attributes));
  }

  /**
   * Annotation declared directly on `target`, ignoring superclasses.
   */
  static typeAnnotation(target: Constructor, kind: AnnotationKind): AttributeMap | undefined {
    return ensureBag().types.get(target)?.get(kind);
  }

  /**
   * Annotation declared directly on a method of `owner`, ignoring
   * superclasses.
   */
  static methodAnnotation(
    owner: Constructor,
    methodName: string | symbol,
    isStatic: boolean,
    kind: AnnotationKind
  ): AttributeMap | undefined {
    const bag = ensureBag();
    return (isStatic ? bag.statics : bag.methods).get(owner)?.get(methodName)?.get(kind);
  }

  /**
   * Record a producer method captured by `@Produces()`.
   *
   * A second definition for the same method replaces the first.
   */
  static registerProducer(owner: Constructor, definition: ProducerDefinition): void {
    const list = setFor(ensureBag().producers, owner, (): ProducerDefinition[] => []);
    const existing = list.findIndex(
      (p) => p.methodName === definition.methodName && p.isStatic === definition.isStatic
    );
    if (existing >= 0) list[existing] = definition;
    else list.push(definition);
  }

  /**
   * Producer methods declared on `owner`, in decoration order.
   */
  static producersOf(owner: Constructor): readonly ProducerDefinition[] {
    return ensureBag().producers.get(owner) ?? [];
  }

  /**
   * Reset the registry.
   *
   * ⚠️ This is intended for test environments. Calling reset() in production
   * drops decorator metadata for modules that were already imported.
   */
  static reset(): void {
    globalThis.__PRECEDENCE_ANNOTATIONS__ = createBag();
  }

  /**
   * Test helper to reset the registry.
   *
   * ⚠️ For test environments only. Alias for reset().
   */
  static resetForTests(): void {
    this.reset();
  }
}
