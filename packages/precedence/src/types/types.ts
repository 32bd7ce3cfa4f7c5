/**
 * Generic constructor signature used throughout the package.
 *
 * @template T - Type produced by the constructor
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = any> = new (...args: any[]) => T;

/**
 * Stable name identifying an annotation kind (e.g. `'order'`).
 *
 * Kinds are plain strings rather than language types so that metadata can be
 * produced and consumed by code that never shares a class reference.
 */
export type AnnotationKind = string;

/**
 * Decoded contents of one annotation instance: attribute name -> value.
 */
export type AttributeMap = ReadonlyMap<string, unknown>;

/**
 * Signed 32-bit ordering key. Lower values sort first.
 */
export type Priority = number;

/**
 * Key under which a candidate is known to its catalog.
 */
export type RegistrationId = string;

/**
 * Descriptor of the factory method that produced a registration.
 *
 * Instance methods are invoked on a lazily created instance of
 * `declaringClass`; static methods are invoked on the class itself.
 */
export interface ProducerMethodMetadata {
  readonly declaringClass: Constructor;
  readonly methodName: string | symbol;
  readonly isStatic: boolean;
}

/**
 * Read-only record describing how a candidate was registered.
 */
export interface RegistrationMetadata {
  readonly id: RegistrationId;
  /** Resolved type of the registration (instance type once materialized). */
  readonly type: Constructor;
  /** Present when the candidate is created by a producer method. */
  readonly producer?: ProducerMethodMetadata;
}

/**
 * Registry query interface consumed by the ordering engine.
 *
 * Implementations must treat their contents as read-only for the duration of
 * a sort. {@link Catalog} is the bundled implementation.
 */
export interface RegistrationRegistry {
  /**
   * Ids whose resolved type is `type` or a subclass of it, in registration
   * order.
   */
  lookupByType(type: Constructor): readonly RegistrationId[];
  isRegistered(id: RegistrationId): boolean;
  /** @throws RegistrationNotFoundError for an unknown id */
  metadataFor(id: RegistrationId): RegistrationMetadata;
}

/**
 * Annotation decode interface consumed by the metadata resolver.
 */
export interface AnnotationReader {
  /** Class-level annotation, searching superclasses nearest first. */
  findAnnotation(type: Constructor, kind: AnnotationKind): AttributeMap | undefined;
  attributesOf(producer: ProducerMethodMetadata, kind: AnnotationKind): AttributeMap | undefined;
  isAnnotated(producer: ProducerMethodMetadata, kind: AnnotationKind): boolean;
}

/**
 * Strategy that supplied a resolved priority.
 */
export type OrderSource = 'annotation' | 'capability' | 'accessor' | 'default';

/**
 * Payload passed to {@link OrderComparatorOptions.onResolve}.
 */
export interface OrderResolution {
  readonly candidate: unknown;
  readonly priority: Priority;
  readonly source: OrderSource;
}

export interface OrderComparatorOptions {
  /**
   * Annotation decode interface.
   *
   * @default staticAnnotations (reads decorator metadata)
   */
  reader?: AnnotationReader;

  /**
   * Optional hook invoked after every resolution. Useful for tracing why a
   * candidate landed where it did in a sorted list.
   */
  onResolve?: (event: OrderResolution) => void;
}

/**
 * Policy applied when an id is registered twice in the same catalog.
 * - 'error' (default): throw {@link DuplicateRegistrationError}
 * - 'warn': log a warning and replace the earlier registration
 * - 'allow': silently replace the earlier registration
 */
export type DuplicatePolicy = 'error' | 'warn' | 'allow';

/**
 * Register a class; instances are created with `new ctor()`.
 *
 * @example
 * ```typescript
 * { id: 'audit', useClass: AuditListener }
 * ```
 */
export interface ClassRegistration {
  id: RegistrationId;
  useClass: Constructor;
}

/**
 * Register a pre-created value.
 *
 * @example
 * ```typescript
 * { id: 'clock', useValue: new SystemClock() }
 * ```
 */
export interface ValueRegistration {
  id: RegistrationId;
  useValue: object;
}

/**
 * Register the result of a producer method.
 *
 * @example
 * ```typescript
 * { id: 'cache', useProducer: { declaringClass: CacheModule, methodName: 'cache' }, type: Cache }
 * ```
 */
export interface ProducerRegistration {
  id: RegistrationId;
  useProducer: {
    declaringClass: Constructor;
    methodName: string | symbol;
    isStatic?: boolean;
  };
  type: Constructor;
}

/**
 * Registration union accepted by the catalog.
 */
export type RegistrationDescriptor = ClassRegistration | ValueRegistration | ProducerRegistration;

/**
 * Catalog configuration passed to the constructor.
 */
export interface CatalogConfig {
  /**
   * Optional name for debugging and error messages.
   *
   * @default 'Catalog'
   */
  name?: string;

  /**
   * Registrations applied in order at construction.
   *
   * A bare constructor is registered under its class name.
   */
  registrations?: Array<Constructor | RegistrationDescriptor>;

  /**
   * Producer modules scanned for `@Produces()` methods at construction,
   * after `registrations`.
   */
  modules?: Constructor[];

  /**
   * Policy for handling duplicate registration ids.
   *
   * @default 'error'
   */
  duplicatePolicy?: DuplicatePolicy;

  /**
   * Optional hook invoked after a registration is materialized.
   *
   * Receives the registration id and the instantiation duration in
   * nanoseconds.
   */
  onInstantiate?: (id: RegistrationId, durationNs: number) => void;
}
