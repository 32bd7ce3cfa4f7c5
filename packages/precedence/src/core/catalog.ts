import { isConstructor } from '../decorators/annotation.js';
import {
  InvalidRegistrationError,
  ProducerExecutionError,
  RegistrationNotFoundError,
} from '../errors/index.js';
import { AnnotationRegistry } from '../registry/index.js';
import type {
  AnnotationKind,
  AnnotationReader,
  CatalogConfig,
  Constructor,
  OrderComparatorOptions,
  ProducerMethodMetadata,
  RegistrationDescriptor,
  RegistrationId,
  RegistrationMetadata,
  RegistrationRegistry,
} from '../types/index.js';
import { staticAnnotations } from './annotations.js';
import { runtimeTypeOf } from './metadata-resolver.js';
import { OrderComparator } from './order-comparator.js';
import { RegistrationStore, type Registration } from './registration-store.js';

const DEFAULT_NAME = 'Catalog';

/** Milliseconds to nanoseconds for the instantiation hook */
const toNs = (ms: number): number => Math.round(ms * 1_000_000);

const isObject = (value: unknown): value is object =>
  (typeof value === 'object' && value !== null) || typeof value === 'function';

const producerLabel = (producer: ProducerMethodMetadata): string =>
  `${producer.declaringClass.name}${producer.isStatic ? '.' : '#'}${String(producer.methodName)}()`;

/**
 * Minimal in-memory component catalog.
 *
 * Components are registered by class, by value, or by producer method, and
 * are created lazily (once) on first request. The catalog is the bundled
 * {@link RegistrationRegistry} used by the ordering engine, and can sort its
 * own components with {@link sortedInstancesOfType}.
 *
 * Dependency wiring is not part of the catalog: classes are created with
 * `new ctor()` and producer modules with `new Module()`.
 *
 * @example
 * ```typescript
 * class ListenerModule {
 *   @Produces({ type: AuditListener })
 *   @Order(5)
 *   audit() {
 *     return new AuditListener();
 *   }
 * }
 *
 * const catalog = new Catalog({
 *   registrations: [MetricsListener],
 *   modules: [ListenerModule],
 * });
 * const listeners = catalog.sortedInstancesOfType(Listener);
 * ```
 */
export class Catalog implements RegistrationRegistry {
  readonly name: string;
  private readonly store: RegistrationStore;
  private readonly moduleInstances = new Map<Constructor, object>();
  private readonly onInstantiate?: (id: RegistrationId, durationNs: number) => void;

  constructor(config: CatalogConfig = {}) {
    if (typeof config !== 'object' || config === null) {
      throw new InvalidRegistrationError(config, 'Catalog config must be an object.');
    }
    this.name = config.name ?? DEFAULT_NAME;
    this.store = new RegistrationStore(this.name, config.duplicatePolicy);
    this.onInstantiate = config.onInstantiate;

    for (const registration of config.registrations ?? []) this.register(registration);
    for (const moduleClass of config.modules ?? []) this.registerModule(moduleClass);
  }

  // ---------- Registration ----------

  /**
   * Register a class or a registration descriptor.
   *
   * A bare class is registered under its class name.
   */
  register(registration: Constructor | RegistrationDescriptor): this {
    if (isConstructor(registration)) {
      return this.registerClass(registration.name, registration);
    }
    if (typeof registration !== 'object' || registration === null) {
      throw new InvalidRegistrationError(registration, 'Expected a class or a descriptor.');
    }
    if ('useClass' in registration) {
      return this.registerClass(registration.id, registration.useClass);
    }
    if ('useValue' in registration) {
      return this.registerValue(registration.id, registration.useValue);
    }
    if ('useProducer' in registration) {
      const { declaringClass, methodName, isStatic = false } = registration.useProducer;
      return this.registerProducer(
        registration.id,
        declaringClass,
        methodName,
        registration.type,
        isStatic
      );
    }
    throw new InvalidRegistrationError(registration, 'Unknown registration descriptor.');
  }

  registerClass(id: RegistrationId, ctor: Constructor): this {
    this.assertId(id, ctor);
    if (!isConstructor(ctor)) {
      throw new InvalidRegistrationError(ctor, `'${id}' requires a class in useClass.`);
    }
    this.store.add({ id, type: ctor, ctor });
    return this;
  }

  registerValue(id: RegistrationId, value: object): this {
    this.assertId(id, value);
    if (!isObject(value)) {
      throw new InvalidRegistrationError(value, `'${id}' requires an object in useValue.`);
    }
    const type = runtimeTypeOf(value) ?? Object;
    this.store.add({ id, type, instance: value });
    return this;
  }

  /**
   * Register the component returned by a producer method.
   *
   * @param declaringClass - Module class declaring the method
   * @param methodName - Producer method key
   * @param type - Declared type of the produced component
   * @param isStatic - True when the method is static
   */
  registerProducer(
    id: RegistrationId,
    declaringClass: Constructor,
    methodName: string | symbol,
    type: Constructor,
    isStatic = false
  ): this {
    this.assertId(id, declaringClass);
    if (!isConstructor(declaringClass) || !isConstructor(type)) {
      throw new InvalidRegistrationError(
        { declaringClass, methodName, type },
        `'${id}' requires classes for declaringClass and type.`
      );
    }
    const holder: unknown = isStatic ? declaringClass : declaringClass.prototype;
    const method: unknown = isObject(holder) ? Reflect.get(holder, methodName) : undefined;
    if (typeof method !== 'function') {
      throw new InvalidRegistrationError(
        { declaringClass, methodName, type },
        `'${id}': ${declaringClass.name} has no ${isStatic ? 'static ' : ''}method '${String(methodName)}'.`
      );
    }
    this.store.add({ id, type, producer: { declaringClass, methodName, isStatic } });
    return this;
  }

  /**
   * Register every `@Produces()` method declared on a module class, in
   * declaration order.
   */
  registerModule(moduleClass: Constructor): this {
    if (!isConstructor(moduleClass)) {
      throw new InvalidRegistrationError(moduleClass, 'Modules must be classes.');
    }
    const producers = AnnotationRegistry.producersOf(moduleClass);
    if (producers.length === 0) {
      throw new InvalidRegistrationError(
        moduleClass,
        `${moduleClass.name} declares no @Produces() methods.`
      );
    }
    for (const producer of producers) {
      this.registerProducer(
        producer.name,
        moduleClass,
        producer.methodName,
        producer.type,
        producer.isStatic
      );
    }
    return this;
  }

  // ---------- Registry queries ----------

  /**
   * Ids whose resolved type is `type` or a subclass of it, in registration
   * order. The resolved type is the instance's runtime type once the
   * component exists, and the declared type before that.
   */
  lookupByType(type: Constructor): RegistrationId[] {
    const ids: RegistrationId[] = [];
    for (const entry of this.store.values()) {
      const resolved = this.resolvedType(entry);
      if (resolved === type || resolved.prototype instanceof type) ids.push(entry.id);
    }
    return ids;
  }

  isRegistered(id: RegistrationId): boolean {
    return this.store.has(id);
  }

  /**
   * @throws RegistrationNotFoundError for an unknown id
   */
  metadataFor(id: RegistrationId): RegistrationMetadata {
    const entry = this.entry(id);
    return entry.producer
      ? { id, type: this.resolvedType(entry), producer: entry.producer }
      : { id, type: this.resolvedType(entry) };
  }

  /**
   * Registered ids in registration order.
   */
  ids(): RegistrationId[] {
    return this.store.ids();
  }

  /**
   * Ids whose producer method carries annotation `kind`.
   */
  annotatedWith(
    kind: AnnotationKind,
    reader: AnnotationReader = staticAnnotations
  ): RegistrationId[] {
    const ids: RegistrationId[] = [];
    for (const entry of this.store.values()) {
      if (entry.producer && reader.isAnnotated(entry.producer, kind)) ids.push(entry.id);
    }
    return ids;
  }

  // ---------- Instances ----------

  /**
   * Return the component registered under `id`, creating it on first use.
   *
   * @throws RegistrationNotFoundError for an unknown id
   * @throws ProducerExecutionError if a producer method throws or returns a
   *         non-object
   */
  get(id: RegistrationId): object {
    return this.materialize(this.entry(id));
  }

  /**
   * Components whose type is `type` or a subclass of it, in registration
   * order. Creates them as needed.
   */
  instancesOfType<T extends object>(type: Constructor<T>): T[] {
    const instances: T[] = [];
    for (const id of this.lookupByType(type)) {
      const instance = this.get(id);
      if (instance instanceof type) instances.push(instance);
    }
    return instances;
  }

  /**
   * Components of `type` sorted by their resolved order, lowest first.
   */
  sortedInstancesOfType<T extends object>(
    type: Constructor<T>,
    options?: OrderComparatorOptions
  ): T[] {
    return new OrderComparator(this, options).sort(this.instancesOfType(type));
  }

  // ---------- Internals ----------

  private entry(id: RegistrationId): Registration {
    const entry = this.store.get(id);
    if (!entry) throw new RegistrationNotFoundError(id, this.name, this.store.ids());
    return entry;
  }

  private resolvedType(entry: Registration): Constructor {
    return (entry.instance && runtimeTypeOf(entry.instance)) || entry.type;
  }

  private assertId(id: unknown, registration: unknown): void {
    if (typeof id !== 'string' || id.length === 0) {
      throw new InvalidRegistrationError(
        registration,
        'Registration ids must be non-empty strings.'
      );
    }
  }

  private materialize(entry: Registration): object {
    if (entry.instance !== undefined) return entry.instance;

    const create = (): object =>
      entry.producer ? this.produce(entry.id, entry.producer) : this.construct(entry);

    const hook = this.onInstantiate;
    if (!hook) {
      entry.instance = create();
      return entry.instance;
    }

    const start = performance.now();
    const instance = create();
    entry.instance = instance;
    hook(entry.id, toNs(performance.now() - start));
    return instance;
  }

  private construct(entry: Registration): object {
    if (!entry.ctor) {
      throw new InvalidRegistrationError(entry, `'${entry.id}' has nothing to construct.`);
    }
    return new entry.ctor();
  }

  private produce(id: RegistrationId, producer: ProducerMethodMetadata): object {
    const target = producer.isStatic
      ? producer.declaringClass
      : this.moduleInstance(producer.declaringClass);

    let produced: unknown;
    try {
      const method: unknown = Reflect.get(target, producer.methodName);
      if (typeof method !== 'function') {
        throw new TypeError(`${String(producer.methodName)} is not a function`);
      }
      produced = Reflect.apply(method, target, []);
    } catch (err) {
      throw new ProducerExecutionError(id, producerLabel(producer), err);
    }

    if (!isObject(produced)) {
      throw new ProducerExecutionError(
        id,
        producerLabel(producer),
        new TypeError(`Producer returned ${produced === null ? 'null' : typeof produced}.`)
      );
    }
    return produced;
  }

  private moduleInstance(moduleClass: Constructor<object>): object {
    let instance = this.moduleInstances.get(moduleClass);
    if (!instance) {
      instance = new moduleClass();
      this.moduleInstances.set(moduleClass, instance);
    }
    return instance;
  }
}
