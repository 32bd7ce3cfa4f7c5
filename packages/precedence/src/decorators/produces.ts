import { InvalidAnnotationTargetError, InvalidRegistrationError } from '../errors/index.js';
import { AnnotationRegistry } from '../registry/index.js';
import type { Constructor, RegistrationId } from '../types/index.js';
import {
  declaringClassOf,
  isConstructor,
  memberLabel,
  type AnnotationDecorator,
} from './annotation.js';

export interface ProducesOptions {
  /** Declared type of the produced component */
  type: Constructor;
  /** Registration id (defaults to the method name) */
  name?: RegistrationId;
}

/**
 * Marks a method of a module class as the producer of a component.
 *
 * The decorator only records the method. `Catalog.registerModule()` (or the
 * `modules` option) registers every producer of a module, and the catalog
 * calls the method the first time the component is requested. Instance
 * methods run on a single instance of the module created with `new`; static
 * methods run on the class.
 *
 * @example
 * ```typescript
 * class StorageModule {
 *   @Produces({ type: DiskCache, name: 'cache' })
 *   @Order(1)
 *   createCache() {
 *     return new DiskCache('/tmp/cache');
 *   }
 * }
 *
 * const catalog = new Catalog({ modules: [StorageModule] });
 * ```
 */
export function Produces(options: ProducesOptions): AnnotationDecorator {
  if (!options || !isConstructor(options.type)) {
    throw new InvalidRegistrationError(options, '@Produces() requires a class in `type`.');
  }

  return (target, propertyKey, descriptor) => {
    if (propertyKey === undefined) {
      throw new InvalidAnnotationTargetError('Produces', 'a class');
    }
    const { owner, isStatic } = declaringClassOf('Produces', target, propertyKey);
    if (typeof descriptor?.value !== 'function') {
      throw new InvalidAnnotationTargetError('Produces', memberLabel(owner, propertyKey, isStatic));
    }

    AnnotationRegistry.registerProducer(owner, {
      name: options.name ?? String(propertyKey),
      methodName: propertyKey,
      isStatic,
      type: options.type,
    });
  };
}
