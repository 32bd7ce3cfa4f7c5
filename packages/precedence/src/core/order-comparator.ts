import { InvalidOrderValueError, OrderInvocationError } from '../errors/index.js';
import type {
  AnnotationReader,
  OrderComparatorOptions,
  OrderResolution,
  OrderSource,
  Priority,
  RegistrationRegistry,
} from '../types/index.js';
import { staticAnnotations } from './annotations.js';
import { probeCapability } from './capability.js';
import { resolveAttributes, runtimeTypeOf } from './metadata-resolver.js';
import {
  isPriority,
  LOWEST_PRECEDENCE,
  ORDER_ANNOTATION,
  ORDER_VALUE_ATTRIBUTE,
} from './precedence.js';

/**
 * One link of the precedence chain. Returns undefined to pass the candidate
 * on to the next strategy.
 */
interface OrderStrategy {
  readonly source: Exclude<OrderSource, 'default'>;
  resolve(candidate: object): Priority | undefined;
}

const isThenable = (value: unknown): value is PromiseLike<unknown> =>
  typeof value === 'object' &&
  value !== null &&
  'then' in value &&
  typeof value.then === 'function';

const typeName = (candidate: object): string => runtimeTypeOf(candidate)?.name || 'Object';

/**
 * `@Order()` on the producer method or the class.
 */
function annotationStrategy(
  registry: RegistrationRegistry,
  reader: AnnotationReader
): OrderStrategy {
  return {
    source: 'annotation',
    resolve(candidate) {
      const attributes = resolveAttributes(registry, ORDER_ANNOTATION, candidate, reader);
      if (!attributes.has(ORDER_VALUE_ATTRIBUTE)) return undefined;
      const value = attributes.get(ORDER_VALUE_ATTRIBUTE);
      if (!isPriority(value)) {
        throw new InvalidOrderValueError(value, `@Order() on ${typeName(candidate)}`);
      }
      return value;
    },
  };
}

/**
 * A declared `[ORDER]()` method. Whatever it throws propagates as is.
 */
const capabilityStrategy: OrderStrategy = {
  source: 'capability',
  resolve(candidate) {
    const capability = probeCapability(candidate);
    if (capability.kind !== 'declared') return undefined;
    const value: unknown = Reflect.apply(capability.method, candidate, []);
    if (!isPriority(value)) {
      throw new InvalidOrderValueError(value, `${typeName(candidate)}[ORDER]()`);
    }
    return value;
  },
};

/**
 * A public `getOrder()` on a type that does not declare the capability.
 *
 * A non-integer result means the method is not an order accessor after all.
 * A throwing accessor, or one returning a promise, means the candidate is
 * broken and is reported as an {@link OrderInvocationError}. A rejection of
 * that promise is logged.
 */
const accessorStrategy: OrderStrategy = {
  source: 'accessor',
  resolve(candidate) {
    const capability = probeCapability(candidate);
    if (capability.kind !== 'accessor') return undefined;
    const name = typeName(candidate);
    let value: unknown;
    try {
      value = Reflect.apply(capability.method, candidate, []);
    } catch (err) {
      throw new OrderInvocationError(name, err);
    }
    if (isThenable(value)) {
      void Promise.resolve(value).catch((reason: unknown) => {
        console.warn(`[precedence] ${name}.getOrder() returned a promise that rejected.`, reason);
      });
      throw new OrderInvocationError(name, new TypeError('getOrder() returned a promise.'));
    }
    return isPriority(value) ? value : undefined;
  },
};

/**
 * Comparator ordering candidates by priority, lowest value first.
 *
 * Each candidate's priority comes from the first strategy that yields one:
 *
 * 1. the `@Order()` annotation, where an annotation on the producer method
 *    that registered the candidate takes precedence over one on its class
 * 2. the {@link Ordered} capability (`[ORDER]()` method)
 * 3. a public zero-parameter `getOrder()` method returning an integer
 * 4. {@link LOWEST_PRECEDENCE}
 *
 * Nothing is cached between calls apart from the per-type capability probe,
 * so the registry must not change while a sort is running.
 *
 * @example
 * ```typescript
 * const comparator = new OrderComparator(catalog);
 * listeners.sort(comparator.compare);
 * ```
 */
export class OrderComparator {
  private readonly strategies: readonly OrderStrategy[];
  private readonly onResolve?: (event: OrderResolution) => void;

  constructor(registry: RegistrationRegistry, options: OrderComparatorOptions = {}) {
    this.strategies = [
      annotationStrategy(registry, options.reader ?? staticAnnotations),
      capabilityStrategy,
      accessorStrategy,
    ];
    this.onResolve = options.onResolve;
  }

  /**
   * Resolve the priority of a single candidate.
   *
   * `null`, `undefined` and primitives resolve to {@link LOWEST_PRECEDENCE}.
   */
  resolveOrder(candidate: unknown): Priority {
    let priority: Priority = LOWEST_PRECEDENCE;
    let source: OrderSource = 'default';

    if ((typeof candidate === 'object' && candidate !== null) || typeof candidate === 'function') {
      for (const strategy of this.strategies) {
        const resolved = strategy.resolve(candidate);
        if (resolved !== undefined) {
          priority = resolved;
          source = strategy.source;
          break;
        }
      }
    }

    this.onResolve?.({ candidate, priority, source });
    return priority;
  }

  /**
   * Compare two candidates by priority. Bound, so it can be handed to
   * `Array.prototype.sort` directly.
   *
   * @returns -1, 0 or 1
   */
  readonly compare = (a: unknown, b: unknown): number => {
    const left = this.resolveOrder(a);
    const right = this.resolveOrder(b);
    return left < right ? -1 : left > right ? 1 : 0;
  };

  /**
   * Sort candidates into a new array. Equal priorities keep their input
   * order, and the input is left untouched.
   */
  sort<T>(candidates: Iterable<T>): T[] {
    return Array.from(candidates).sort(this.compare);
  }
}

/**
 * Resolve the priority of a single candidate against a registry.
 */
export function resolveOrder(
  registry: RegistrationRegistry,
  candidate: unknown,
  options?: OrderComparatorOptions
): Priority {
  return new OrderComparator(registry, options).resolveOrder(candidate);
}

/**
 * Compare two candidates by priority.
 *
 * @returns -1, 0 or 1
 */
export function comparePriority(
  registry: RegistrationRegistry,
  a: unknown,
  b: unknown,
  options?: OrderComparatorOptions
): number {
  return new OrderComparator(registry, options).compare(a, b);
}

/**
 * Return a new array with the candidates sorted by priority, lowest first.
 */
export function sortedByPriority<T>(
  registry: RegistrationRegistry,
  candidates: Iterable<T>,
  options?: OrderComparatorOptions
): T[] {
  return new OrderComparator(registry, options).sort(candidates);
}
