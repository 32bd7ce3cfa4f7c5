/**
 * Well-known key of the ordering capability method.
 *
 * A class declares the {@link Ordered} capability by defining a method under
 * this key. It is registered with `Symbol.for()` so separately bundled copies
 * of this package agree on it.
 */
export const ORDER: unique symbol = Symbol.for('precedence.order');

/**
 * Structural ordering capability.
 *
 * @example
 * ```typescript
 * class RetryPolicy implements Ordered {
 *   [ORDER]() {
 *     return 3;
 *   }
 * }
 * ```
 */
export interface Ordered {
  [ORDER](): number;
}

/**
 * Name of the accessor recognised on classes that do not declare
 * {@link Ordered}.
 */
export const ORDER_ACCESSOR = 'getOrder';

/**
 * How a candidate type exposes its order, if at all.
 *
 * - declared: defines an `[ORDER]` method
 * - accessor: defines no `[ORDER]` method, but a synchronous zero-parameter
 *   `getOrder` method
 * - none: neither
 */
export type OrderCapability =
  | { readonly kind: 'declared'; readonly method: Function }
  | { readonly kind: 'accessor'; readonly method: Function }
  | { readonly kind: 'none' };

const NONE: OrderCapability = Object.freeze({ kind: 'none' });

/** Probe results keyed by prototype. */
const probes = new WeakMap<object, OrderCapability>();

/**
 * Find a data-property method along a prototype chain, nearest first.
 *
 * Accessor properties (getters) are never invoked and never match.
 */
function findMethod(start: object, key: string | symbol): Function | undefined {
  let current: object | null = start;
  while (current !== null && current !== Object.prototype) {
    const descriptor = Object.getOwnPropertyDescriptor(current, key);
    if (descriptor) {
      const value: unknown = descriptor.value;
      return typeof value === 'function' ? value : undefined;
    }
    current = Object.getPrototypeOf(current);
  }
  return undefined;
}

/**
 * Async and generator methods never return a priority, so they are not
 * accessors and are never invoked.
 */
const NON_SYNC_TAGS: ReadonlySet<string> = new Set([
  '[object AsyncFunction]',
  '[object GeneratorFunction]',
  '[object AsyncGeneratorFunction]',
]);

const toStringTag = (fn: Function): string => Object.prototype.toString.call(fn);

function probe(start: object): OrderCapability {
  const declared = findMethod(start, ORDER);
  if (declared) return { kind: 'declared', method: declared };

  const accessor = findMethod(start, ORDER_ACCESSOR);
  if (accessor && accessor.length === 0 && !NON_SYNC_TAGS.has(toStringTag(accessor))) {
    return { kind: 'accessor', method: accessor };
  }

  return NONE;
}

/**
 * Classify how a candidate exposes its order.
 *
 * Class instances are probed on their prototype chain once per type.
 * Plain objects (prototype `Object.prototype` or null) are probed on the
 * object itself, uncached.
 */
export function probeCapability(candidate: object): OrderCapability {
  const proto: unknown = Object.getPrototypeOf(candidate);
  if (typeof proto !== 'object' || proto === null || proto === Object.prototype) {
    return probe(candidate);
  }

  let cached = probes.get(proto);
  if (!cached) {
    cached = probe(proto);
    probes.set(proto, cached);
  }
  return cached;
}

/**
 * Runtime check for the {@link Ordered} capability.
 */
export function isOrdered(candidate: unknown): candidate is Ordered {
  return (
    ((typeof candidate === 'object' && candidate !== null) || typeof candidate === 'function') &&
    probeCapability(candidate).kind === 'declared'
  );
}
