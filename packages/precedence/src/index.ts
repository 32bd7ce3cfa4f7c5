export { Catalog } from './core/catalog.js';
export {
  comparePriority,
  OrderComparator,
  resolveOrder,
  sortedByPriority,
} from './core/order-comparator.js';
export {
  annotatedProducers,
  resolveAttributes,
  runtimeTypeOf,
} from './core/metadata-resolver.js';
export { classHierarchy, staticAnnotations } from './core/annotations.js';
export { attributesToRecord, EMPTY_ATTRIBUTES, mergeAttributes } from './core/attributes.js';
export {
  isOrdered,
  ORDER,
  ORDER_ACCESSOR,
  probeCapability,
  type OrderCapability,
  type Ordered,
} from './core/capability.js';
export {
  HIGHEST_PRECEDENCE,
  isPriority,
  LOWEST_PRECEDENCE,
  ORDER_ANNOTATION,
  ORDER_VALUE_ATTRIBUTE,
} from './core/precedence.js';

export {
  defineAnnotation,
  isConstructor,
  Order,
  Produces,
  type AnnotationDecorator,
  type ProducesOptions,
} from './decorators/index.js';
export { AnnotationRegistry, type ProducerDefinition } from './registry/index.js';

export type {
  AnnotationKind,
  AnnotationReader,
  AttributeMap,
  CatalogConfig,
  ClassRegistration,
  Constructor,
  DuplicatePolicy,
  OrderComparatorOptions,
  OrderResolution,
  OrderSource,
  Priority,
  ProducerMethodMetadata,
  ProducerRegistration,
  RegistrationDescriptor,
  RegistrationId,
  RegistrationMetadata,
  RegistrationRegistry,
  ValueRegistration,
} from './types/index.js';

// Errors
export {
  DuplicateRegistrationError,
  InvalidAnnotationTargetError,
  InvalidOrderValueError,
  InvalidRegistrationError,
  OrderInvocationError,
  ProducerExecutionError,
  RegistrationNotFoundError,
} from './errors/index.js';
