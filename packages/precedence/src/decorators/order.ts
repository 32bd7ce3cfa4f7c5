import { isPriority, LOWEST_PRECEDENCE, ORDER_ANNOTATION } from '../core/precedence.js';
import { InvalidOrderValueError } from '../errors/index.js';
import { defineAnnotation, type AnnotationDecorator } from './annotation.js';

const order = defineAnnotation<{ value: number }>(ORDER_ANNOTATION, (attributes) => {
  if (!isPriority(attributes.value)) {
    throw new InvalidOrderValueError(attributes.value, '@Order()');
  }
  return attributes;
});

/**
 * Declares the sort order of a component.
 *
 * May decorate the component's class, or the producer method that creates
 * it. When both are present the producer method wins. Lower values sort
 * first.
 *
 * @param value - Priority (defaults to {@link LOWEST_PRECEDENCE})
 *
 * @example
 * ```typescript
 * @Order(10)
 * class AuditListener {}
 *
 * class ListenerModule {
 *   @Produces({ type: AuditListener })
 *   @Order(5)
 *   audit() {
 *     return new AuditListener();
 *   }
 * }
 * ```
 */
export function Order(value: number = LOWEST_PRECEDENCE): AnnotationDecorator {
  return order({ value });
}
