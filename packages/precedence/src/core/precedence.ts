/*
 * Precedence Constants
 * --------------------
 * Priorities are signed 32-bit integers compared in ascending order, so the
 * smallest value sorts first.
 *
 *   HIGHEST_PRECEDENCE  -2147483648   sorts first
 *   LOWEST_PRECEDENCE    2147483647   sorts last, and the fallback when
 *                                     nothing declares an order
 */
import type { AnnotationKind, Priority } from '../types/index.js';

/**
 * Useful constant for the highest precedence value.
 */
export const HIGHEST_PRECEDENCE: Priority = -2147483648;

/**
 * Useful constant for the lowest precedence value. Also the order of any
 * candidate whose order cannot be resolved.
 */
export const LOWEST_PRECEDENCE: Priority = 2147483647;

/**
 * Annotation kind recorded by `@Order()`.
 */
export const ORDER_ANNOTATION: AnnotationKind = 'order';

/**
 * Attribute of the order annotation that carries the priority.
 */
export const ORDER_VALUE_ATTRIBUTE = 'value';

/**
 * Runtime check that a value is a usable priority.
 */
export function isPriority(value: unknown): value is Priority {
  return (
    typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= HIGHEST_PRECEDENCE &&
    value <= LOWEST_PRECEDENCE
  );
}
