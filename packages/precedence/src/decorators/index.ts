export {
  defineAnnotation,
  isConstructor,
  type AnnotationDecorator,
} from './annotation.js';
export { Order } from './order.js';
export { Produces, type ProducesOptions } from './produces.js';
