export { AnnotationRegistry, type ProducerDefinition } from './annotation-registry.js';
