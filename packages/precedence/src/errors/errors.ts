const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

const show = (value: unknown): string => {
  if (typeof value === 'string') return `'${value}'`;
  if (typeof value === 'bigint') return `${value}n`;
  if (typeof value === 'function') return `[function ${value.name || 'anonymous'}]`;
  if (typeof value === 'object' && value !== null) {
    return `[object ${value.constructor?.name ?? 'Object'}]`;
  }
  return String(value);
};

/**
 * Registration id not present in the catalog
 */
export class RegistrationNotFoundError extends Error {
  constructor(
    public id: string,
    public catalogName: string,
    public availableIds: string[]
  ) {
    const parts: string[] = [`No registration '${id}' in catalog '${catalogName}'.`, ''];

    if (availableIds.length > 0 && availableIds.length <= 10) {
      parts.push('Registered ids:');
      availableIds.forEach((r) => parts.push(`  - ${r}`));
      parts.push('');
    } else if (availableIds.length > 10) {
      parts.push(`${availableIds.length} ids are registered.`, '');
    }

    parts.push('To fix this:');
    parts.push(`  1. Register '${id}' with registerClass(), registerValue() or registerProducer()`);
    parts.push(`  2. Check for typos in the id passed to get() or metadataFor()`);

    super(format(`No registration '${id}' in catalog '${catalogName}'.`, parts));
    this.name = 'RegistrationNotFoundError';
  }
}

export class DuplicateRegistrationError extends Error {
  constructor(
    public id: string,
    public catalogName: string
  ) {
    const dev = [
      'Duplicate registration',
      '',
      `Id '${id}' is already registered in catalog '${catalogName}'.`,
      '',
      'To fix this:',
      `  1. Register the component under a different id`,
      `  2. Or set duplicatePolicy: 'allow' (or 'warn') to let the latest registration win`,
    ];
    super(format(`Id '${id}' is already registered in catalog '${catalogName}'.`, dev));
    this.name = 'DuplicateRegistrationError';
  }
}

export class InvalidRegistrationError extends Error {
  constructor(
    public registration: unknown,
    public reason: string
  ) {
    const dev = [
      'Invalid registration',
      '',
      `${show(registration)}: ${reason}`,
      '',
      'Expected one of:',
      `  - A class constructor`,
      `  - { id, useClass }`,
      `  - { id, useValue }`,
      `  - { id, useProducer: { declaringClass, methodName }, type }`,
    ];
    super(format(`Invalid registration: ${reason}`, dev));
    this.name = 'InvalidRegistrationError';
  }
}

/**
 * Ordering value that is not a signed 32-bit integer
 */
export class InvalidOrderValueError extends Error {
  constructor(
    public value: unknown,
    public origin: string
  ) {
    const dev = [
      'Invalid order value',
      '',
      `${origin} yielded ${show(value)}, which is not a 32-bit integer.`,
      '',
      'Order values must be integers between -2147483648 and 2147483647.',
    ];
    super(format(`Invalid order value ${show(value)} from ${origin}.`, dev));
    this.name = 'InvalidOrderValueError';
  }
}

/**
 * A duck-typed `getOrder()` accessor threw while being invoked.
 *
 * This indicates a broken candidate rather than an unordered one, so it is
 * never defaulted to the lowest precedence.
 */
export class OrderInvocationError extends Error {
  constructor(
    public typeName: string,
    cause: unknown
  ) {
    const dev = [
      'Order accessor failed',
      '',
      `${typeName}.getOrder() threw while resolving its order. See 'cause' for details.`,
    ];
    super(format(`${typeName}.getOrder() failed.`, dev), { cause });
    this.name = 'OrderInvocationError';
  }
}

export class ProducerExecutionError extends Error {
  constructor(
    public id: string,
    public producer: string,
    cause: unknown
  ) {
    const dev = [
      'Producer execution failed',
      '',
      `Producer ${producer} for '${id}' threw during creation. See 'cause' for details.`,
    ];
    super(format(`Producer for '${id}' failed during creation.`, dev), { cause });
    this.name = 'ProducerExecutionError';
  }
}

export class InvalidAnnotationTargetError extends Error {
  constructor(
    public kind: string,
    public target: string
  ) {
    const dev = [
      'Invalid annotation target',
      '',
      `@${kind} was applied to ${target}.`,
      '',
      'Annotations may decorate classes and methods only.',
    ];
    super(format(`@${kind} cannot decorate ${target}.`, dev));
    this.name = 'InvalidAnnotationTargetError';
  }
}
