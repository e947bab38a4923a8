/**
 * Transform registry lookup
 *
 * Names are resolved once, when a migration is planned.
 */

import { ConfigError, type TransformFunction, type TransformRegistry } from '@rowshift/core';

export function resolveTransform(
  registry: TransformRegistry,
  name: string,
  migration?: string
): TransformFunction {
  const fn = Object.prototype.hasOwnProperty.call(registry, name) ? registry[name] : undefined;

  if (typeof fn !== 'function') {
    const available = Object.keys(registry).filter((key) => typeof registry[key] === 'function');
    throw new ConfigError({
      code: 'UNKNOWN_TRANSFORM',
      message: `Transform function "${name}" is not registered.`,
      migration,
      suggestion:
        available.length > 0
          ? `Registered transforms: ${available.sort().join(', ')}.`
          : 'No transforms are registered; pass a registry or remove transformFunction.',
      context: { transform: name },
    });
  }

  return fn;
}

/**
 * Freeze a plain object of functions into a registry
 */
export function createRegistry(functions: { [name: string]: TransformFunction }): TransformRegistry {
  return Object.freeze({ ...functions });
}
