/**
 * Transform module loading
 *
 * The module's `registry` export, or else its default export, must be an
 * object whose values are functions.
 */

import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { RowFragment, TransformFunction, TransformInput, TransformRegistry } from '@rowshift/core';
import { createRegistry } from '@rowshift/engine';
import { ConfigFileError } from './config.js';

function isFragmentOrNull(value: unknown): value is RowFragment | null {
  return value === null || value instanceof Map || (typeof value === 'object' && !Array.isArray(value));
}

/** Typed view of an untyped module export */
function asTransform(name: string, fn: (input: TransformInput) => unknown): TransformFunction {
  return (input) => {
    const output = fn(input);
    if (!isFragmentOrNull(output)) {
      throw new TypeError(`transform "${name}" returned ${Array.isArray(output) ? 'an array' : typeof output}`);
    }
    return output;
  };
}

/**
 * Build a registry from a module namespace
 */
export function registryFromModule(mod: unknown, label = 'transform module'): TransformRegistry {
  let candidate: unknown;
  if (typeof mod === 'object' && mod !== null) {
    candidate = 'registry' in mod ? mod.registry : 'default' in mod ? mod.default : undefined;
  }

  if (typeof candidate !== 'object' || candidate === null || Array.isArray(candidate)) {
    throw new ConfigFileError(`${label} must export an object of transform functions as "registry" or default.`);
  }

  const functions: { [name: string]: TransformFunction } = {};
  for (const [name, value] of Object.entries(candidate)) {
    if (typeof value !== 'function') {
      throw new ConfigFileError(`${label}: "${name}" is not a function.`);
    }
    functions[name] = asTransform(name, (input) => value(input));
  }

  return createRegistry(functions);
}

/**
 * Import a transform module from disk
 */
export async function loadTransforms(modulePath: string): Promise<TransformRegistry> {
  const url = pathToFileURL(resolve(process.cwd(), modulePath)).href;

  let mod: unknown;
  try {
    mod = await import(url);
  } catch (error) {
    throw new ConfigFileError(
      `Cannot load transforms from ${modulePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return registryFromModule(mod, modulePath);
}
