import { readFileSync } from 'fs';
import { join, resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import Ajv, { type SchemaObject, type ValidateFunction } from 'ajv';
import type { StoryPack } from '@stranded/engine';

// packages/tools/src -> workspace root
export const workspaceRoot = resolve(dirname(fileURLToPath(import.meta.url)), '../../..');

export const storyPackSchemaPath = join(workspaceRoot, 'schemas/storypack.schema.json');

export type SchemaResult =
  | { valid: true; storyPack: StoryPack }
  | { valid: false; errors: string[] };

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function loadSchema(path: string): SchemaObject {
  const schema: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (!isSchemaObject(schema)) {
    throw new Error(`Schema at ${path} is not a JSON object`);
  }
  return schema;
}

let compiled: ValidateFunction<StoryPack> | undefined;

/**
 * Validates parsed JSON against the story pack schema.
 * A valid document comes back typed as a StoryPack.
 */
export function validateStoryPackSchema(data: unknown): SchemaResult {
  if (!compiled) {
    const ajv = new Ajv({ allErrors: true, strict: false });
    compiled = ajv.compile<StoryPack>(loadSchema(storyPackSchemaPath));
  }
  const validate = compiled;

  if (validate(data)) {
    return { valid: true, storyPack: data };
  }

  const errors: string[] = [];
  for (const error of validate.errors ?? []) {
    const path = error.instancePath || error.schemaPath;
    errors.push(`${path}: ${error.message ?? 'is invalid'}`);
  }
  return { valid: false, errors };
}
