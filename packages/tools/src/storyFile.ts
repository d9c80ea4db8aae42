import { readFileSync } from 'fs';
import { join, resolve } from 'path';
import { loadStoryPack, validateStoryPack, type StoryPack, type ValidationIssue } from '@stranded/engine';
import { validateStoryPackSchema, workspaceRoot } from './validateSchema.js';

export const defaultStoryPath = join(workspaceRoot, 'stories/stranded.story.json');

/**
 * Result of checking one story file: schema errors stop before the semantic pass
 */
export type StoryReport = {
  storyPack?: StoryPack;
  schemaErrors: string[];
  issues: ValidationIssue[];
};

/**
 * Resolves a CLI path argument against the caller's working directory
 */
export function resolveStoryPath(arg: string | undefined): string {
  return arg ? resolve(process.cwd(), arg) : defaultStoryPath;
}

export function readStoryFile(path: string): unknown {
  return JSON.parse(readFileSync(path, 'utf-8'));
}

export function checkStory(data: unknown): StoryReport {
  const schema = validateStoryPackSchema(data);
  if (!schema.valid) {
    return { schemaErrors: schema.errors, issues: [] };
  }
  return {
    storyPack: schema.storyPack,
    schemaErrors: [],
    issues: validateStoryPack(schema.storyPack),
  };
}

/**
 * Reads, schema-checks and loads a story pack.
 * Throws on schema errors, and ContentError on semantic errors.
 */
export function loadStoryFile(path: string): StoryPack {
  const schema = validateStoryPackSchema(readStoryFile(path));
  if (!schema.valid) {
    throw new Error(`Story file ${path} does not match the schema:\n  ${schema.errors.join('\n  ')}`);
  }
  return loadStoryPack(schema.storyPack);
}
