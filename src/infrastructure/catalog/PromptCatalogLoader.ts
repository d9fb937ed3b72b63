import fs from 'fs';
import { z } from 'zod';
import { PromptCatalog } from '../../core/catalog/PromptCatalog.js';
import { PromptDefinition } from '../../core/entities/Transformation.js';
import { errorMessage } from '../../core/errors/TransformerError.js';

const PromptFileSchema = z.record(
  z.object({
    name: z.string().min(1),
    description: z.string().default(''),
    prompt: z.string().min(1),
    requires_json: z.boolean().default(false),
  })
);

/**
 * Parse the prompts file contents (a map of id to prompt entry)
 */
export function parsePromptFile(json: string): PromptDefinition[] {
  const entries = PromptFileSchema.parse(JSON.parse(json));
  return Object.entries(entries).map(([id, entry]) => ({
    id,
    name: entry.name,
    description: entry.description,
    prompt: entry.prompt,
    requiresJson: entry.requires_json,
  }));
}

/**
 * Load the catalog from disk. A missing or invalid file is logged and the
 * catalog falls back to the built-in cleanup prompt.
 */
export function loadPromptCatalog(filePath: string): PromptCatalog {
  try {
    const definitions = parsePromptFile(fs.readFileSync(filePath, 'utf-8'));
    if (definitions.length === 0) {
      console.error(`[PromptCatalog] ${filePath} contains no prompts, using the built-in default`);
      return PromptCatalog.withDefaults();
    }
    return new PromptCatalog(definitions);
  } catch (error) {
    console.error(`[PromptCatalog] Error loading prompts from ${filePath}: ${errorMessage(error)}`);
    return PromptCatalog.withDefaults();
  }
}
