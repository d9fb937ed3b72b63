import { PromptCategory, PromptDefinition, PromptSummary } from '../entities/Transformation.js';
import { TransformerError } from '../errors/TransformerError.js';
import { CATEGORY_ORDER, CategoryName, categoryFor } from './categories.js';

export const DEFAULT_PROMPT_ID = 'basic_cleanup';

export const DEFAULT_PROMPT: PromptDefinition = {
  id: DEFAULT_PROMPT_ID,
  name: 'Basic Cleanup',
  description: 'Transforms text using basic cleanup style or format',
  prompt:
    'Take the following text and refine it to add missing punctuation, resolve typos, add paragraph spacing, and generally enhance the presentation of the text while preserving the original meaning.',
  requiresJson: false,
};

export const COMPOSE_INSTRUCTION = "\nApply ALL of the above transformations to the user's input text.";

/**
 * Read-only mapping from transformation ids to system prompts.
 * Lookups also accept the display name, case-insensitively.
 */
export class PromptCatalog {
  private readonly prompts: ReadonlyMap<string, PromptDefinition>;

  constructor(definitions: Iterable<PromptDefinition>) {
    this.prompts = new Map(Array.from(definitions, (def) => [def.id, def] as const));
  }

  /**
   * Catalog holding only the built-in cleanup prompt
   */
  static withDefaults(): PromptCatalog {
    return new PromptCatalog([DEFAULT_PROMPT]);
  }

  get size(): number {
    return this.prompts.size;
  }

  has(id: string): boolean {
    return this.prompts.has(id);
  }

  list(): PromptDefinition[] {
    return Array.from(this.prompts.values());
  }

  lookup(key: string): PromptDefinition {
    const byId = this.prompts.get(key);
    if (byId) {
      return byId;
    }

    const wanted = key.trim().toLowerCase();
    for (const def of this.prompts.values()) {
      if (def.name.toLowerCase() === wanted) {
        return def;
      }
    }

    throw new TransformerError('UnknownTransformation', `Unknown transformation: ${key}`);
  }

  /**
   * Prompts whose name, description or id contains the search term
   */
  filter(searchTerm: string): PromptSummary[] {
    const term = searchTerm.trim().toLowerCase();
    return this.list()
      .filter(
        (def) =>
          !term ||
          def.name.toLowerCase().includes(term) ||
          def.description.toLowerCase().includes(term) ||
          def.id.toLowerCase().includes(term)
      )
      .map(toSummary);
  }

  categorize(): PromptCategory[] {
    const buckets = new Map<CategoryName, PromptSummary[]>(
      CATEGORY_ORDER.map((name) => [name, []])
    );

    for (const def of this.prompts.values()) {
      buckets.get(categoryFor(def.name, def.description))?.push(toSummary(def));
    }

    return CATEGORY_ORDER.map((name) => ({
      name,
      prompts: (buckets.get(name) ?? []).sort((a, b) => a.name.localeCompare(b.name)),
    }));
  }

  /**
   * Build the single system prompt for a selection of transformations.
   * An empty selection falls back to the cleanup prompt.
   */
  compose(ids: readonly string[]): string {
    const texts = ids.map((id) => this.lookup(id).prompt).filter((text) => text.length > 0);

    if (texts.length === 0) {
      texts.push((this.prompts.get(DEFAULT_PROMPT_ID) ?? DEFAULT_PROMPT).prompt);
    }

    return texts.join('\n\n') + COMPOSE_INSTRUCTION;
  }
}

function toSummary(def: PromptDefinition): PromptSummary {
  return { id: def.id, name: def.name, description: def.description };
}
