import { IModelClient } from '../../core/interfaces/IModelClient.js';
import { PromptCatalog } from '../../core/catalog/PromptCatalog.js';
import { TransformationRequest, TransformationResult } from '../../core/entities/Transformation.js';
import { isTransformerError } from '../../core/errors/TransformerError.js';

/**
 * Service that turns a transformation request into one model call
 */
export class TransformService {
  constructor(
    private modelClient: IModelClient,
    private catalog: PromptCatalog
  ) {}

  /**
   * Resolve the selected prompts into a single system prompt and run it over
   * the source text. Known failures come back as an error result; anything
   * else is a bug and propagates.
   */
  async transform(request: TransformationRequest): Promise<TransformationResult> {
    try {
      const systemPrompt = this.catalog.compose(request.promptIds);
      const outputText = await this.modelClient.transform(
        systemPrompt,
        request.sourceText,
        request.modelName
      );
      return { kind: 'output', outputText };
    } catch (error) {
      if (!isTransformerError(error)) {
        throw error;
      }

      console.error(
        JSON.stringify({
          timestamp: new Date().toISOString(),
          model: request.modelName,
          prompts: request.promptIds,
          kind: error.kind,
          error: error.message,
        })
      );

      return { kind: 'error', error: error.toInfo() };
    }
  }
}
