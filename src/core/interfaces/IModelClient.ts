/**
 * Interface for the local model-serving API client
 */
export interface IModelClient {
  /**
   * Run one system prompt over the user text and return the generated text.
   * Rejects with a TransformerError of kind ServiceUnreachable, ModelNotFound
   * or GenerationFailed.
   */
  transform(systemPrompt: string, userText: string, modelName: string): Promise<string>;

  /**
   * Names of the models installed on the server
   */
  listModels(): Promise<string[]>;

  /**
   * Whether the server answers at all
   */
  healthCheck(): Promise<boolean>;
}
