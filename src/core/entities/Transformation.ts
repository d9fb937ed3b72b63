import { ErrorInfo } from '../errors/TransformerError.js';

/**
 * Transformation domain entities
 */
export interface PromptDefinition {
  id: string;
  name: string;
  description: string;
  prompt: string;
  requiresJson: boolean;
}

export interface PromptSummary {
  id: string;
  name: string;
  description: string;
}

export interface PromptCategory {
  name: string;
  prompts: PromptSummary[];
}

export interface TransformationRequest {
  readonly sourceText: string;
  readonly promptIds: readonly string[];
  readonly modelName: string;
}

export type TransformationResult =
  | { kind: 'output'; outputText: string }
  | { kind: 'error'; error: ErrorInfo };
