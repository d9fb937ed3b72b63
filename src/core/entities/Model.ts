/**
 * Model-related domain entities
 */
export interface OllamaGenerateResponse {
  model: string;
  created_at: string;
  response: string;
  done: boolean;
}

export interface OllamaModelTag {
  name: string;
  modified_at?: string;
  size?: number;
}

export interface ModelCatalog {
  reachable: boolean;
  models: string[];
}
