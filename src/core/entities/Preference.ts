/**
 * User preferences persisted between runs
 */
export interface Preference {
  selectedModel: string;
  downloadPath: string;
  lastUsedTransformations: string[];
}
