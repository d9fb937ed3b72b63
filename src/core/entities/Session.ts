import { TransformationResult } from './Transformation.js';

/**
 * Session domain entities
 */
export type SessionStatus = 'idle' | 'awaiting_model';

export type ClearTarget = 'input' | 'output' | 'all';

export interface SessionState {
  id: string;
  status: SessionStatus;
  inputText: string;
  outputText: string;
  selectedTransformations: string[];
  selectedModel: string;
  downloadPath: string;
  suggestedFilename: string;
  result: TransformationResult | null;
  warnings: string[];
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Serializable view of a session sent to the page
 */
export interface SessionSnapshot {
  id: string;
  status: SessionStatus;
  inputText: string;
  outputText: string;
  selectedTransformations: string[];
  selectedModel: string;
  downloadPath: string;
  suggestedFilename: string;
  result: TransformationResult | null;
  warnings: string[];
  createdAt: string;
  updatedAt: string;
}
