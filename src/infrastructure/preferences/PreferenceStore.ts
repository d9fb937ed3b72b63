import fs from 'fs';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { IPreferenceStore } from '../../core/interfaces/IPreferenceStore.js';
import { Preference } from '../../core/entities/Preference.js';
import { TransformerError, errorMessage } from '../../core/errors/TransformerError.js';
import { DEFAULT_PROMPT_ID } from '../../core/catalog/PromptCatalog.js';

export const PREFERENCES_FILENAME = 'preferences.json';

const PreferenceFileSchema = z.object({
  selectedModel: z.string().min(1).optional(),
  downloadPath: z.string().min(1).optional(),
  lastUsedTransformations: z.array(z.string()).optional(),
});

export function defaultPreference(selectedModel: string = 'llama3'): Preference {
  return {
    selectedModel,
    downloadPath: path.join(os.homedir(), 'Desktop'),
    lastUsedTransformations: [DEFAULT_PROMPT_ID],
  };
}

/**
 * JSON file backed preference store
 */
export class PreferenceStore implements IPreferenceStore {
  private filePath: string;

  constructor(
    directory: string,
    private defaults: Preference = defaultPreference(),
    private debugLog: (message: string) => void = () => {}
  ) {
    this.filePath = path.join(directory, PREFERENCES_FILENAME);
  }

  getFilePath(): string {
    return this.filePath;
  }

  load(): Preference {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      this.debugLog(`[PreferenceStore] No preferences at ${this.filePath}, using defaults`);
      return this.cloneDefaults();
    }

    try {
      const stored = PreferenceFileSchema.parse(JSON.parse(raw));
      return {
        selectedModel: stored.selectedModel ?? this.defaults.selectedModel,
        downloadPath: stored.downloadPath ?? this.defaults.downloadPath,
        lastUsedTransformations: stored.lastUsedTransformations ?? [...this.defaults.lastUsedTransformations],
      };
    } catch (error) {
      this.debugLog(`[PreferenceStore] Ignoring unreadable ${this.filePath}: ${errorMessage(error)}`);
      return this.cloneDefaults();
    }
  }

  save(preference: Preference): void {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, JSON.stringify(preference, null, 2), 'utf-8');
    } catch (error) {
      throw new TransformerError(
        'PreferenceSaveFailed',
        `Could not save preferences to ${this.filePath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  update(changes: Partial<Preference>): Preference {
    const merged = { ...this.load(), ...changes };
    this.save(merged);
    return merged;
  }

  private cloneDefaults(): Preference {
    return { ...this.defaults, lastUsedTransformations: [...this.defaults.lastUsedTransformations] };
  }
}
