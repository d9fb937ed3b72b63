import { Preference } from '../entities/Preference.js';

/**
 * Interface for preference persistence
 */
export interface IPreferenceStore {
  /** Stored preferences, or defaults when the file is missing or unreadable */
  load(): Preference;

  /** Throws a TransformerError of kind PreferenceSaveFailed */
  save(preference: Preference): void;

  update(changes: Partial<Preference>): Preference;
}
