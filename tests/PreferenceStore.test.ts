import fs from 'fs';
import os from 'os';
import path from 'path';
import { PREFERENCES_FILENAME, PreferenceStore, defaultPreference } from '../src/infrastructure/preferences/PreferenceStore.js';
import { Preference } from '../src/core/entities/Preference.js';

describe('PreferenceStore', () => {
  const defaults: Preference = {
    selectedModel: 'llama3',
    downloadPath: '/tmp/out',
    lastUsedTransformations: ['basic_cleanup'],
  };
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'prefs-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  test('should default to the Desktop folder and the cleanup prompt', () => {
    expect(defaultPreference('mistral')).toEqual({
      selectedModel: 'mistral',
      downloadPath: path.join(os.homedir(), 'Desktop'),
      lastUsedTransformations: ['basic_cleanup'],
    });
  });

  test('should return defaults when no file exists', () => {
    const store = new PreferenceStore(path.join(tempDir, 'none'), defaults);
    expect(store.load()).toEqual(defaults);
  });

  test('should hand out independent copies of the defaults', () => {
    const store = new PreferenceStore(tempDir, defaults);
    store.load().lastUsedTransformations.push('summarize');
    expect(store.load().lastUsedTransformations).toEqual(['basic_cleanup']);
  });

  test('should save pretty-printed JSON and load it back', () => {
    const store = new PreferenceStore(path.join(tempDir, 'nested', 'dir'), defaults);
    const stored: Preference = { selectedModel: 'mistral', downloadPath: '/data', lastUsedTransformations: ['summarize'] };

    store.save(stored);

    expect(store.getFilePath()).toBe(path.join(tempDir, 'nested', 'dir', PREFERENCES_FILENAME));
    expect(fs.readFileSync(store.getFilePath(), 'utf-8')).toBe(JSON.stringify(stored, null, 2));
    expect(store.load()).toEqual(stored);
  });

  test('should fill missing fields from the defaults', () => {
    fs.writeFileSync(path.join(tempDir, PREFERENCES_FILENAME), JSON.stringify({ selectedModel: 'mistral' }));
    const store = new PreferenceStore(tempDir, defaults);

    expect(store.load()).toEqual({ ...defaults, selectedModel: 'mistral' });
  });

  test('should ignore a corrupt file', () => {
    fs.writeFileSync(path.join(tempDir, PREFERENCES_FILENAME), '{not json');
    const debugLog = jest.fn();
    const store = new PreferenceStore(tempDir, defaults, debugLog);

    expect(store.load()).toEqual(defaults);
    expect(debugLog).toHaveBeenCalledTimes(1);
  });

  test('should ignore a file with the wrong shape', () => {
    fs.writeFileSync(path.join(tempDir, PREFERENCES_FILENAME), JSON.stringify({ lastUsedTransformations: 'summarize' }));
    const store = new PreferenceStore(tempDir, defaults);

    expect(store.load()).toEqual(defaults);
  });

  test('should merge updates into the stored preferences', () => {
    const store = new PreferenceStore(tempDir, defaults);
    store.update({ selectedModel: 'mistral' });
    const updated = store.update({ lastUsedTransformations: ['summarize', 'fix_grammar'] });

    expect(updated).toEqual({
      selectedModel: 'mistral',
      downloadPath: '/tmp/out',
      lastUsedTransformations: ['summarize', 'fix_grammar'],
    });
    expect(new PreferenceStore(tempDir, defaults).load()).toEqual(updated);
  });

  test('should raise PreferenceSaveFailed when the file cannot be written', () => {
    const blocker = path.join(tempDir, 'blocker');
    fs.writeFileSync(blocker, 'a file, not a directory');
    const store = new PreferenceStore(path.join(blocker, 'sub'), defaults);

    expect(() => store.save(defaults)).toThrow(/^Could not save preferences to /);

    let caught: unknown;
    try {
      store.update({ selectedModel: 'mistral' });
    } catch (error) {
      caught = error;
    }
    expect(caught).toMatchObject({ kind: 'PreferenceSaveFailed' });
  });
});
