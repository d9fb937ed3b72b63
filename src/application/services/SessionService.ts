import { randomUUID } from 'crypto';
import { TransformService } from './TransformService.js';
import { PromptCatalog, DEFAULT_PROMPT_ID } from '../../core/catalog/PromptCatalog.js';
import { IDocumentLoader } from '../../core/interfaces/IDocumentLoader.js';
import { IPreferenceStore } from '../../core/interfaces/IPreferenceStore.js';
import { IOutputWriter } from '../../core/interfaces/IOutputWriter.js';
import { ClearTarget, SessionSnapshot, SessionState } from '../../core/entities/Session.js';
import { Preference } from '../../core/entities/Preference.js';
import { UploadedDocument } from '../../core/entities/Document.js';
import { TransformationRequest } from '../../core/entities/Transformation.js';
import { TransformerError, isTransformerError } from '../../core/errors/TransformerError.js';
import { DEFAULT_OUTPUT_FILENAME, suggestFilename } from '../../utils/filename.js';

export interface SessionServiceOptions {
  maxSelected: number;
  now?: () => Date;
  debugLog?: (message: string) => void;
}

export interface SaveOutputResult {
  path: string;
  session: SessionSnapshot;
}

type SessionUpdatedHandler = (session: SessionSnapshot) => void;

/**
 * Drives each session through idle -> awaiting_model -> idle and keeps at
 * most one model request in flight per session.
 */
export class SessionService {
  private sessions: Map<string, SessionState> = new Map();
  private updateHandlers: SessionUpdatedHandler[] = [];
  private now: () => Date;
  private debugLog: (message: string) => void;

  constructor(
    private transformService: TransformService,
    private catalog: PromptCatalog,
    private documentLoader: IDocumentLoader,
    private preferenceStore: IPreferenceStore,
    private outputWriter: IOutputWriter,
    private options: SessionServiceOptions
  ) {
    this.now = options.now ?? (() => new Date());
    this.debugLog = options.debugLog ?? (() => {});
  }

  /**
   * Open a session seeded from the stored preferences
   */
  createSession(): SessionSnapshot {
    const preference = this.preferenceStore.load();
    const remembered = preference.lastUsedTransformations
      .filter((id) => this.catalog.has(id))
      .slice(0, this.options.maxSelected);
    const createdAt = this.now();

    const state: SessionState = {
      id: randomUUID(),
      status: 'idle',
      inputText: '',
      outputText: '',
      selectedTransformations: remembered.length > 0 ? remembered : this.defaultSelection(),
      selectedModel: preference.selectedModel,
      downloadPath: preference.downloadPath,
      suggestedFilename: DEFAULT_OUTPUT_FILENAME,
      result: null,
      warnings: [],
      createdAt,
      updatedAt: createdAt,
    };

    this.sessions.set(state.id, state);
    this.debugLog(`[SessionService] Session ${state.id} created (model: ${state.selectedModel})`);
    return this.snapshot(state);
  }

  getSession(sessionId: string): SessionSnapshot {
    return this.snapshot(this.require(sessionId));
  }

  listSessions(): SessionSnapshot[] {
    return Array.from(this.sessions.values(), (state) => this.snapshot(state));
  }

  closeSession(sessionId: string): void {
    this.require(sessionId);
    this.sessions.delete(sessionId);
    this.debugLog(`[SessionService] Session ${sessionId} closed`);
  }

  updateInput(sessionId: string, text: string): SessionSnapshot {
    const state = this.begin(sessionId);
    state.inputText = text;
    return this.commit(state);
  }

  /**
   * The output pane is editable; edits replace the output text
   */
  updateOutput(sessionId: string, text: string): SessionSnapshot {
    const state = this.begin(sessionId);
    state.outputText = text;
    return this.commit(state);
  }

  selectTransformations(sessionId: string, keys: string[]): SessionSnapshot {
    const state = this.begin(sessionId);

    const ids = Array.from(new Set(keys.map((key) => this.catalog.lookup(key).id)));
    if (ids.length > this.options.maxSelected) {
      state.warnings.push(
        `You can select up to ${this.options.maxSelected} transformations. Only the first ${this.options.maxSelected} will be applied.`
      );
    }

    state.selectedTransformations = ids.slice(0, this.options.maxSelected);
    return this.commit(state);
  }

  selectModel(sessionId: string, model: string): SessionSnapshot {
    const state = this.begin(sessionId);
    state.selectedModel = model;
    this.persist(state, { selectedModel: model });
    return this.commit(state);
  }

  setDownloadPath(sessionId: string, downloadPath: string): SessionSnapshot {
    const state = this.begin(sessionId);
    state.downloadPath = downloadPath;
    this.persist(state, { downloadPath });
    return this.commit(state);
  }

  /**
   * Replace the input text with the text of an uploaded document. Loader
   * failures become the session result; no model request is made.
   */
  async loadDocument(sessionId: string, document: UploadedDocument): Promise<SessionSnapshot> {
    const state = this.begin(sessionId);

    try {
      state.inputText = await this.documentLoader.loadUpload(document);
      state.result = null;
      this.debugLog(
        `[SessionService] Loaded ${document.filename ?? 'upload'} (${state.inputText.length} chars) into ${sessionId}`
      );
    } catch (error) {
      if (!isTransformerError(error)) {
        throw error;
      }
      console.error(`[SessionService] Error reading file ${document.filename ?? ''}: ${error.message}`);
      state.result = { kind: 'error', error: error.toInfo() };
    }

    return this.commit(state);
  }

  /**
   * Run the selected transformations over the input text. Rejects with
   * SessionBusy while a request for this session is still in flight.
   */
  async transform(sessionId: string): Promise<SessionSnapshot> {
    const state = this.require(sessionId);
    if (state.status === 'awaiting_model') {
      throw new TransformerError('SessionBusy', 'A transformation is already running for this session');
    }

    state.warnings = [];
    if (!state.inputText.trim()) {
      state.result = {
        kind: 'error',
        error: { kind: 'EmptyInput', message: 'Please enter some text to transform.' },
      };
      return this.commit(state);
    }

    const request: TransformationRequest = Object.freeze({
      sourceText: state.inputText,
      promptIds: Object.freeze([...state.selectedTransformations]),
      modelName: state.selectedModel,
    });

    state.status = 'awaiting_model';
    this.commit(state);
    this.debugLog(`[SessionService] Transform started for ${sessionId} with ${request.modelName}`);

    try {
      const result = await this.transformService.transform(request);
      state.result = result;

      if (result.kind === 'output') {
        state.outputText = result.outputText;
        state.suggestedFilename = suggestFilename(result.outputText, this.now());
        this.persist(state, { lastUsedTransformations: [...request.promptIds] });
      }
    } catch (error) {
      state.status = 'idle';
      this.commit(state);
      throw error;
    }

    state.status = 'idle';
    this.debugLog(`[SessionService] Transform finished for ${sessionId}`);
    return this.commit(state);
  }

  /**
   * Write the output text into the download folder
   */
  async saveOutput(sessionId: string, filename?: string): Promise<SaveOutputResult> {
    const state = this.begin(sessionId);
    if (!state.outputText.trim()) {
      throw new TransformerError('EmptyOutput', 'No transformed text to save.');
    }

    const name = filename?.trim() || state.suggestedFilename;
    const savedPath = await this.outputWriter.write(state.downloadPath, name, state.outputText);
    console.log(`[SessionService] Saved output of ${sessionId} to ${savedPath}`);

    return { path: savedPath, session: this.commit(state) };
  }

  clear(sessionId: string, target: ClearTarget): SessionSnapshot {
    const state = this.begin(sessionId);

    if (target === 'input' || target === 'all') {
      state.inputText = '';
    }
    if (target === 'output' || target === 'all') {
      state.outputText = '';
    }
    if (target === 'all') {
      state.selectedTransformations = this.defaultSelection();
      state.suggestedFilename = DEFAULT_OUTPUT_FILENAME;
      state.result = null;
    }

    return this.commit(state);
  }

  /**
   * Attach session update callback
   */
  onSessionUpdated(handler: SessionUpdatedHandler): void {
    this.updateHandlers.push(handler);
  }

  private require(sessionId: string): SessionState {
    const state = this.sessions.get(sessionId);
    if (!state) {
      throw new TransformerError('SessionNotFound', `Session not found: ${sessionId}`);
    }
    return state;
  }

  private begin(sessionId: string): SessionState {
    const state = this.require(sessionId);
    state.warnings = [];
    return state;
  }

  /**
   * Observers only hear about sessions that are still open
   */
  private commit(state: SessionState): SessionSnapshot {
    state.updatedAt = this.now();
    const snapshot = this.snapshot(state);
    if (this.sessions.get(state.id) !== state) {
      return snapshot;
    }
    for (const handler of this.updateHandlers) {
      handler(snapshot);
    }
    return snapshot;
  }

  /**
   * Save failures are reported as a warning; the session keeps working
   */
  private persist(state: SessionState, changes: Partial<Preference>): void {
    try {
      this.preferenceStore.update(changes);
    } catch (error) {
      if (!isTransformerError(error, 'PreferenceSaveFailed')) {
        throw error;
      }
      console.warn(`[SessionService] ${error.message}`);
      state.warnings.push(`Preferences were not saved: ${error.message}`);
    }
  }

  private defaultSelection(): string[] {
    return this.catalog.has(DEFAULT_PROMPT_ID) ? [DEFAULT_PROMPT_ID] : [];
  }

  private snapshot(state: SessionState): SessionSnapshot {
    return {
      id: state.id,
      status: state.status,
      inputText: state.inputText,
      outputText: state.outputText,
      selectedTransformations: [...state.selectedTransformations],
      selectedModel: state.selectedModel,
      downloadPath: state.downloadPath,
      suggestedFilename: state.suggestedFilename,
      result: state.result,
      warnings: [...state.warnings],
      createdAt: state.createdAt.toISOString(),
      updatedAt: state.updatedAt.toISOString(),
    };
  }
}
