import { Config } from '../config.js';
import { PromptCatalog } from '../core/catalog/PromptCatalog.js';
import { IModelClient } from '../core/interfaces/IModelClient.js';
import { loadPromptCatalog } from '../infrastructure/catalog/PromptCatalogLoader.js';
import { DocumentLoader } from '../infrastructure/documents/DocumentLoader.js';
import { OutputFileWriter } from '../infrastructure/files/OutputFileWriter.js';
import { OllamaApiClient } from '../infrastructure/http/OllamaApiClient.js';
import { PreferenceStore, defaultPreference } from '../infrastructure/preferences/PreferenceStore.js';
import { WebServer } from '../infrastructure/web/WebServer.js';
import { SessionService } from '../application/services/SessionService.js';
import { TransformService } from '../application/services/TransformService.js';

/**
 * Wires the catalog, Ollama client, preference store and session controller
 * behind the web server
 */
export class TransformerApp {
  private catalog: PromptCatalog;
  private modelClient: IModelClient;
  private preferenceStore: PreferenceStore;
  private sessionService: SessionService;
  private webServer: WebServer;
  private debugLog: (message: string) => void;

  constructor(private config: Config) {
    // Initialize debug logger
    this.debugLog = (message: string) => {
      if (config.server.debug) {
        console.error(`[DEBUG] ${message}`);
      }
    };

    this.catalog = loadPromptCatalog(config.catalog.promptsFile);
    this.modelClient = new OllamaApiClient(config.ollama.apiUrl, {
      timeoutMs: config.ollama.timeoutMs,
      temperature: config.ollama.temperature,
    });
    this.preferenceStore = new PreferenceStore(
      config.preferences.directory,
      defaultPreference(config.ollama.defaultModel),
      this.debugLog
    );

    const transformService = new TransformService(this.modelClient, this.catalog);
    this.sessionService = new SessionService(
      transformService,
      this.catalog,
      new DocumentLoader(),
      this.preferenceStore,
      new OutputFileWriter(),
      {
        maxSelected: config.catalog.maxSelected,
        debugLog: this.debugLog,
      }
    );

    this.webServer = new WebServer(this.sessionService, this.catalog, this.modelClient, {
      host: config.server.host,
      port: config.server.port,
      defaultModel: config.ollama.defaultModel,
      maxUploadBytes: config.uploads.maxBytes,
    });

    // Push every session change to connected pages
    this.sessionService.onSessionUpdated((session) => {
      this.webServer.notifySessionUpdate(session);
    });
  }

  /**
   * Report catalog size and whether Ollama answers
   */
  async printStats(): Promise<void> {
    console.error(`📚 Catalog: ${this.catalog.size} transformations loaded`);
    this.debugLog(`Preferences file: ${this.preferenceStore.getFilePath()}`);

    if (await this.modelClient.healthCheck()) {
      try {
        const models = await this.modelClient.listModels();
        console.error(`✅ Ollama: connected, ${models.length} models available`);
      } catch (error) {
        console.error(`⚠️ Ollama: connected but listing models failed:`, error);
      }
    } else {
      console.error(
        `⚠️ Ollama: cannot connect to ${this.config.ollama.apiUrl}. Please ensure Ollama is installed and running (https://ollama.com/).`
      );
    }
  }

  async start(): Promise<void> {
    await this.webServer.start();
    console.error(`\n✅ Text Transformer Toolbox running at http://${this.config.server.host}:${this.webServer.getPort()}`);
  }

  /**
   * Graceful shutdown
   */
  async shutdown(): Promise<void> {
    console.error('\n👋 Shutting down gracefully...');
    await this.webServer.stop();
  }
}
