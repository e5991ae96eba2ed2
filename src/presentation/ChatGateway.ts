import { Config } from '../config.js';
import { DatabaseConnection } from '../infrastructure/database/DatabaseConnection.js';
import { AgentConfigRepository } from '../infrastructure/database/repositories/AgentConfigRepository.js';
import { ConversationRepository } from '../infrastructure/database/repositories/ConversationRepository.js';
import { OpenAiApiClient } from '../infrastructure/http/OpenAiApiClient.js';
import { WebServer } from '../infrastructure/web/WebServer.js';
import { AgentService } from '../application/services/AgentService.js';
import { IChatCompletionClient } from '../core/interfaces/IChatCompletionClient.js';

export interface ChatGatewayOverrides {
  /** Replaces the OpenAI client, e.g. with a stand-in provider */
  completionClient?: IChatCompletionClient;
}

/**
 * Wires configuration, store, provider client and web server together
 */
export class ChatGateway {
  private dbConnection: DatabaseConnection;
  private configRepo: AgentConfigRepository;
  private conversationRepo: ConversationRepository;
  private agentService: AgentService;
  private webServer: WebServer;
  private debugLog: (message: string) => void;

  constructor(
    private config: Config,
    overrides: ChatGatewayOverrides = {}
  ) {
    this.debugLog = (message: string) => {
      if (config.server.debug) {
        console.error(`[DEBUG] ${message}`);
      }
    };

    this.dbConnection = new DatabaseConnection(config.database);
    const db = this.dbConnection.getDatabase();
    const collections = this.dbConnection.getCollections();

    this.configRepo = new AgentConfigRepository(db, collections.configs);
    this.conversationRepo = new ConversationRepository(db, collections.conversations);

    const completionClient =
      overrides.completionClient ?? new OpenAiApiClient(config.openai.apiKey, config.openai.baseUrl);
    this.agentService = new AgentService(completionClient, config.openai.turnTimeoutMs);

    this.webServer = new WebServer(
      {
        configRepo: this.configRepo,
        conversationRepo: this.conversationRepo,
        agent: this.agentService,
        ping: () => this.dbConnection.ping(),
      },
      {
        port: config.server.port,
        host: config.server.host,
        basePath: config.server.basePath,
        debugLog: this.debugLog,
      }
    );
  }

  getWebServer(): WebServer {
    return this.webServer;
  }

  /**
   * Print store statistics
   */
  printStats(): void {
    const stats = this.dbConnection.getStatistics();
    console.error(
      `[ChatGateway] Store: ${stats.totalConfigs} configs for ${stats.totalClients} clients, ` +
        `${stats.totalMessages} messages in ${stats.totalChats} chats, ` +
        `${(stats.databaseSize / 1024).toFixed(2)} KB`
    );
  }

  async start(): Promise<void> {
    this.debugLog(`Database opened at: ${this.dbConnection.getDatabasePath()}`);
    await this.webServer.start();
    console.error(`[ChatGateway] ${this.config.server.name} v${this.config.server.version} ready`);
  }

  /**
   * Stop accepting connections, close every socket and the store
   */
  async shutdown(): Promise<void> {
    console.error('[ChatGateway] Shutting down...');
    try {
      await this.webServer.stop();
    } finally {
      this.dbConnection.close();
    }
  }
}
