import { IAgentConfigRepository } from '../../core/interfaces/IAgentConfigRepository.js';
import { IConversationRepository } from '../../core/interfaces/IConversationRepository.js';
import { ClientAgentConfig } from '../../core/entities/AgentConfig.js';
import { ChatKey } from '../../core/entities/Conversation.js';
import { ConfigNotFoundError, toErrorPayload } from '../../core/errors.js';
import { AgentService } from './AgentService.js';

export type SessionState = 'connected' | 'awaiting_message' | 'processing' | 'closed';

/** Close code sent when the requested config does not exist */
export const CONFIG_NOT_FOUND_CLOSE_CODE = 1008;

/**
 * Transport the session writes to; the WebSocket server supplies one per connection
 */
export interface SessionChannel {
  send(frame: string): void;
  close(code: number, reason: string): void;
}

export interface ChatSessionDependencies {
  configRepo: IAgentConfigRepository;
  conversationRepo: IConversationRepository;
  agent: AgentService;
  debugLog?: (message: string) => void;
}

/**
 * One chat over one connection.
 *
 * connected -> awaiting_message <-> processing -> closed
 *
 * Inbound messages are chained onto a single promise so a connection handles
 * one turn at a time, in arrival order. A failed turn sends one error frame
 * and returns the session to awaiting_message.
 */
export class ChatSession {
  private state: SessionState = 'connected';
  private config: ClientAgentConfig | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    readonly key: ChatKey,
    private channel: SessionChannel,
    private deps: ChatSessionDependencies
  ) {}

  getState(): SessionState {
    return this.state;
  }

  /**
   * Load the config and send the opening greeting, if any.
   * Resolves false when the session was refused and closed.
   */
  open(): Promise<boolean> {
    const opened = this.queue.then(() => this.load());
    this.queue = opened.then(() => undefined);
    return opened;
  }

  /**
   * Queue an inbound text frame; resolves once it has been handled
   */
  receive(text: string): Promise<void> {
    this.queue = this.queue.then(() => this.process(text));
    return this.queue;
  }

  /**
   * Transport closed. Queued frames are dropped; a turn already waiting on
   * the provider still stores its result but sends nothing.
   */
  close(): void {
    if (this.state !== 'closed') {
      this.debug(`closed in state ${this.state}`);
    }
    this.state = 'closed';
  }

  private async load(): Promise<boolean> {
    const { clientId, configId } = this.key;

    try {
      this.config = this.deps.configRepo.getConfig(clientId, configId);
    } catch (error) {
      this.sendError(error);
      const reason =
        error instanceof ConfigNotFoundError ? 'No such bot config found' : 'Failed to load bot config';
      this.channel.close(CONFIG_NOT_FOUND_CLOSE_CODE, reason);
      this.state = 'closed';
      return false;
    }

    this.state = 'awaiting_message';
    this.debug(`opened with config ${clientId}/${configId}`);
    await this.greet(this.config);
    return true;
  }

  private async greet(config: ClientAgentConfig): Promise<void> {
    const { user_initial_message: userInitial, bot_initial_message: botInitial } =
      config.agent_config;
    if (!userInitial && !botInitial) {
      return;
    }

    this.state = 'processing';
    try {
      if (this.deps.conversationRepo.getHistory(this.key).length > 0) {
        return;
      }

      if (userInitial) {
        const reply = await this.deps.agent.generateReply(config.agent_config, [], userInitial);
        this.deps.conversationRepo.appendTurns(this.key, [
          { role: 'user', content: userInitial },
          { role: 'assistant', content: reply },
        ]);
        this.sendIfOpen(reply);
      }

      if (botInitial) {
        this.deps.conversationRepo.appendTurn(this.key, 'assistant', botInitial);
        this.sendIfOpen(botInitial);
      }
    } catch (error) {
      this.sendError(error);
    } finally {
      this.settle();
    }
  }

  private async process(text: string): Promise<void> {
    if (this.state === 'closed' || !this.config) {
      return;
    }
    if (text.trim().length === 0) {
      return;
    }

    this.state = 'processing';
    try {
      const history = this.deps.conversationRepo.getHistory(this.key);
      const reply = await this.deps.agent.generateReply(this.config.agent_config, history, text);

      // Both turns or neither
      this.deps.conversationRepo.appendTurns(this.key, [
        { role: 'user', content: text },
        { role: 'assistant', content: reply },
      ]);
      this.sendIfOpen(reply);
    } catch (error) {
      this.sendError(error);
    } finally {
      this.settle();
    }
  }

  private settle(): void {
    if (this.state === 'processing') {
      this.state = 'awaiting_message';
    }
  }

  private sendIfOpen(frame: string): void {
    if (this.state !== 'closed') {
      this.channel.send(frame);
    }
  }

  private sendError(error: unknown): void {
    const payload = toErrorPayload(error);
    console.error(
      `[ChatSession] ${this.describe()} ${payload.error}: ${payload.message}`
    );
    this.sendIfOpen(JSON.stringify(payload));
  }

  private describe(): string {
    return `${this.key.clientId}/${this.key.configId}/${this.key.chatId}`;
  }

  private debug(message: string): void {
    this.deps.debugLog?.(`[ChatSession] ${this.describe()} ${message}`);
  }
}
