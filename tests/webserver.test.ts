import fetch from 'node-fetch';
import { DatabaseConnection } from '../src/infrastructure/database/DatabaseConnection.js';
import { AgentConfigRepository } from '../src/infrastructure/database/repositories/AgentConfigRepository.js';
import { ConversationRepository } from '../src/infrastructure/database/repositories/ConversationRepository.js';
import { WebServer } from '../src/infrastructure/web/WebServer.js';
import { AgentService } from '../src/application/services/AgentService.js';
import { ProviderError } from '../src/core/errors.js';
import { FakeCompletionClient } from './helpers/fakes.js';
import { connect } from './helpers/wsClient.js';

const agentConfig = {
  prompt_preamble: 'You are a support bot.',
  model_name: 'gpt-4o-mini',
  max_tokens: 200,
  temperature: 0.2,
};

describe('WebServer', () => {
  let connection: DatabaseConnection;
  let conversations: ConversationRepository;
  let client: FakeCompletionClient;
  let server: WebServer;
  let httpUrl: string;
  let wsUrl: string;

  const postJson = (path: string, body: unknown) =>
    fetch(`${httpUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });

  const addConfig = (clientId: string, configId: string, config: object = agentConfig) =>
    postJson('/add_config', { client_id: clientId, config_id: configId, config });

  beforeEach(async () => {
    connection = new DatabaseConnection({
      uri: ':memory:',
      name: 'test.db',
      configCollection: 'configs',
      conversationCollection: 'conversations',
    });
    const db = connection.getDatabase();
    conversations = new ConversationRepository(db, 'conversations');
    client = new FakeCompletionClient(async (request) => {
      const last = request.messages[request.messages.length - 1].content;
      if (last === 'fail') {
        throw new ProviderError('Provider returned HTTP 500: upstream down');
      }
      return { model: request.model, content: `echo: ${last}` };
    });

    server = new WebServer(
      {
        configRepo: new AgentConfigRepository(db, 'configs'),
        conversationRepo: conversations,
        agent: new AgentService(client, 1000),
        ping: () => connection.ping(),
      },
      { port: 0, host: '127.0.0.1', basePath: '/api' }
    );
    await server.start();
    httpUrl = `http://127.0.0.1:${server.getPort()}/api`;
    wsUrl = `ws://127.0.0.1:${server.getPort()}/api`;
  });

  afterEach(async () => {
    await server.stop();
    connection.close();
  });

  describe('HTTP routes', () => {
    test('should report health', async () => {
      const res = await fetch(`${httpUrl}/health`);
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toMatchObject({ status: 'ok', database: true, activeSessions: 0 });
    });

    test('should insert then update a config', async () => {
      const inserted = await addConfig('c1', 'cfg1');
      expect(inserted.status).toBe(200);
      expect(await inserted.json()).toEqual({
        status: 'ok',
        message: 'Configuration inserted successfully',
      });

      const updated = await addConfig('c1', 'cfg1', { ...agentConfig, temperature: 0.7 });
      expect(await updated.json()).toEqual({
        status: 'ok',
        message: 'Configuration updated successfully',
      });

      const res = await fetch(`${httpUrl}/get_config?client_id=c1&config_id=cfg1`);
      const body = await res.json();
      expect(body.config).toMatchObject({
        client_id: 'c1',
        config_id: 'cfg1',
        bot_name: 'Untitled Bot',
        agent_config: { ...agentConfig, temperature: 0.7 },
      });
    });

    test('should fill generation defaults for omitted settings', async () => {
      await addConfig('c1', 'cfg1', { prompt_preamble: 'p' });

      const res = await postJson('/get_config', { client_id: 'c1', config_id: 'cfg1' });
      const body = await res.json();

      expect(body.config.agent_config).toEqual({
        prompt_preamble: 'p',
        model_name: 'gpt-4o-mini',
        max_tokens: 400,
        temperature: 0.3,
      });
    });

    test('should list clients and configs', async () => {
      await addConfig('c2', 'sales');
      await addConfig('c1', 'support');
      await addConfig('c1', 'onboarding');

      const clients = await (await fetch(`${httpUrl}/client/list`)).json();
      const configs = await (await fetch(`${httpUrl}/list/c1`)).json();

      expect(clients).toEqual({ clients: ['c1', 'c2'] });
      expect(configs).toEqual({ configs: ['onboarding', 'support'] });
    });

    test('should answer 404 for a missing config', async () => {
      const res = await fetch(`${httpUrl}/get_config?client_id=c1&config_id=nope`);

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: 'ConfigNotFound',
        message: 'No such bot config found: c1/nope',
      });
    });

    test('should answer 400 when a required field is missing', async () => {
      const res = await postJson('/add_config', { client_id: 'c1', config_id: 'cfg1' });
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.error).toBe('ValidationError');
      expect(body.message).toContain('config: Required');
    });

    test('should answer 400 for a body that is not JSON', async () => {
      const res = await fetch(`${httpUrl}/add_config`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"client_id":',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'ValidationError',
        message: 'Request body is not valid JSON',
      });
    });

    test('should answer 413 for a body over the size limit', async () => {
      const res = await addConfig('c1', 'cfg1', { prompt_preamble: 'x'.repeat(150_000) });

      expect(res.status).toBe(413);
      expect(await res.json()).toEqual({
        error: 'ValidationError',
        message: 'request entity too large',
      });
      const clients = await (await fetch(`${httpUrl}/client/list`)).json();
      expect(clients).toEqual({ clients: [] });
    });

    test('should answer 415 for an unsupported charset', async () => {
      const res = await fetch(`${httpUrl}/add_config`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json; charset=latin-9' },
        body: '{}',
      });

      expect(res.status).toBe(415);
      expect(await res.json()).toEqual({
        error: 'ValidationError',
        message: 'unsupported charset "LATIN-9"',
      });
    });

    test('should answer 404 for unknown routes', async () => {
      const res = await fetch(`${httpUrl}/nope`);

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'NotFound', message: 'Cannot GET /api/nope' });
    });
  });

  describe('WebSocket chat', () => {
    test('should relay a message and persist the exchange', async () => {
      await addConfig('c1', 'cfg1');
      const socket = await connect(`${wsUrl}/chat/c1/cfg1/chat1`);

      socket.send('hello');
      expect(await socket.next()).toBe('echo: hello');
      socket.send('and again');
      expect(await socket.next()).toBe('echo: and again');
      socket.close();
      await socket.closed;

      const history = await (await fetch(`${httpUrl}/history/c1/cfg1/chat1`)).json();
      expect(history.messages.map((m: { content: string }) => m.content)).toEqual([
        'hello',
        'echo: hello',
        'and again',
        'echo: and again',
      ]);
      const chats = await (await fetch(`${httpUrl}/list/c1/cfg1/chats`)).json();
      expect(chats).toEqual({ chats: ['chat1'] });
    });

    test('should send an error frame and close when the config is missing', async () => {
      const socket = await connect(`${wsUrl}/chat/c1/cfg1/chat1`);

      expect(JSON.parse(await socket.next())).toEqual({
        error: 'ConfigNotFound',
        message: 'No such bot config found: c1/cfg1',
      });
      expect(await socket.closed).toEqual({ code: 1008, reason: 'No such bot config found' });
      expect(conversations.getHistory({ clientId: 'c1', configId: 'cfg1', chatId: 'chat1' })).toEqual([]);
    });

    test('should keep the connection open after a provider failure', async () => {
      await addConfig('c1', 'cfg1');
      const socket = await connect(`${wsUrl}/chat/c1/cfg1/chat1`);

      socket.send('fail');
      expect(JSON.parse(await socket.next())).toEqual({
        error: 'ProviderError',
        message: 'Provider returned HTTP 500: upstream down',
      });
      socket.send('hello');
      expect(await socket.next()).toBe('echo: hello');
      socket.close();
      await socket.closed;

      expect(
        conversations
          .getHistory({ clientId: 'c1', configId: 'cfg1', chatId: 'chat1' })
          .map((turn) => turn.content)
      ).toEqual(['hello', 'echo: hello']);
    });

    test('should keep concurrent chats independent', async () => {
      await addConfig('c1', 'cfg1');
      const a = await connect(`${wsUrl}/chat/c1/cfg1/chat-a`);
      const b = await connect(`${wsUrl}/chat/c1/cfg1/chat-b`);

      a.send('a1');
      b.send('b1');
      a.send('a2');
      b.send('b2');
      expect([await a.next(), await a.next()]).toEqual(['echo: a1', 'echo: a2']);
      expect([await b.next(), await b.next()]).toEqual(['echo: b1', 'echo: b2']);
      a.close();
      b.close();
      await Promise.all([a.closed, b.closed]);

      const contents = (chatId: string) =>
        conversations
          .getHistory({ clientId: 'c1', configId: 'cfg1', chatId })
          .map((turn) => turn.content);
      expect(contents('chat-a')).toEqual(['a1', 'echo: a1', 'a2', 'echo: a2']);
      expect(contents('chat-b')).toEqual(['b1', 'echo: b1', 'b2', 'echo: b2']);
    });

    test('should reject upgrades outside the chat path', async () => {
      await expect(connect(`${wsUrl}/elsewhere`)).rejects.toThrow('Unexpected server response: 404');
    });
  });
});
