import { MCPClient } from '../../../src/agent/mcp.client';
import { ToolProviderError } from '../../../src/errors';
import { MockLogger } from '../../helpers/cli-test-harness';
import { Client, StdioClientTransport } from '../mocks/mock-mcp-sdk';
import { fetchTool } from '../mocks/mock-mcp-client';

const serverParams = { command: 'uvx', args: ['mcp-server-fetch', '--ignore-robots-txt'] };

describe('MCPClient', () => {
  let logger: MockLogger;
  let client: MCPClient;

  beforeEach(() => {
    Client.reset();
    logger = new MockLogger();
    client = new MCPClient(logger);
  });

  test('spawns the tool provider over stdio and connects', async () => {
    await client.connect(serverParams);

    expect(StdioClientTransport.instances).toHaveLength(1);
    expect(StdioClientTransport.instances[0].params).toEqual({
      command: 'uvx',
      args: ['mcp-server-fetch', '--ignore-robots-txt'],
      env: undefined
    });
    expect(Client.instances[0].info).toEqual({ name: 'mcp-chat', version: '1.0.0' });
    expect(Client.instances[0].transport).toBe(StdioClientTransport.instances[0]);
  });

  test('wraps handshake failures and closes the transport', async () => {
    Client.connectError = new Error('spawn uvx ENOENT');

    await expect(client.connect(serverParams)).rejects.toThrow(ToolProviderError);
    await expect(client.connect(serverParams)).rejects.toThrow(
      'Failed to connect to tool provider "uvx mcp-server-fetch --ignore-robots-txt": spawn uvx ENOENT'
    );
    await expect(client.getTools()).rejects.toThrow('Not connected to a tool provider');
    expect(StdioClientTransport.instances.every(transport => transport.closed)).toBe(true);
  });

  test('lists the provider tools', async () => {
    Client.tools = [fetchTool];
    await client.connect(serverParams);

    await expect(client.getTools()).resolves.toEqual([fetchTool]);
  });

  test('calls a tool with a timeout and the caller signal', async () => {
    Client.callToolHandler = (params) => ({
      content: [{ type: 'text', text: `fetched ${String(params.arguments?.url)}` }]
    });
    await client.connect(serverParams);
    const controller = new AbortController();

    const result = await client.executeTool('fetch', { url: 'https://example.com' }, { signal: controller.signal });

    expect(result).toEqual({ content: [{ type: 'text', text: 'fetched https://example.com' }] });
    expect(Client.instances[0].toolCalls).toEqual([{
      params: { name: 'fetch', arguments: { url: 'https://example.com' } },
      options: { timeout: 300000, signal: controller.signal }
    }]);
  });

  test('logs a warning when the tool reports an error', async () => {
    Client.callToolHandler = () => ({ content: [{ type: 'text', text: 'robots.txt disallows' }], isError: true });
    await client.connect(serverParams);

    const result = await client.executeTool('fetch', { url: 'https://example.com' });

    expect(result.isError).toBe(true);
    expect(logger.logs).toContainEqual(expect.objectContaining({ level: 'WARN', message: 'Tool reported an error' }));
  });

  test('refuses tool operations before connecting', async () => {
    await expect(client.getTools()).rejects.toThrow('Not connected to a tool provider');
    await expect(client.executeTool('fetch', {})).rejects.toThrow(ToolProviderError);
  });

  test('disconnect closes the client once', async () => {
    await client.connect(serverParams);
    await client.disconnect();
    await client.disconnect();

    expect(Client.instances[0].closed).toBe(true);
    expect(StdioClientTransport.instances[0].closed).toBe(true);
    await expect(client.getTools()).rejects.toThrow('Not connected to a tool provider');
  });

  test('connecting again replaces the previous connection', async () => {
    await client.connect(serverParams);
    await client.connect(serverParams);

    expect(Client.instances).toHaveLength(2);
    expect(Client.instances[0].closed).toBe(true);
    expect(Client.instances[1].closed).toBe(false);
  });
});
