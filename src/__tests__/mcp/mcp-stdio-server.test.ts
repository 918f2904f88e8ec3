import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { MetavaultClient } from '../../client/metavault.client';
import { createMcpServer } from '../../mcp-stdio-server';
import { METAVAULT_MCP_TOOLS } from '../../mcp/tools';
import { ServiceContainer } from '../../services/core/service-container';
import { FakeTransport } from '../helpers/fake-transport';
import { BASE_URL, PROJECT_ID, page } from '../helpers/fixtures';

describe('createMcpServer', () => {
  let transport: FakeTransport;
  let server: McpServer;
  let client: Client;

  beforeEach(async () => {
    transport = new FakeTransport();
    server = createMcpServer(new ServiceContainer(new MetavaultClient(BASE_URL, transport)));
    client = new Client({ name: 'test-client', version: '1.0.0' });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  it('lists every tool with its annotations', async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name)).toEqual(METAVAULT_MCP_TOOLS.map((tool) => tool.name));
    const deleteTool = tools.find((tool) => tool.name === 'delete_staging_table_mapping');
    expect(deleteTool?.annotations?.destructiveHint).toBe(true);
    expect(deleteTool?.inputSchema.required).toEqual([
      'projectName',
      'sourceSystemIdOrName',
      'dataPackageIdOrName',
      'tableIdOrName',
      'mappingIdOrName',
    ]);
  });

  it('returns handler results as JSON text', async () => {
    transport.on('GET', '/metavault/api/projects?onlyAffected=true', page('projects', [{ id: PROJECT_ID, name: 'Sales' }]));

    const result = await client.callTool({ name: 'get_projects', arguments: {} });

    expect(result).toMatchObject({
      content: [{ type: 'text', text: JSON.stringify({ projects: [{ id: PROJECT_ID, name: 'Sales' }] }) }],
    });
  });

  it('returns failures as error results', async () => {
    const result = await client.callTool({
      name: 'get_satellite',
      arguments: { projectName: 'P1', parentType: 'satellite', parentIdOrName: 'Customer', satelliteIdOrName: 'x' },
    });

    expect(result).toMatchObject({
      content: [{ type: 'text', text: "INVALID_ARGUMENT: Invalid parentType 'satellite'. Must be 'hub' or 'link'" }],
      isError: true,
    });
    expect(transport.calls).toHaveLength(0);
  });
});

describe('importing the server module', () => {
  const saved = {
    NODE_ENV: process.env.NODE_ENV,
    JEST_WORKER_ID: process.env.JEST_WORKER_ID,
    LOG_LEVEL: process.env.LOG_LEVEL,
  };

  afterEach(() => {
    for (const [key, value] of Object.entries(saved)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it('leaves NODE_ENV untouched', async () => {
    process.env.NODE_ENV = 'development';
    process.env.LOG_LEVEL = 'silent';
    delete process.env.JEST_WORKER_ID;
    jest.resetModules();

    const loaded = await import('../../mcp-stdio-server');

    expect(typeof loaded.createMcpServer).toBe('function');
    expect(process.env.NODE_ENV).toBe('development');
  });
});
