import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { ManageWorkspaces } from './ManageWorkspaces.js';
import { ServiceError } from '../../domain/errors/ConversationError.js';
import type { HttpResponse, RequestDescriptor } from '../../domain/ports/IHttpTransport.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { RestClient } from '../../infrastructure/http/RestClient.js';

const BASE = 'https://conversation.example.test/api';

describe('ManageWorkspaces', () => {
  let send: Mock<(request: RequestDescriptor) => Promise<HttpResponse>>;
  let mockLogger: ILogger;
  let useCase: ManageWorkspaces;

  const lastRequest = (): RequestDescriptor | undefined => send.mock.calls.at(-1)?.[0];

  beforeEach(() => {
    send = vi.fn<(request: RequestDescriptor) => Promise<HttpResponse>>();

    mockLogger = {
      trace: vi.fn(),
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      fatal: vi.fn(),
      child: vi.fn().mockReturnThis(),
    };

    const rest = new RestClient({ serviceUrl: BASE, version: '2017-05-26' }, { send }, mockLogger);
    useCase = new ManageWorkspaces(rest, mockLogger);
  });

  it('should list workspaces with paging options', async () => {
    send.mockResolvedValue({
      status: 200,
      body: JSON.stringify({
        workspaces: [{ name: 'Pizza', language: 'en', workspace_id: 'ws-1' }],
        pagination: { refresh_url: '/v1/workspaces?version=2017-05-26' },
      }),
      headers: {},
    });

    const result = await useCase.list({ pageLimit: 5, includeCount: true });

    expect(lastRequest()).toMatchObject({
      method: 'GET',
      url: `${BASE}/v1/workspaces?version=2017-05-26&page_limit=5&include_count=true`,
    });
    expect(result.workspaces).toEqual([{ name: 'Pizza', language: 'en', workspaceId: 'ws-1' }]);
    expect(mockLogger.info).toHaveBeenCalledWith('Executing listWorkspaces', {});
  });

  it('should create a workspace with nested intents', async () => {
    send.mockResolvedValue({
      status: 201,
      body: '{"name":"Pizza","language":"en","workspace_id":"ws-2"}',
      headers: {},
    });

    const workspace = await useCase.create({
      name: 'Pizza',
      language: 'en',
      intents: [{ intent: 'order', examples: [{ text: 'one pizza' }] }],
    });

    expect(lastRequest()).toMatchObject({
      method: 'POST',
      url: `${BASE}/v1/workspaces?version=2017-05-26`,
      body: '{"name":"Pizza","language":"en","intents":[{"intent":"order","examples":[{"text":"one pizza"}]}]}',
    });
    expect(workspace.workspaceId).toBe('ws-2');
  });

  it('should request an export when getting a workspace', async () => {
    send.mockResolvedValue({
      status: 200,
      body: '{"name":"Pizza","language":"en","workspace_id":"ws-1","intents":[]}',
      headers: {},
    });

    const workspace = await useCase.get({ workspaceId: 'ws-1', export: true });

    expect(lastRequest()?.url).toBe(`${BASE}/v1/workspaces/ws-1?version=2017-05-26&export=true`);
    expect(workspace.intents).toEqual([]);
  });

  it('should update a workspace with POST', async () => {
    send.mockResolvedValue({
      status: 200,
      body: '{"name":"Pizza","language":"en","workspace_id":"ws-1","description":"Orders"}',
      headers: {},
    });

    const workspace = await useCase.update({ workspaceId: 'ws-1', changes: { description: 'Orders' } });

    expect(lastRequest()).toMatchObject({
      method: 'POST',
      path: '/v1/workspaces/ws-1',
      body: '{"description":"Orders"}',
    });
    expect(workspace.description).toBe('Orders');
  });

  it('should delete a workspace', async () => {
    send.mockResolvedValue({ status: 200, body: '{}', headers: {} });

    await expect(useCase.delete({ workspaceId: 'ws-1' })).resolves.toBeUndefined();
    expect(lastRequest()).toMatchObject({ method: 'DELETE', path: '/v1/workspaces/ws-1' });
  });

  it('should log and rethrow service errors', async () => {
    send.mockResolvedValue({ status: 404, body: '{"error":"Workspace not found"}', headers: {} });

    const promise = useCase.get({ workspaceId: 'missing' });

    await expect(promise).rejects.toBeInstanceOf(ServiceError);
    expect(mockLogger.error).toHaveBeenCalledWith(
      'Error in getWorkspace',
      expect.any(ServiceError),
      { workspaceId: 'missing' }
    );
  });
});
