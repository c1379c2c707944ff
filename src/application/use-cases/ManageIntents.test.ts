import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { ManageIntents } from './ManageIntents.js';
import type { HttpResponse, RequestDescriptor } from '../../domain/ports/IHttpTransport.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { RestClient } from '../../infrastructure/http/RestClient.js';

const BASE = 'https://conversation.example.test/api';
const PAGINATION = { refresh_url: '/v1/workspaces?version=2017-05-26' };

describe('ManageIntents', () => {
  let send: Mock<(request: RequestDescriptor) => Promise<HttpResponse>>;
  let mockLogger: ILogger;
  let useCase: ManageIntents;

  const respond = (status: number, body: unknown): void => {
    send.mockResolvedValue({ status, body: body === undefined ? '' : JSON.stringify(body), headers: {} });
  };
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
    useCase = new ManageIntents(rest, mockLogger);
  });

  it('should list intents with export and paging', async () => {
    respond(200, { intents: [{ intent: 'order', examples: [{ text: 'one pizza' }] }], pagination: PAGINATION });

    const result = await useCase.list({ workspaceId: 'ws-1', export: true, pageLimit: 10 });

    expect(lastRequest()?.url).toBe(
      `${BASE}/v1/workspaces/ws-1/intents?version=2017-05-26&export=true&page_limit=10`
    );
    expect(result.intents).toEqual([{ intent: 'order', examples: [{ text: 'one pizza' }] }]);
  });

  it('should create an intent without sending the workspace id in the body', async () => {
    respond(201, { intent: 'order', description: 'Order food' });

    const intent = await useCase.create({ workspaceId: 'ws-1', intent: 'order', description: 'Order food' });

    expect(lastRequest()).toMatchObject({
      method: 'POST',
      path: '/v1/workspaces/ws-1/intents',
      body: '{"intent":"order","description":"Order food"}',
    });
    expect(intent).toEqual({ intent: 'order', description: 'Order food' });
  });

  it('should encode the intent name in the path', async () => {
    respond(200, { intent: 'pizza size?' });

    await useCase.get({ workspaceId: 'ws-1', intent: 'pizza size?' });

    expect(lastRequest()?.path).toBe('/v1/workspaces/ws-1/intents/pizza%20size%3F');
  });

  it('should update an intent with POST', async () => {
    respond(200, { intent: 'order', examples: [{ text: 'two pizzas' }] });

    await useCase.update({ workspaceId: 'ws-1', intent: 'order', changes: { examples: [{ text: 'two pizzas' }] } });

    expect(lastRequest()).toMatchObject({
      method: 'POST',
      path: '/v1/workspaces/ws-1/intents/order',
      body: '{"examples":[{"text":"two pizzas"}]}',
    });
  });

  it('should delete an intent', async () => {
    respond(200, {});

    await useCase.delete({ workspaceId: 'ws-1', intent: 'order' });

    expect(lastRequest()).toMatchObject({ method: 'DELETE', path: '/v1/workspaces/ws-1/intents/order' });
    expect(mockLogger.info).toHaveBeenCalledWith('Executing deleteIntent', { workspaceId: 'ws-1', intent: 'order' });
  });
});
