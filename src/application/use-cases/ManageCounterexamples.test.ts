import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { ManageCounterexamples } from './ManageCounterexamples.js';
import type { HttpResponse, RequestDescriptor } from '../../domain/ports/IHttpTransport.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { RestClient } from '../../infrastructure/http/RestClient.js';

const BASE = 'https://conversation.example.test/api';
const PAGINATION = { refresh_url: '/v1/workspaces?version=2017-05-26' };

describe('ManageCounterexamples', () => {
  let send: Mock<(request: RequestDescriptor) => Promise<HttpResponse>>;
  let mockLogger: ILogger;
  let useCase: ManageCounterexamples;

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
    useCase = new ManageCounterexamples(rest, mockLogger);
  });

  it('should list counterexamples', async () => {
    respond(200, { counterexamples: [{ text: 'how is the weather' }], pagination: PAGINATION });

    const result = await useCase.list({ workspaceId: 'ws-1', cursor: 'next-page' });

    expect(lastRequest()?.url).toBe(`${BASE}/v1/workspaces/ws-1/counterexamples?version=2017-05-26&cursor=next-page`);
    expect(result.counterexamples).toEqual([{ text: 'how is the weather' }]);
  });

  it('should create a counterexample', async () => {
    respond(201, { text: 'tell me a joke' });

    await useCase.create({ workspaceId: 'ws-1', text: 'tell me a joke' });

    expect(lastRequest()).toMatchObject({
      method: 'POST',
      path: '/v1/workspaces/ws-1/counterexamples',
      body: '{"text":"tell me a joke"}',
    });
  });

  it('should get, update and delete by text', async () => {
    respond(200, { text: 'tell me a story' });

    await useCase.get({ workspaceId: 'ws-1', text: 'tell me a joke' });
    expect(lastRequest()).toMatchObject({ method: 'GET', path: '/v1/workspaces/ws-1/counterexamples/tell%20me%20a%20joke' });

    await useCase.update({ workspaceId: 'ws-1', text: 'tell me a joke', changes: { text: 'tell me a story' } });
    expect(lastRequest()).toMatchObject({ method: 'POST', body: '{"text":"tell me a story"}' });

    await useCase.delete({ workspaceId: 'ws-1', text: 'tell me a story' });
    expect(lastRequest()).toMatchObject({
      method: 'DELETE',
      path: '/v1/workspaces/ws-1/counterexamples/tell%20me%20a%20story',
    });
  });

  it('should log failures with the operation name', async () => {
    respond(400, { error: 'Counterexample already exists' });

    await expect(useCase.create({ workspaceId: 'ws-1', text: 'tell me a joke' })).rejects.toThrow(
      'Counterexample already exists'
    );
    expect(mockLogger.error).toHaveBeenCalledWith('Error in createCounterexample', expect.any(Error), {
      workspaceId: 'ws-1',
    });
  });
});
