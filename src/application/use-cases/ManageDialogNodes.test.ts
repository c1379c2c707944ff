import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { ManageDialogNodes } from './ManageDialogNodes.js';
import type { HttpResponse, RequestDescriptor } from '../../domain/ports/IHttpTransport.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { RestClient } from '../../infrastructure/http/RestClient.js';

const BASE = 'https://conversation.example.test/api';
const PAGINATION = { refresh_url: '/v1/workspaces?version=2017-05-26' };

describe('ManageDialogNodes', () => {
  let send: Mock<(request: RequestDescriptor) => Promise<HttpResponse>>;
  let mockLogger: ILogger;
  let useCase: ManageDialogNodes;

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
    useCase = new ManageDialogNodes(rest, mockLogger);
  });

  it('should list dialog nodes', async () => {
    respond(200, { dialog_nodes: [{ dialog_node: 'welcome', conditions: 'welcome' }], pagination: PAGINATION });

    const result = await useCase.list({ workspaceId: 'ws-1' });

    expect(lastRequest()?.url).toBe(`${BASE}/v1/workspaces/ws-1/dialog_nodes?version=2017-05-26`);
    expect(result.dialogNodes).toEqual([{ dialogNode: 'welcome', conditions: 'welcome' }]);
  });

  it('should create a dialog node', async () => {
    respond(201, { dialog_node: 'welcome', conditions: 'welcome', type: 'standard' });

    const node = await useCase.create({
      workspaceId: 'ws-1',
      dialogNode: 'welcome',
      conditions: 'welcome',
      output: { text: 'Hi' },
      nodeType: 'standard',
    });

    expect(lastRequest()).toMatchObject({
      method: 'POST',
      path: '/v1/workspaces/ws-1/dialog_nodes',
      body: '{"dialog_node":"welcome","conditions":"welcome","output":{"text":"Hi"},"type":"standard"}',
    });
    expect(node.nodeType).toBe('standard');
  });

  it('should keep node types it does not know', async () => {
    respond(200, { dialog_node: 'n1', type: 'folder' });

    const node = await useCase.get({ workspaceId: 'ws-1', dialogNode: 'n1' });

    expect(node.nodeType).toEqual({ unrecognized: 'folder' });
  });

  it('should decode node actions', async () => {
    respond(200, {
      dialog_node: 'n2',
      actions: [
        { name: 'lookup', type: 'server', parameters: { city: 'Austin' }, result_variable: 'context.result' },
      ],
    });

    const node = await useCase.get({ workspaceId: 'ws-1', dialogNode: 'n2' });

    expect(node.actions).toEqual([
      { name: 'lookup', actionType: 'server', parameters: { city: 'Austin' }, resultVariable: 'context.result' },
    ]);
  });

  it('should update a dialog node', async () => {
    respond(200, { dialog_node: 'welcome', title: 'Greeting' });

    await useCase.update({
      workspaceId: 'ws-1',
      dialogNode: 'welcome',
      changes: { title: 'Greeting', nextStep: { behavior: 'jump_to', dialogNode: 'menu', selector: 'condition' } },
    });

    expect(lastRequest()).toMatchObject({
      method: 'POST',
      path: '/v1/workspaces/ws-1/dialog_nodes/welcome',
      body: '{"next_step":{"behavior":"jump_to","dialog_node":"menu","selector":"condition"},"title":"Greeting"}',
    });
  });

  it('should delete a dialog node', async () => {
    respond(200, {});

    await useCase.delete({ workspaceId: 'ws-1', dialogNode: 'welcome' });

    expect(lastRequest()).toMatchObject({ method: 'DELETE', path: '/v1/workspaces/ws-1/dialog_nodes/welcome' });
  });
});
