import type { MessageRequest, MessageResponse } from '../../domain/entities/Message.js';
import { jsonBody } from '../../infrastructure/http/RequestBuilder.js';
import { messageRequestSchema, messageResponseSchema } from '../../infrastructure/mappers/index.js';
import { ResourceUseCase } from './ResourceUseCase.js';
import type { WorkspaceInput } from './ManageWorkspaces.js';

const MESSAGE_PATH = '/v1/workspaces/{workspace_id}/message';

export interface SendMessageInput extends WorkspaceInput, MessageRequest {
  /** Shorthand for `input: { text }`, ignored when `input` is set */
  text?: string;
}

/**
 * Use case for sending one user turn to a workspace.
 *
 * To continue a conversation, pass the `context` of the previous response
 * with the next message.
 */
export class SendMessage extends ResourceUseCase {
  async execute(input: SendMessageInput): Promise<MessageResponse> {
    const { workspaceId, text, ...fields } = input;
    const request: MessageRequest =
      fields.input === undefined && text !== undefined ? { ...fields, input: { text } } : fields;

    return this.run(
      'message',
      { workspaceId, conversationId: request.context?.conversationId },
      async () => {
        const response = await this.rest.requestObject(
          {
            method: 'POST',
            path: MESSAGE_PATH,
            pathParams: { workspace_id: workspaceId },
            body: jsonBody(request, messageRequestSchema),
          },
          messageResponseSchema
        );

        this.logger.debug('Message processed', {
          conversationId: response.context.conversationId,
          intents: response.intents.map((intent) => intent.intent),
        });

        return response;
      }
    );
  }
}
