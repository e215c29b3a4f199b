import type { AxiosInstance } from "axios";
import type { Logger } from "../config/logger";
import type { ChatOutbound, OutboundMessage } from "../flow/commands";
import type { AnyObject } from "../types/whatsapp";
import { describeError, extractErrorDetails } from "../utils/errors";
import { maskPhone } from "../utils/phone";

// Cloud API limits for interactive messages
const MAX_BUTTONS = 3;
const MAX_BUTTON_TITLE = 20;
const MAX_LIST_ROWS = 10;
const MAX_ROW_TITLE = 24;

/** Cloud API payload for one outbound message. */
export function buildMessagePayload(to: string, message: OutboundMessage): AnyObject {
  switch (message.kind) {
    case "text":
      return {
        messaging_product: "whatsapp",
        to,
        type: "text",
        text: { body: message.body },
      };
    case "buttons":
      return {
        messaging_product: "whatsapp",
        to,
        type: "interactive",
        interactive: {
          type: "button",
          body: { text: message.body },
          action: {
            buttons: message.buttons.slice(0, MAX_BUTTONS).map((b) => ({
              type: "reply",
              reply: { id: b.id, title: b.title.slice(0, MAX_BUTTON_TITLE) },
            })),
          },
        },
      };
    case "choices":
      return {
        messaging_product: "whatsapp",
        to,
        type: "interactive",
        interactive: {
          type: "list",
          body: { text: message.body },
          action: {
            button: message.buttonLabel.slice(0, MAX_BUTTON_TITLE),
            sections: [
              {
                title: "Opciones",
                rows: message.choices.slice(0, MAX_LIST_ROWS).map((choice, index) => ({
                  id: `choice:${index}`,
                  title: choice.slice(0, MAX_ROW_TITLE),
                })),
              },
            ],
          },
        },
      };
  }
}

export class WhatsAppClient implements ChatOutbound {
  constructor(
    private readonly graph: AxiosInstance,
    private readonly phoneNumberId: string,
    private readonly logger: Logger
  ) {}

  async send(to: string, message: OutboundMessage): Promise<void> {
    await this.graphSend(buildMessagePayload(to, message), message);
  }

  private async graphSend(payload: AnyObject, message: OutboundMessage): Promise<void> {
    const to = String(payload.to);
    this.logger.debug({
      to: maskPhone(to),
      kind: message.kind,
      payload_size: JSON.stringify(payload).length,
    }, `📤 Sending ${message.kind} message: bot(${this.phoneNumberId}) → user(${maskPhone(to)})`);

    try {
      const { data } = await this.graph.post<{ messages?: Array<{ id?: string }> }>(
        `/${this.phoneNumberId}/messages`,
        payload
      );
      const messageId = data?.messages?.[0]?.id;

      this.logger.info({
        event: 'MESSAGE_SENT',
        messageId,
        to: maskPhone(to),
        kind: message.kind,
        textContent: message.body,
      }, `✅ Message sent: bot(${this.phoneNumberId}) → user(${maskPhone(to)}) | Type: ${message.kind} | ID: ${messageId}`);
    } catch (error: unknown) {
      this.logger.error({
        event: 'MESSAGE_SEND_FAILED',
        to: maskPhone(to),
        kind: message.kind,
        error: extractErrorDetails(error),
      }, `❌ Failed to send ${message.kind} message to user(${maskPhone(to)}): ${describeError(error)}`);
      throw error;
    }
  }
}
