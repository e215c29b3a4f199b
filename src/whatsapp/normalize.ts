import { parseButtonCommand, textEvent } from "../flow/commands";
import type { InboundEvent } from "../flow/commands";
import type { WhatsAppMessage, WhatsAppStatus, WhatsAppWebhookBody } from "../types/whatsapp";
import { normalizePhone } from "../utils/phone";

export interface InboundMessage {
  messageId: string;
  from: string;
  timestamp: number;
  event: InboundEvent;
}

/** Maps one Cloud API message onto the events the state machine understands. */
export function toInboundEvent(raw: WhatsAppMessage): InboundEvent {
  switch (raw.type) {
    case "text":
      return textEvent(raw.text?.body ?? "");
    case "image":
      if (!raw.image?.id) return { kind: "unsupported", messageType: raw.type };
      return { kind: "photo", photo: { mediaId: raw.image.id, mimeType: raw.image.mime_type } };
    case "interactive": {
      const button = raw.interactive?.button_reply;
      if (button) {
        const command = parseButtonCommand(button.id);
        return command ? { kind: "command", command } : textEvent(button.title);
      }
      // List pickers answer with the chosen row's title
      const row = raw.interactive?.list_reply;
      if (row) return { kind: "text", text: row.title };
      return { kind: "unsupported", messageType: raw.type };
    }
    case "button": {
      // Template quick replies
      const command = raw.button?.payload ? parseButtonCommand(raw.button.payload) : undefined;
      if (command) return { kind: "command", command };
      return raw.button?.text ? textEvent(raw.button.text) : { kind: "unsupported", messageType: raw.type };
    }
    default:
      return { kind: "unsupported", messageType: raw.type };
  }
}

export function normalizeMessage(raw: WhatsAppMessage): InboundMessage {
  const seconds = Number(raw.timestamp);
  return {
    messageId: raw.id,
    from: normalizePhone(raw.from),
    timestamp: Number.isFinite(seconds) && seconds > 0 ? seconds * 1000 : Date.now(),
    event: toInboundEvent(raw),
  };
}

/** Flattens entry → changes → value into messages and delivery statuses. */
export function collectWebhookItems(body: WhatsAppWebhookBody | undefined): {
  messages: InboundMessage[];
  statuses: WhatsAppStatus[];
} {
  const messages: InboundMessage[] = [];
  const statuses: WhatsAppStatus[] = [];

  for (const entry of body?.entry ?? []) {
    for (const change of entry?.changes ?? []) {
      const value = change?.value;
      if (!value) continue;
      statuses.push(...(value.statuses ?? []));
      for (const raw of value.messages ?? []) {
        if (!raw?.id || !raw.from) continue;
        messages.push(normalizeMessage(raw));
      }
    }
  }

  return { messages, statuses };
}
