import { test } from "node:test";
import assert from "node:assert/strict";
import type { WhatsAppMessage, WhatsAppWebhookBody } from "../src/types/whatsapp";
import { collectWebhookItems, normalizeMessage, toInboundEvent } from "../src/whatsapp/normalize";

const message = (patch: Partial<WhatsAppMessage>): WhatsAppMessage => ({
  id: "wamid.1",
  from: "573001234567",
  timestamp: "1700000000",
  type: "text",
  ...patch,
});

test("text messages become text or commands", () => {
  assert.deepEqual(normalizeMessage(message({ text: { body: "Tienda Centro" } })), {
    messageId: "wamid.1",
    from: "573001234567",
    timestamp: 1700000000000,
    event: { kind: "text", text: "Tienda Centro" },
  });
  assert.deepEqual(toInboundEvent(message({ text: { body: "/Start" } })), { kind: "command", command: "begin" });
});

test("images become photos", () => {
  assert.deepEqual(toInboundEvent(message({ type: "image", image: { id: "media-1", mime_type: "image/jpeg" } })), {
    kind: "photo",
    photo: { mediaId: "media-1", mimeType: "image/jpeg" },
  });
  assert.deepEqual(toInboundEvent(message({ type: "image", image: { id: "" } })), {
    kind: "unsupported",
    messageType: "image",
  });
});

test("button replies carry commands, list replies carry the chosen title", () => {
  const button = (id: string, title: string) =>
    toInboundEvent(message({ type: "interactive", interactive: { type: "button_reply", button_reply: { id, title } } }));

  assert.deepEqual(button("cmd:finalize", "✅ Finalizar"), { kind: "command", command: "finalize" });
  assert.deepEqual(button("other", "Hola"), { kind: "text", text: "Hola" });

  assert.deepEqual(
    toInboundEvent(message({ type: "interactive", interactive: { type: "list_reply", list_reply: { id: "choice:1", title: "CAJA B" } } })),
    { kind: "text", text: "CAJA B" }
  );
});

test("template quick replies use the payload first", () => {
  assert.deepEqual(toInboundEvent(message({ type: "button", button: { payload: "cmd:advance", text: "Siguiente" } })), {
    kind: "command",
    command: "advance",
  });
  assert.deepEqual(toInboundEvent(message({ type: "button", button: { text: "Sí" } })), { kind: "text", text: "Sí" });
});

test("other message types are unsupported", () => {
  assert.deepEqual(toInboundEvent(message({ type: "audio" })), { kind: "unsupported", messageType: "audio" });
});

test("a missing timestamp falls back to the receive time", () => {
  const before = Date.now();
  const normalized = normalizeMessage(message({ timestamp: undefined, from: "+57 300 123 4567" }));
  assert.ok(normalized.timestamp >= before);
  assert.equal(normalized.from, "573001234567");
});

test("collectWebhookItems flattens entries and skips incomplete messages", () => {
  const body: WhatsAppWebhookBody = {
    object: "whatsapp_business_account",
    entry: [
      {
        id: "waba-1",
        changes: [
          {
            field: "messages",
            value: {
              messaging_product: "whatsapp",
              messages: [message({ text: { body: "hola" } }), message({ id: "wamid.2", from: "" })],
              statuses: [{ id: "wamid.0", status: "delivered" }],
            },
          },
          { field: "messages" },
        ],
      },
      { id: "waba-2", changes: [{ value: { messages: [message({ id: "wamid.3", text: { body: "CAJA A" } })] } }] },
    ],
  };

  const { messages, statuses } = collectWebhookItems(body);
  assert.deepEqual(messages.map((item) => item.messageId), ["wamid.1", "wamid.3"]);
  assert.deepEqual(statuses, [{ id: "wamid.0", status: "delivered" }]);
  assert.deepEqual(collectWebhookItems(undefined), { messages: [], statuses: [] });
});
