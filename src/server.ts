import express from "express";
import type { Express, NextFunction, Request, Response } from "express";
import type { Logger } from "./config/logger";
import type { ConversationDispatcher } from "./bot/dispatcher";
import type { WhatsAppWebhookBody } from "./types/whatsapp";
import { ExpiringSet } from "./utils/cache";
import { describeError } from "./utils/errors";
import { maskPhone } from "./utils/phone";
import { collectWebhookItems } from "./whatsapp/normalize";
import { verifySignature } from "./whatsapp/signature";

type RawRequest = Request & { rawBody?: Buffer };

export interface AppDeps {
  verifyToken: string;
  appSecret?: string;
  dispatcher: Pick<ConversationDispatcher, "dispatch">;
  logger: Logger;
  /** Message ids already accepted; redeliveries are dropped. */
  seen?: ExpiringSet;
}

export function createApp({ verifyToken, appSecret, dispatcher, logger, seen = new ExpiringSet() }: AppDeps): Express {
  const app = express();

  app.use(express.raw({ type: "application/json" }));
  app.use((req: RawRequest, res: Response, next: NextFunction) => {
    if (req.method === "POST" && Buffer.isBuffer(req.body)) {
      req.rawBody = req.body;
      try {
        req.body = JSON.parse(req.body.toString("utf8"));
      } catch (error) {
        logger.warn({ error: describeError(error) }, "❌ Webhook body is not valid JSON");
        res.sendStatus(400);
        return;
      }
    }
    next();
  });

  /** ---- Health endpoints + Webhook verify ---- */
  app.get("/healthz", (_req, res) => res.status(200).json({ ok: true, ts: Date.now() }));
  app.get("/whatsapp/webhook", (req, res) => {
    const mode = req.query["hub.mode"];
    const token = req.query["hub.verify_token"];
    const challenge = req.query["hub.challenge"];
    if (mode === "subscribe" && token === verifyToken) return res.status(200).send(String(challenge ?? ""));
    return res.sendStatus(403);
  });

  app.post("/whatsapp/webhook", (req: RawRequest, res: Response) => {
    logger.debug({ bodySize: req.rawBody?.length }, `🔄 Webhook POST received`);

    if (!verifySignature(req.rawBody, req.get("x-hub-signature-256"), appSecret)) {
      logger.warn({ signature: req.get("x-hub-signature-256") }, "❌ Signature verification failed");
      res.sendStatus(401);
      return;
    }

    // Cloud API retries anything not acknowledged quickly, so answer before the work
    res.sendStatus(200);

    try {
      const body: WhatsAppWebhookBody | undefined = req.body;
      const { messages, statuses } = collectWebhookItems(body);

      for (const status of statuses) {
        logger.debug({ status: status.status, messageId: status.id }, `📊 Status update: ${status.status}`);
      }

      for (const message of messages) {
        if (!seen.add(message.messageId)) {
          logger.debug({ event: 'DUPLICATE_MESSAGE', messageId: message.messageId }, `🔁 Skipping redelivered message ${message.messageId}`);
          continue;
        }

        logger.info({
          event: 'MESSAGE_RECEIVED',
          phone: maskPhone(message.from),
          messageId: message.messageId,
          eventKind: message.event.kind,
          timestamp: new Date(message.timestamp).toISOString(),
        }, `💬 Received ${message.event.kind} message: user(${maskPhone(message.from)}) | MsgId: ${message.messageId}`);

        void dispatcher.dispatch(message);
      }
    } catch (err) {
      logger.error({
        error: describeError(err),
        stack: err instanceof Error ? err.stack : undefined,
      }, `💥 Critical webhook processing error: ${describeError(err)}`);
    }
  });

  return app;
}
