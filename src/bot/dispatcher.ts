import type { Logger } from "../config/logger";
import type { ChatOutbound, OutboundMessage } from "../flow/commands";
import type { CollectionStateMachine, Transition } from "../flow/stateMachine";
import type { Session, SessionStore } from "../state/session";
import type { ProgressReporter } from "../upload/ProgressReporter";
import type { UploadPipeline } from "../upload/UploadPipeline";
import type { FinalizeReport } from "../upload/types";
import type { InboundMessage } from "../whatsapp/normalize";
import { describeError } from "../utils/errors";
import { maskPhone } from "../utils/phone";

export interface DispatcherDeps {
  sessions: SessionStore;
  machine: CollectionStateMachine;
  outbound: ChatOutbound;
  pipeline: UploadPipeline;
  reporter: ProgressReporter;
  logger: Logger;
}

/**
 * Applies inbound messages to their conversation one at a time. Different
 * conversations proceed independently; messages of the same conversation are
 * chained so a burst of photos never races on the stored session.
 */
export class ConversationDispatcher {
  private readonly queues = new Map<string, Promise<void>>();

  constructor(private readonly deps: DispatcherDeps) {}

  /** Resolves once this message (and everything queued before it) has been handled. Never rejects. */
  dispatch(message: InboundMessage): Promise<void> {
    const key = message.from;
    const previous = this.queues.get(key) ?? Promise.resolve();
    const next = previous
      .then(() => this.process(message))
      .catch((error: unknown) => {
        this.deps.logger.error({
          event: 'DISPATCH_FAILED',
          phone: maskPhone(key),
          messageId: message.messageId,
          error: describeError(error),
          stack: error instanceof Error ? error.stack : undefined,
        }, `💥 Failed to handle message ${message.messageId}: ${describeError(error)}`);
      });

    this.queues.set(key, next);
    void next.then(() => {
      if (this.queues.get(key) === next) this.queues.delete(key);
    });
    return next;
  }

  /** Waits for every queued message. */
  async drain(): Promise<void> {
    while (this.queues.size > 0) {
      await Promise.all([...this.queues.values()]);
    }
  }

  pending(): number {
    return this.queues.size;
  }

  private async process(message: InboundMessage): Promise<void> {
    const { sessions, machine, logger } = this.deps;
    const conversationId = message.from;
    const session = await sessions.get(conversationId);
    const transition = machine.handle(conversationId, session, message.event);

    this.logTransition(message, session, transition);

    switch (transition.effect) {
      case "persist":
        if (transition.session) await sessions.save(transition.session);
        await this.reply(conversationId, transition.replies);
        return;
      case "discard":
        await sessions.delete(conversationId);
        await this.reply(conversationId, transition.replies);
        return;
      case "finalize":
        await this.reply(conversationId, transition.replies);
        if (transition.session) {
          await this.finalize(conversationId, transition.session);
        } else {
          await sessions.delete(conversationId);
        }
        return;
      case "none":
        await this.reply(conversationId, transition.replies);
        return;
      default:
        logger.warn({ effect: transition.effect }, "Unknown transition effect");
    }
  }

  /** Runs the upload and streams the reporter's messages; the session is gone afterwards whatever happened. */
  private async finalize(conversationId: string, session: Session): Promise<FinalizeReport> {
    const { pipeline, reporter, outbound, sessions } = this.deps;
    try {
      return await pipeline.run(session, async (event) => {
        const body = reporter.render(event);
        if (body !== undefined) await outbound.send(conversationId, { kind: "text", body });
      });
    } finally {
      await sessions.delete(conversationId);
    }
  }

  /** Sends replies in order; one that fails is logged and the rest still go out. */
  private async reply(conversationId: string, replies: OutboundMessage[]): Promise<void> {
    for (const message of replies) {
      try {
        await this.deps.outbound.send(conversationId, message);
      } catch (error) {
        this.deps.logger.error({
          event: 'REPLY_SEND_FAILED',
          phone: maskPhone(conversationId),
          kind: message.kind,
          error: describeError(error),
        }, `❌ Could not reply to user(${maskPhone(conversationId)}): ${describeError(error)}`);
      }
    }
  }

  private logTransition(message: InboundMessage, before: Session | undefined, transition: Transition): void {
    const from = before?.stage ?? "none";
    const to = transition.effect === "discard" ? "none" : transition.session?.stage ?? from;

    if (transition.rejection) {
      this.deps.logger.warn({
        event: 'INPUT_REJECTED',
        phone: maskPhone(message.from),
        messageId: message.messageId,
        stage: from,
        trigger: transition.trigger,
        reason: transition.rejection.message,
      }, `⚠️ INPUT_REJECTED: ${from} | ${transition.trigger} | ${transition.rejection.message}`);
    }

    this.deps.logger.info({
      event: 'STATE_TRANSITION',
      phone: maskPhone(message.from),
      messageId: message.messageId,
      fromState: from,
      toState: to,
      trigger: transition.trigger,
      effect: transition.effect,
    }, `🔄 STATE_TRANSITION: ${from} → ${to} | Trigger: ${transition.trigger}`);
  }
}
