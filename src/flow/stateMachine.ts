import { MAX_PHOTOS_PER_SUB_ITEM, matchContainer, parseSubItemSelection } from "../inventory/catalog";
import { currentSubItem, newSession, photosOf } from "../state/session";
import type { Session, Stage } from "../state/session";
import { CapacityError, InputValidationError } from "../utils/errors";
import type { Command, InboundEvent, OutboundMessage } from "./commands";
import { promptForStage, prompts } from "./prompts";

/**
 * What the dispatcher must do after a transition:
 * - none: nothing to store (no session, or the input was rejected)
 * - persist: save `session`
 * - finalize: `session` is complete, run the upload and then drop it
 * - discard: drop the stored session
 */
export type Effect = "none" | "persist" | "finalize" | "discard";

export interface Transition {
  effect: Effect;
  session?: Session;
  replies: OutboundMessage[];
  trigger: string;
  rejection?: InputValidationError | CapacityError;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled value: ${JSON.stringify(value)}`);
}

const reject = (
  trigger: string,
  rejection: InputValidationError | CapacityError,
  ...replies: Array<OutboundMessage | undefined>
): Transition => ({
  effect: "none",
  trigger,
  rejection,
  replies: replies.filter((reply): reply is OutboundMessage => reply !== undefined),
});

const stay = (trigger: string, ...replies: OutboundMessage[]): Transition => ({ effect: "none", trigger, replies });

function advanceTo(session: Session, stage: Stage, patch: Partial<Session> = {}): Session {
  return { ...session, ...patch, stage };
}

/**
 * Drives one conversation through point of sale → container → sub-items → photo loop.
 * Never mutates its input: a rejected event leaves the caller's session exactly as it was.
 */
export class CollectionStateMachine {
  handle(conversationId: string, session: Session | undefined, event: InboundEvent, now = Date.now()): Transition {
    if (event.kind === "command") {
      const global = this.handleGlobalCommand(conversationId, session, event.command, now);
      if (global) return global;
    }

    if (!session || session.stage === "done") {
      return stay(`${event.kind}_without_session`, prompts.noSession());
    }

    switch (session.stage) {
      case "awaiting_point_of_sale":
        return this.onPointOfSale(session, event);
      case "awaiting_container":
        return this.onContainer(session, event);
      case "awaiting_sub_items":
        return this.onSubItems(session, event);
      case "awaiting_photos":
        return this.onPhoto(session, event);
      case "awaiting_decision":
        return this.onDecision(session, event);
      default:
        return assertNever(session.stage);
    }
  }

  /** Commands that behave the same in every stage. */
  private handleGlobalCommand(
    conversationId: string,
    session: Session | undefined,
    command: Command,
    now: number
  ): Transition | undefined {
    const active = session && session.stage !== "done" ? session : undefined;

    switch (command) {
      case "begin":
        if (active) {
          const prompt = promptForStage(active);
          return stay("begin_while_active", prompts.alreadyRunning(), ...(prompt ? [prompt] : []));
        }
        return {
          effect: "persist",
          trigger: "begin",
          session: newSession(conversationId, now),
          replies: [prompts.greeting()],
        };
      case "cancel":
        if (!active) return stay("cancel_without_session", prompts.nothingToCancel());
        return { effect: "discard", trigger: "cancel", replies: [prompts.cancelled()] };
      case "help":
        return stay("help", prompts.help());
      case "health":
        return stay("health", prompts.health(active?.stage));
      case "continue":
      case "advance":
      case "finalize":
        return undefined;
      default:
        return assertNever(command);
    }
  }

  private onPointOfSale(session: Session, event: InboundEvent): Transition {
    if (event.kind !== "text") {
      return reject(
        "expected_point_of_sale_text",
        new InputValidationError(`Point of sale must be sent as text, got ${event.kind}`),
        prompts.pointOfSaleAsText()
      );
    }

    const value = event.text.trim();
    if (!value) {
      return reject(
        "invalid_point_of_sale",
        new InputValidationError("Point of sale must be non-empty text"),
        prompts.invalidPointOfSale(),
        prompts.pointOfSale()
      );
    }

    return {
      effect: "persist",
      trigger: "point_of_sale_received",
      session: advanceTo(session, "awaiting_container", { pointOfSale: value }),
      replies: [prompts.container()],
    };
  }

  private onContainer(session: Session, event: InboundEvent): Transition {
    const container = event.kind === "text" ? matchContainer(event.text) : undefined;
    if (!container) {
      return reject(
        "invalid_container",
        new InputValidationError("Container is not one of the offered choices"),
        prompts.invalidContainer(),
        prompts.container()
      );
    }

    return {
      effect: "persist",
      trigger: "container_selected",
      session: advanceTo(session, "awaiting_sub_items", { containerCategory: container }),
      replies: [prompts.subItems()],
    };
  }

  private onSubItems(session: Session, event: InboundEvent): Transition {
    if (event.kind !== "text") {
      return reject(
        "invalid_sub_items",
        new InputValidationError("Expected a comma-separated list of numbers"),
        prompts.invalidSubItems()
      );
    }

    let subItems: string[];
    try {
      subItems = parseSubItemSelection(event.text);
    } catch (error) {
      if (!(error instanceof InputValidationError)) throw error;
      return reject("invalid_sub_items", error, prompts.invalidSubItems());
    }

    const photosBySubItem: Session["photosBySubItem"] = {};
    for (const subItem of subItems) photosBySubItem[subItem] = [];

    const next = advanceTo(session, "awaiting_photos", {
      subItems,
      photosBySubItem,
      currentSubItemIndex: 0,
    });
    return {
      effect: "persist",
      trigger: "sub_items_selected",
      session: next,
      replies: [prompts.sendPhotos(subItems[0] ?? "", 1, subItems.length)],
    };
  }

  private onPhoto(session: Session, event: InboundEvent): Transition {
    const subItem = currentSubItem(session) ?? "";
    if (event.kind !== "photo") {
      return reject(
        "expected_photo",
        new InputValidationError("Expected a photo"),
        prompts.expectingPhoto(),
        promptForStage(session)
      );
    }

    const photos = photosOf(session, subItem);
    if (photos.length >= MAX_PHOTOS_PER_SUB_ITEM) {
      return {
        effect: "persist",
        trigger: "photo_limit_reached",
        rejection: new CapacityError(subItem, MAX_PHOTOS_PER_SUB_ITEM),
        session: advanceTo(session, "awaiting_decision"),
        replies: [prompts.photoLimitReached(subItem), prompts.photoReceived(subItem, photos.length)],
      };
    }

    const appended = [
      ...photos,
      { mediaId: event.photo.mediaId, mimeType: event.photo.mimeType, ordinal: photos.length + 1 },
    ];
    return {
      effect: "persist",
      trigger: "photo_received",
      session: advanceTo(session, "awaiting_decision", {
        photosBySubItem: { ...session.photosBySubItem, [subItem]: appended },
      }),
      replies: [prompts.photoReceived(subItem, appended.length)],
    };
  }

  private onDecision(session: Session, event: InboundEvent): Transition {
    const subItem = currentSubItem(session) ?? "";
    if (event.kind !== "command") {
      return reject(
        "expected_decision",
        new InputValidationError("Expected continue, next category or finalize"),
        prompts.expectingDecision(),
        promptForStage(session)
      );
    }

    switch (event.command) {
      case "continue": {
        const count = photosOf(session, subItem).length;
        if (count >= MAX_PHOTOS_PER_SUB_ITEM) {
          return reject(
            "continue_at_capacity",
            new CapacityError(subItem, MAX_PHOTOS_PER_SUB_ITEM),
            prompts.continueBlocked()
          );
        }
        return {
          effect: "persist",
          trigger: "continue_same_category",
          session: advanceTo(session, "awaiting_photos"),
          replies: [prompts.anotherPhoto(subItem, count)],
        };
      }
      case "advance": {
        const nextIndex = session.currentSubItemIndex + 1;
        if (nextIndex >= session.subItems.length) {
          return {
            effect: "finalize",
            trigger: "advance_past_last",
            session: advanceTo(session, "done"),
            replies: [prompts.allSubItemsDone()],
          };
        }
        return {
          effect: "persist",
          trigger: "advance_category",
          session: advanceTo(session, "awaiting_photos", { currentSubItemIndex: nextIndex }),
          replies: [prompts.sendPhotos(session.subItems[nextIndex] ?? "", nextIndex + 1, session.subItems.length)],
        };
      }
      case "finalize":
        return { effect: "finalize", trigger: "finalize", session: advanceTo(session, "done"), replies: [] };
      default:
        return reject(
          "expected_decision",
          new InputValidationError(`Command ${event.command} is not valid here`),
          prompts.expectingDecision(),
          promptForStage(session)
        );
    }
  }
}
