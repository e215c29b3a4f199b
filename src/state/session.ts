import type { Logger } from "../config/logger";
import { maskPhone, normalizePhone } from "../utils/phone";
import { CorruptSessionError } from "./store/SessionStore";
import type { SessionRecord, SessionStoreAdapter, STAGES } from "./store/SessionStore";

export type Stage = (typeof STAGES)[number];
export type Session = SessionRecord;
export type PhotoRef = Session["photosBySubItem"][string][number];

export function newSession(conversationId: string, now = Date.now()): Session {
  return {
    conversationId: normalizePhone(conversationId),
    pointOfSale: "",
    containerCategory: "",
    subItems: [],
    currentSubItemIndex: 0,
    photosBySubItem: {},
    stage: "awaiting_point_of_sale",
    createdAt: now,
    updatedAt: now,
  };
}

/** Sub-item the user is currently photographing, if the session is in the photo loop. */
export function currentSubItem(session: Session): string | undefined {
  if (session.stage !== "awaiting_photos" && session.stage !== "awaiting_decision") return undefined;
  return session.subItems[session.currentSubItemIndex];
}

export function photosOf(session: Session, subItem: string): PhotoRef[] {
  return session.photosBySubItem[subItem] ?? [];
}

export function totalPhotos(session: Session): number {
  return session.subItems.reduce((sum, subItem) => sum + photosOf(session, subItem).length, 0);
}

/** Per-conversation session storage; the adapter decides where records live and when they expire. */
export class SessionStore {
  constructor(
    private readonly adapter: SessionStoreAdapter,
    private readonly ttlSeconds: number,
    private readonly logger: Logger
  ) {}

  /** A record that fails validation is dropped and the conversation starts without a session. */
  async get(conversationId: string): Promise<Session | undefined> {
    const key = normalizePhone(conversationId);
    try {
      const record = await this.adapter.get(key);
      return record ?? undefined;
    } catch (error) {
      if (!(error instanceof CorruptSessionError)) throw error;
      this.logger.warn({
        event: "SESSION_DISCARDED",
        phone: maskPhone(key),
        reason: error.message,
      }, `🧹 Dropping unreadable session for user(${maskPhone(key)})`);
      await this.adapter.delete(key);
      return undefined;
    }
  }

  async save(session: Session): Promise<Session> {
    const key = normalizePhone(session.conversationId);
    const next: Session = { ...session, conversationId: key, updatedAt: Date.now() };
    await this.adapter.set(key, next, this.ttlSeconds);
    return next;
  }

  async delete(conversationId: string): Promise<boolean> {
    return this.adapter.delete(normalizePhone(conversationId));
  }
}
