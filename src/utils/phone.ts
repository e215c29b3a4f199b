/**
 * WhatsApp ids are the sender's full international number. Strip the leading +
 * and any separators so the same person always maps to the same session key,
 * while keeping every digit needed to reply.
 */
export function normalizePhone(raw: string): string {
  if (!raw) return "";
  return raw.replace(/^\+/, "").replace(/[^\d]/g, "");
}

/** 57300*****67 for logs. */
export function maskPhone(phone: string): string {
  if (phone.length <= 4) return "****";
  return `${phone.slice(0, 5)}${"*".repeat(Math.max(2, phone.length - 7))}${phone.slice(-2)}`;
}
