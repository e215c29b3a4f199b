export type Command =
  | "begin"
  | "cancel"
  | "continue"
  | "advance"
  | "finalize"
  | "help"
  | "health";

export type OutboundMessage =
  | { kind: "text"; body: string }
  | { kind: "buttons"; body: string; buttons: Array<{ id: string; title: string }> }
  | { kind: "choices"; body: string; buttonLabel: string; choices: string[] };

/** Outbound side of the chat transport. */
export interface ChatOutbound {
  send(to: string, message: OutboundMessage): Promise<void>;
}

export type InboundEvent =
  | { kind: "command"; command: Command }
  | { kind: "text"; text: string }
  | { kind: "photo"; photo: { mediaId: string; mimeType?: string } }
  | { kind: "unsupported"; messageType: string };

const TEXT_COMMANDS = new Map<string, Command>([
  ["/start", "begin"],
  ["/inicio", "begin"],
  ["/cancelar", "cancel"],
  ["/cancel", "cancel"],
  ["/siguiente", "continue"],
  ["/acrilico", "advance"],
  ["/finalizar", "finalize"],
  ["/help", "help"],
  ["/ayuda", "help"],
  ["/health", "health"],
]);

export const BUTTON_PREFIX = "cmd:";

export const DECISION_BUTTONS: Array<{ id: string; title: string }> = [
  { id: `${BUTTON_PREFIX}continue`, title: "📸 Otra foto" },
  { id: `${BUTTON_PREFIX}advance`, title: "➡️ Siguiente" },
  { id: `${BUTTON_PREFIX}finalize`, title: "✅ Finalizar" },
];

function isCommand(value: string): value is Command {
  return ["begin", "cancel", "continue", "advance", "finalize", "help", "health"].includes(value);
}

/** "/Finalizar" → finalize; anything else is plain text. */
export function parseTextCommand(text: string): Command | undefined {
  const word = text.trim().split(/\s+/)[0]?.toLowerCase() ?? "";
  // Accent-insensitive so "/acrílico" works too
  const plain = word.normalize("NFD").replace(/[\u0300-\u036f]/g, "");
  return TEXT_COMMANDS.get(plain);
}

export function parseButtonCommand(id: string): Command | undefined {
  if (!id.startsWith(BUTTON_PREFIX)) return undefined;
  const command = id.slice(BUTTON_PREFIX.length);
  return isCommand(command) ? command : undefined;
}

export function textEvent(text: string): InboundEvent {
  const command = parseTextCommand(text);
  return command ? { kind: "command", command } : { kind: "text", text };
}
