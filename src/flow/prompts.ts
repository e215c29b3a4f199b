import {
  CONTAINER_CHOICES,
  MAX_PHOTOS_PER_SUB_ITEM,
  SUB_ITEM_COUNT,
  displaySubItem,
  subItemName,
} from "../inventory/catalog";
import { currentSubItem, photosOf } from "../state/session";
import type { Session } from "../state/session";
import { DECISION_BUTTONS } from "./commands";
import type { OutboundMessage } from "./commands";

const text = (body: string): OutboundMessage => ({ kind: "text", body });

function subItemRows(): string {
  const rows: string[] = [];
  for (let start = 1; start <= SUB_ITEM_COUNT; start += 3) {
    const row: string[] = [];
    for (let index = start; index < start + 3 && index <= SUB_ITEM_COUNT; index++) {
      row.push(displaySubItem(subItemName(index)));
    }
    rows.push(row.join(", "));
  }
  return rows.join("\n");
}

export const prompts = {
  greeting: () =>
    text("¡Hola! 👋\n\n📍 Ingrese el nombre del punto de venta:"),

  pointOfSale: () => text("📍 Ingrese el nombre del punto de venta:"),

  container: (): OutboundMessage => ({
    kind: "choices",
    body: "📦 Selecciona el tipo de caja:",
    buttonLabel: "Ver cajas",
    choices: [...CONTAINER_CHOICES],
  }),

  subItems: () =>
    text(
      "🧊 Selecciona los acrílicos (escribe los números separados por comas, ej: 1,2,4):\n\n" +
        subItemRows()
    ),

  sendPhotos: (subItem: string, position: number, total: number) =>
    text(
      `📸 Envía las fotos del ${subItem} (máximo ${MAX_PHOTOS_PER_SUB_ITEM} fotos).\n\n` +
        `📊 Progreso: Acrílico ${position} de ${total}`
    ),

  photoReceived: (subItem: string, count: number): OutboundMessage => ({
    kind: "buttons",
    body:
      `✅ Foto recibida (${count}/${MAX_PHOTOS_PER_SUB_ITEM} para ${subItem}).\n\n` +
      "Opciones:\n" +
      "• /Siguiente - Enviar otra foto del mismo acrílico\n" +
      "• /Acrilico - Pasar al siguiente acrílico\n" +
      "• /finalizar - Guardar todo en Google Drive",
    buttons: DECISION_BUTTONS,
  }),

  anotherPhoto: (subItem: string, count: number) =>
    text(`📸 Puedes enviar otra foto del ${subItem} (${count}/${MAX_PHOTOS_PER_SUB_ITEM}).`),

  allSubItemsDone: () => text("✅ Has completado todos los acrílicos. Finalizando automáticamente..."),

  cancelled: () => text("❌ Proceso cancelado. Puedes iniciar nuevamente con /start."),

  nothingToCancel: () => text("ℹ️ No hay ningún proceso en curso. Envía /start para comenzar."),

  noSession: () => text("👋 Envía /start para registrar las fotos de un punto de venta."),

  alreadyRunning: () =>
    text("ℹ️ Ya tienes un proceso en curso. Continúa donde quedaste o usa /cancelar para empezar de nuevo."),

  invalidPointOfSale: () => text("⚠️ El nombre del punto de venta no puede estar vacío."),

  pointOfSaleAsText: () => text("✍️ Escribe el nombre del punto de venta como mensaje de texto."),

  invalidContainer: () => text("⚠️ Opción inválida. Elige una de las cajas de la lista."),

  invalidSubItems: () =>
    text(
      "⚠️ Entrada inválida. Por favor, escribe los números de los acrílicos " +
        "separados por comas (ej: 1,2,3)."
    ),

  expectingPhoto: () => text("⚠️ Envía una foto para continuar."),

  expectingDecision: () => text("⚠️ Elige una opción para continuar."),

  photoLimitReached: (subItem: string) =>
    text(`⚠️ Ya has enviado el máximo de ${MAX_PHOTOS_PER_SUB_ITEM} fotos para ${subItem}.`),

  continueBlocked: () =>
    text(
      `🚫 Ya has alcanzado el límite de ${MAX_PHOTOS_PER_SUB_ITEM} fotos para este acrílico. ` +
        "Usa /Acrilico o /finalizar."
    ),

  help: () =>
    text(
      "🤖 *GUÍA DE USO DEL BOT*\n\n" +
        "*Comandos disponibles:*\n" +
        "• /start - Iniciar proceso de subida\n" +
        "• /health - Verificar estado del bot\n" +
        "• /help - Mostrar esta ayuda\n" +
        "• /cancelar - Cancelar proceso actual\n\n" +
        "*Durante el proceso:*\n" +
        "• /Siguiente - Enviar otra foto del mismo acrílico\n" +
        "• /Acrilico - Cambiar al siguiente acrílico\n" +
        "• /finalizar - Guardar todo en Google Drive\n\n" +
        "*Flujo del proceso:*\n" +
        "1️⃣ Nombre del punto de venta\n" +
        "2️⃣ Seleccionar tipo de caja\n" +
        "3️⃣ Elegir acrílicos (números separados por comas)\n" +
        `4️⃣ Enviar fotos (máx. ${MAX_PHOTOS_PER_SUB_ITEM} por acrílico)\n` +
        "5️⃣ Subida automática a Google Drive\n\n" +
        "¿Necesitas ayuda? Contacta al administrador."
    ),

  health: (activeStage?: string) =>
    text(
      "🟢 *Bot funcionando correctamente!*\n\n" +
        "☁️ Destino: Google Drive\n" +
        `📊 Tu proceso: ${activeStage ?? "sin proceso activo"}`
    ),
};

/** The prompt that asks for whatever the session's current stage expects. */
export function promptForStage(session: Session): OutboundMessage | undefined {
  switch (session.stage) {
    case "awaiting_point_of_sale":
      return prompts.pointOfSale();
    case "awaiting_container":
      return prompts.container();
    case "awaiting_sub_items":
      return prompts.subItems();
    case "awaiting_photos": {
      const subItem = currentSubItem(session) ?? "";
      return prompts.sendPhotos(subItem, session.currentSubItemIndex + 1, session.subItems.length);
    }
    case "awaiting_decision": {
      const subItem = currentSubItem(session) ?? "";
      return prompts.photoReceived(subItem, photosOf(session, subItem).length);
    }
    case "done":
      return undefined;
  }
}
