import { displaySubItem } from "../inventory/catalog";
import type { CompletedReport, PipelineEvent, UploadSummary } from "./types";

export interface ProgressReporterOptions {
  /** Progress text for positions 1, 1+every, 1+2·every, … and the last one. */
  every?: number;
  /** Failed file names listed in the warning message. */
  maxListedFailures?: number;
}

/**
 * Turns pipeline events into chat text. Holds configuration only, so the same
 * reporter serves every conversation.
 */
export class ProgressReporter {
  private readonly every: number;
  private readonly maxListedFailures: number;

  constructor(options: ProgressReporterOptions = {}) {
    this.every = Math.max(1, Math.floor(options.every ?? 3));
    this.maxListedFailures = options.maxListedFailures ?? 10;
  }

  /** Text to send for this event, or undefined when the event is not worth a message. */
  render(event: PipelineEvent): string | undefined {
    switch (event.type) {
      case "started":
        return this.summary(event.summary);
      case "progress":
        return this.shouldReport(event.position, event.total)
          ? `📤 Subiendo foto ${event.position}/${event.total}...`
          : undefined;
      case "outcome":
        return undefined;
      case "completed":
        return this.completed(event.report);
      case "aborted":
        return this.aborted();
    }
  }

  shouldReport(position: number, total: number): boolean {
    return position % this.every === 1 % this.every || position === total;
  }

  private summary(summary: UploadSummary): string {
    const perSubItem = summary.photosPerSubItem
      .map(({ subItem, count }) => `  • ${displaySubItem(subItem)}: ${count} foto(s)`)
      .join("\n");

    return (
      "📋 *RESUMEN DEL PROCESO*\n\n" +
      `📍 Punto de venta: ${summary.pointOfSale}\n` +
      `📦 Caja: ${summary.container}\n` +
      `📸 Total de fotos: ${summary.total}\n\n` +
      `🧊 *Fotos por acrílico:*\n${perSubItem}\n\n` +
      "⏳ Subiendo a Google Drive..."
    );
  }

  private completed(report: CompletedReport): string {
    const folder = report.summary.folderName;
    if (report.failed === 0) {
      return (
        "🎉 *¡PROCESO COMPLETADO EXITOSAMENTE!*\n\n" +
        `✅ ${report.succeeded} fotos subidas correctamente\n` +
        `📁 Revisa tu Google Drive en la carpeta: ${folder}\n\n` +
        "¡Gracias por usar el bot! 😊"
      );
    }

    const failedNames = report.outcomes
      .filter((outcome) => outcome.status === "failed")
      .map((outcome) => `• ${outcome.fileName}`);
    const listed = failedNames.slice(0, this.maxListedFailures);
    const more = failedNames.length - listed.length;

    return (
      "⚠️ *PROCESO COMPLETADO CON ADVERTENCIAS*\n\n" +
      `✅ ${report.succeeded} fotos subidas correctamente\n` +
      `❌ ${report.failed} fotos con errores\n` +
      `📁 Revisa tu Google Drive en la carpeta: ${folder}\n\n` +
      `Archivos con errores:\n${listed.join("\n")}` +
      (more > 0 ? `\n… y ${more} más` : "")
    );
  }

  private aborted(): string {
    return "❌ No se pudo conectar con Google Drive. Por favor, contacta al administrador.";
  }
}
