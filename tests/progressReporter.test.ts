import { test } from "node:test";
import assert from "node:assert/strict";
import { ProgressReporter } from "../src/upload/ProgressReporter";
import type { CompletedReport, UploadOutcome, UploadSummary } from "../src/upload/types";

const summary: UploadSummary = {
  pointOfSale: "Tienda Centro",
  container: "CAJA_A",
  folderName: "TIENDA_CENTRO",
  photosPerSubItem: [
    { subItem: "ACRILICO_2", count: 2 },
    { subItem: "ACRILICO_1", count: 1 },
  ],
  total: 3,
};

function outcome(fileName: string, status: UploadOutcome["status"]): UploadOutcome {
  return { fileName, subItem: "ACRILICO_2", ordinal: 1, status };
}

function completed(outcomes: UploadOutcome[]): CompletedReport {
  const succeeded = outcomes.filter((item) => item.status === "success").length;
  return { status: "completed", summary, folderId: "folder-1", outcomes, succeeded, failed: outcomes.length - succeeded };
}

test("the summary lists photos per sub-item", () => {
  assert.equal(
    new ProgressReporter().render({ type: "started", summary }),
    "📋 *RESUMEN DEL PROCESO*\n\n" +
      "📍 Punto de venta: Tienda Centro\n" +
      "📦 Caja: CAJA_A\n" +
      "📸 Total de fotos: 3\n\n" +
      "🧊 *Fotos por acrílico:*\n" +
      "  • ACRILICO 2: 2 foto(s)\n" +
      "  • ACRILICO 1: 1 foto(s)\n\n" +
      "⏳ Subiendo a Google Drive..."
  );
});

test("progress is reported every third photo and on the last", () => {
  const reporter = new ProgressReporter();
  const reported = (total: number) =>
    Array.from({ length: total }, (_, index) => index + 1).filter((position) => reporter.shouldReport(position, total));

  assert.deepEqual(reported(7), [1, 4, 7]);
  assert.deepEqual(reported(8), [1, 4, 7, 8]);
  assert.deepEqual(reported(1), [1]);
  assert.equal(
    reporter.render({ type: "progress", position: 4, total: 8, fileName: "x.jpg" }),
    "📤 Subiendo foto 4/8..."
  );
  assert.equal(reporter.render({ type: "progress", position: 2, total: 8, fileName: "x.jpg" }), undefined);
});

test("a cadence of one reports every photo", () => {
  const reporter = new ProgressReporter({ every: 1 });
  assert.deepEqual([1, 2, 3].map((position) => reporter.shouldReport(position, 3)), [true, true, true]);
});

test("outcome events stay silent", () => {
  assert.equal(new ProgressReporter().render({ type: "outcome", position: 1, outcome: outcome("a.jpg", "success") }), undefined);
});

test("a clean run gets the success message", () => {
  const report = completed([outcome("a.jpg", "success"), outcome("b.jpg", "success"), outcome("c.jpg", "success")]);
  assert.equal(
    new ProgressReporter().render({ type: "completed", report }),
    "🎉 *¡PROCESO COMPLETADO EXITOSAMENTE!*\n\n" +
      "✅ 3 fotos subidas correctamente\n" +
      "📁 Revisa tu Google Drive en la carpeta: TIENDA_CENTRO\n\n" +
      "¡Gracias por usar el bot! 😊"
  );
});

test("failures are listed up to the configured maximum", () => {
  const report = completed([outcome("a.jpg", "success"), outcome("b.jpg", "failed"), outcome("c.jpg", "failed")]);
  assert.equal(
    new ProgressReporter({ maxListedFailures: 1 }).render({ type: "completed", report }),
    "⚠️ *PROCESO COMPLETADO CON ADVERTENCIAS*\n\n" +
      "✅ 1 fotos subidas correctamente\n" +
      "❌ 2 fotos con errores\n" +
      "📁 Revisa tu Google Drive en la carpeta: TIENDA_CENTRO\n\n" +
      "Archivos con errores:\n• b.jpg\n… y 1 más"
  );
});

test("an aborted run asks for the administrator", () => {
  assert.equal(
    new ProgressReporter().render({
      type: "aborted",
      report: { status: "aborted", summary, reason: "GOOGLE_SERVICE_ACCOUNT_JSON is not configured", outcomes: [] },
    }),
    "❌ No se pudo conectar con Google Drive. Por favor, contacta al administrador."
  );
});
