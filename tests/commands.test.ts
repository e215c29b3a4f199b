import { test } from "node:test";
import assert from "node:assert/strict";
import { DECISION_BUTTONS, parseButtonCommand, parseTextCommand, textEvent } from "../src/flow/commands";

test("text commands are case and accent insensitive", () => {
  assert.equal(parseTextCommand("/start"), "begin");
  assert.equal(parseTextCommand("/Finalizar"), "finalize");
  assert.equal(parseTextCommand("/acrílico"), "advance");
  assert.equal(parseTextCommand("/Acrilico"), "advance");
  assert.equal(parseTextCommand("  /ayuda"), "help");
  assert.equal(parseTextCommand("/Siguiente por favor"), "continue");
});

test("anything else is plain text", () => {
  assert.equal(parseTextCommand("hola"), undefined);
  assert.equal(parseTextCommand("/constructor"), undefined);
  assert.equal(parseTextCommand(""), undefined);
});

test("button ids map back to commands", () => {
  assert.equal(parseButtonCommand("cmd:advance"), "advance");
  assert.equal(parseButtonCommand("cmd:unknown"), undefined);
  assert.equal(parseButtonCommand("advance"), undefined);

  for (const button of DECISION_BUTTONS) {
    assert.ok(parseButtonCommand(button.id), button.id);
    assert.ok(button.title.length <= 20, button.title);
  }
});

test("textEvent separates commands from free text", () => {
  assert.deepEqual(textEvent("Tienda Centro"), { kind: "text", text: "Tienda Centro" });
  assert.deepEqual(textEvent("/cancelar"), { kind: "command", command: "cancel" });
});
