import { test } from "node:test";
import assert from "node:assert/strict";
import { decodeServiceAccount, escapeQueryValue, folderQuery } from "../src/storage/GoogleDriveAssetStore";
import { FatalAuthError } from "../src/utils/errors";

const credentials = { type: "service_account", client_email: "uploader@test-project.iam.gserviceaccount.com", private_key: "test-key" };

test("service account credentials decode from base64 or plain JSON", () => {
  const encoded = Buffer.from(JSON.stringify(credentials)).toString("base64");
  const expected = { client_email: credentials.client_email, private_key: "test-key" };

  assert.deepEqual(decodeServiceAccount(encoded), expected);
  assert.deepEqual(decodeServiceAccount(JSON.stringify(credentials)), expected);
});

test("unusable credentials are fatal", () => {
  const cases: Array<[string | undefined, string]> = [
    [undefined, "GOOGLE_SERVICE_ACCOUNT_JSON is not configured"],
    ["bm90IGpzb24=", "Service account credentials are not valid JSON"],
    [JSON.stringify({ client_email: "x@y" }), "Service account credentials lack client_email or private_key"],
  ];

  for (const [input, message] of cases) {
    assert.throws(() => decodeServiceAccount(input), (error: unknown) => error instanceof FatalAuthError && error.message === message);
  }
});

test("folder queries escape quotes and backslashes", () => {
  assert.equal(escapeQueryValue("D'ONOFRIO\\NORTE"), "D\\'ONOFRIO\\\\NORTE");
  assert.equal(
    folderQuery("D'ONOFRIO", "root-folder"),
    "name='D\\'ONOFRIO' and mimeType='application/vnd.google-apps.folder' and 'root-folder' in parents and trashed=false"
  );
});
