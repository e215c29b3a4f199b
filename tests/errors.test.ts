import { test } from "node:test";
import assert from "node:assert/strict";
import {
  CapacityError,
  FatalAuthError,
  TransientBackendError,
  classifyDriveError,
  describeError,
  extractErrorDetails,
} from "../src/utils/errors";

function httpError(message: string, response: Record<string, unknown>): Error {
  return Object.assign(new Error(message), { response });
}

test("extractErrorDetails reads the Google error envelope", () => {
  const details = extractErrorDetails(
    httpError("Request failed", {
      status: 403,
      statusText: "Forbidden",
      data: { error: { message: "Insufficient permissions", errors: [{ reason: "insufficientFilePermissions" }] } },
    })
  );

  assert.equal(details.status, 403);
  assert.equal(details.statusText, "Forbidden");
  assert.equal(details.message, "Insufficient permissions");
  assert.equal(details.reason, "insufficientFilePermissions");
});

test("extractErrorDetails reads OAuth token errors", () => {
  const details = extractErrorDetails(
    httpError("invalid_grant", { status: 400, data: { error: "invalid_grant", error_description: "Invalid JWT Signature." } })
  );

  assert.equal(details.status, 400);
  assert.equal(details.reason, "invalid_grant");
  assert.equal(details.message, "Invalid JWT Signature.");
});

test("extractErrorDetails tolerates non-error values", () => {
  assert.deepEqual(extractErrorDetails("boom"), { message: "boom" });
  assert.equal(describeError("boom"), "boom");
});

test("describeError prefixes the status", () => {
  const error = httpError("Request failed with status code 500", { status: 500, data: { error: { message: "Backend Error" } } });
  assert.equal(describeError(error), "500 Backend Error");
  assert.equal(describeError(new TransientBackendError("upload 'a.jpg' failed: 500 Backend Error")), "upload 'a.jpg' failed: 500 Backend Error");
});

test("rejected credentials are fatal", () => {
  const unauthorized = classifyDriveError(
    httpError("Request failed with status code 401", { status: 401, data: { error: { message: "Invalid Credentials" } } }),
    "list folder 'TIENDA'"
  );
  assert.ok(unauthorized instanceof FatalAuthError);
  assert.equal(unauthorized.message, "list folder 'TIENDA' failed: 401 Invalid Credentials");

  const revoked = classifyDriveError(
    httpError("invalid_grant", { status: 400, data: { error: "invalid_grant", error_description: "Token has been revoked." } }),
    "create folder 'TIENDA'"
  );
  assert.ok(revoked instanceof FatalAuthError);
});

test("403 and 404 are permission failures", () => {
  const notFound = classifyDriveError(
    httpError("Request failed with status code 404", { status: 404, data: { error: { message: "File not found: root-folder." } } }),
    "create folder 'TIENDA'"
  );
  assert.ok(notFound instanceof TransientBackendError);
  assert.equal(notFound.kind, "permission");
  assert.equal(notFound.status, 404);
  assert.equal(notFound.message, "create folder 'TIENDA' failed: 404 File not found: root-folder.");
});

test("everything else is transient", () => {
  const reset = classifyDriveError(Object.assign(new Error("socket hang up"), { code: "ECONNRESET" }), "upload 'a.jpg'");
  assert.ok(reset instanceof TransientBackendError);
  assert.equal(reset.kind, "transient");
  assert.equal(reset.status, undefined);
  assert.equal(reset.message, "upload 'a.jpg' failed: socket hang up");
});

test("already classified errors pass through", () => {
  const fatal = new FatalAuthError("GOOGLE_SERVICE_ACCOUNT_JSON is not configured");
  assert.equal(classifyDriveError(fatal, "upload"), fatal);
});

test("CapacityError names the sub-item", () => {
  const error = new CapacityError("ACRILICO_2", 5);
  assert.equal(error.message, "ACRILICO_2 already has 5 photos");
  assert.equal(error.name, "CapacityError");
});
