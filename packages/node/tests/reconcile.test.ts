/**
 * Tests for reconciliation routes.
 *
 * Verifies:
 * - POST /api/v1/reconcile returns the full result
 * - POST /api/v1/report returns the workbook layout
 * - Per-request column mappings
 * - Body validation and size limits
 */

import { describe, it, expect } from "vitest";
import { DIGEST_HEADER } from "../src/types/api-contract.js";
import { createTestApp, dataset, jsonRequest, rec } from "./setup.js";

const changedBody = {
  source: dataset([rec(0, "A", "Root", { Value: "X" })]),
  test: dataset([rec(0, "A", "Root", { Value: "Y" })]),
};

describe("POST /api/v1/reconcile", () => {
  it("returns differences, matches and summary", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/api/v1/reconcile", "POST", changedBody));

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      data: {
        comparableColumns: ["Name", "Value"],
        differences: [
          {
            path: "A__Root",
            tag: "A",
            column: "Value",
            testValue: "Y",
            sourceValue: "X",
            changeType: "Changed",
          },
        ],
        matches: [{ testRowIndex: 0, sourceRowIndex: 0, tier: "primary-key" }],
        summary: { allReconciled: false, totalSourceRows: 1, totalTestRows: 1 },
        notices: [],
        digest: expect.stringMatching(/^[0-9a-f]{64}$/),
      },
    });
  });

  it("accepts empty datasets", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/api/v1/reconcile", "POST", { source: { tables: [] }, test: { tables: [] } }),
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      data: { differences: [], summary: { allReconciled: true } },
    });
  });

  it("applies a mapping sent with the request", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/api/v1/reconcile", "POST", {
        source: dataset([{ Depth: 0, Label: "Root", Element: "A", Value: "1" }]),
        test: dataset([{ Depth: 0, Label: "Root", Element: "A", Value: "2" }]),
        mapping: { levelColumns: ["Depth"], nameColumn: "Label", tagColumn: "Element" },
      }),
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      data: {
        comparableColumns: ["Label", "Value"],
        differences: [{ path: "A__Root", column: "Value", changeType: "Changed" }],
      },
    });
  });

  it("returns 400 for a missing dataset", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/api/v1/reconcile", "POST", { source: { tables: [] } }),
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: "VALIDATION_ERROR",
        message: "Request body validation failed",
        details: { issues: [{ path: "test", message: "Required" }] },
      },
    });
  });

  it("returns 400 for nested cell objects", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/api/v1/reconcile", "POST", {
        source: { tables: [{ name: "Mapping", rows: [{ Name: { nested: true } }] }] },
        test: { tables: [] },
      }),
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: "VALIDATION_ERROR" } });
  });

  it("returns 400 for an unknown mapping key", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/api/v1/reconcile", "POST", { ...changedBody, mapping: { idColumn: "Id" } }),
    );

    expect(res.status).toBe(400);
  });

  it("returns 400 for malformed JSON", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      new Request("http://localhost/api/v1/reconcile", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{not json",
      }),
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: "VALIDATION_ERROR", message: "Invalid JSON in request body" },
    });
  });

  it("returns 413 for a body over the limit", async () => {
    const { app } = createTestApp({ maxBodyBytes: 1024 });
    const rows = Array.from({ length: 100 }, (_, i) => rec(0, `T${i}`, "Padding row"));
    const res = await app.request(
      jsonRequest("/api/v1/reconcile", "POST", { source: dataset(rows), test: dataset(rows) }),
    );

    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({
      error: { code: "PAYLOAD_TOO_LARGE", message: "Request body exceeds 1024 bytes" },
    });
  });
});

describe("POST /api/v1/report", () => {
  it("returns the workbook sheets", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/api/v1/report", "POST", changedBody));

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      data: {
        digest: expect.stringMatching(/^[0-9a-f]{64}$/),
        summary: { allReconciled: false },
        workbook: {
          sheets: [
            { name: "Mapping" },
            { name: "Stripped Source" },
            {
              name: "Merged Output",
              rows: [["0", "Root", "A", "Y"]],
              styles: [{ row: 0, column: 3, style: "changed" }],
            },
            {
              name: "Differences",
              rows: [["A__Root", "A", "Value", "Y", "X", "Changed"]],
            },
          ],
        },
      },
    });
  });

  it("sends the digest in a response header", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/api/v1/report", "POST", changedBody));

    const body: unknown = await res.json();
    expect(res.headers.get(DIGEST_HEADER)).toBe(readDigest(body));
  });

  it("matches the digest of the reconcile endpoint", async () => {
    const { app } = createTestApp();
    const reconciled = await app.request(jsonRequest("/api/v1/reconcile", "POST", changedBody));
    const reported = await app.request(jsonRequest("/api/v1/report", "POST", changedBody));

    const a: unknown = await reconciled.json();
    const b: unknown = await reported.json();
    expect(a).toMatchObject({ data: { digest: expect.any(String) } });
    expect(b).toMatchObject({ data: { digest: readDigest(a) } });
  });
});

function readDigest(body: unknown): string {
  if (typeof body !== "object" || body === null || !("data" in body)) return "";
  const { data } = body;
  if (typeof data !== "object" || data === null || !("digest" in data)) return "";
  return typeof data.digest === "string" ? data.digest : "";
}
