/**
 * Tests for health check endpoints.
 *
 * Verifies:
 * - GET /health returns 200 with status "ok" and the active mapping
 * - X-Request-Id is set on responses
 * - Unknown routes get the error envelope
 */

import { describe, it, expect } from "vitest";
import { createTestApp } from "./setup.js";

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: "ok",
      mapping: {
        levelColumns: ["Lvl", "Level"],
        nameColumn: "Name",
        tagColumn: "XML Tag",
        placeholderPrefix: "Unnamed",
      },
      timestamp: expect.any(String),
    });
  });

  it("reports a configured mapping", async () => {
    const { app } = createTestApp({
      reconciler: { mapping: { levelColumns: ["Depth"] } },
    });
    const res = await app.request("/health");

    expect(await res.json()).toMatchObject({ mapping: { levelColumns: ["Depth"] } });
  });

  it("includes X-Request-Id header", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe("unknown routes", () => {
  it("returns 404 with an error envelope", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/nothing");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: "NOT_FOUND", message: "No route for GET /api/v1/nothing" },
    });
  });
});
