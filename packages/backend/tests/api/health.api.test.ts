import express from "express";
import request from "supertest";
import { describe, expect, it } from "vitest";
import { IndexSnapshotHolder } from "../../src/retrieval/IndexSnapshot.js";
import { checkIndex } from "../../src/runtime/connectivity.js";
import { createHealthRouter } from "../../src/routes/health.js";

describe("health api", () => {
  it("returns ok when the index and model are ready", async () => {
    const app = express();
    app.use(
      "/api/health",
      createHealthRouter({
        checkIndex: () => "ok",
        checkLlm: () => "ok",
        countSessions: async () => 4,
        startTime: Date.now() - 5_000
      })
    );

    const response = await request(app).get("/api/health");
    expect(response.status).toBe(200);
    expect(response.body.status).toBe("ok");
    expect(response.body.checks).toEqual({ index: "ok", llm: "ok" });
    expect(response.body.activeSessions).toBe(4);
    expect(response.body.uptimeSec).toBeGreaterThanOrEqual(5);
    expect(response.body.memoryUsage.rss).toBeGreaterThan(0);
  });

  it("returns degraded while the index is not built", async () => {
    const holder = new IndexSnapshotHolder();
    const app = express();
    app.use(
      "/api/health",
      createHealthRouter({
        checkIndex: () => checkIndex(holder),
        checkLlm: () => "not_configured",
        countSessions: async () => 0
      })
    );

    const response = await request(app).get("/api/health");
    expect(response.status).toBe(200);
    expect(response.body.status).toBe("degraded");
    expect(response.body.checks).toEqual({
      index: "not_built",
      llm: "not_configured"
    });
  });
});
