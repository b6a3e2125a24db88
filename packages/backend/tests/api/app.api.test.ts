import express from "express";
import request from "supertest";
import { describe, expect, it } from "vitest";
import { createApp } from "../../src/app.js";

function createTestApp() {
  const ask = express.Router();
  ask.post("/", (req, res) => {
    res.json({ echo: req.body });
  });
  const health = express.Router();
  health.get("/", (_req, res) => {
    res.json({ status: "ok" });
  });
  const unused = express.Router();
  return createApp({ ask, health, sessions: unused, index: unused });
}

describe("app", () => {
  it("parses JSON bodies and allows cross-origin calls", async () => {
    const response = await request(createTestApp())
      .post("/api/ask")
      .set("Origin", "http://localhost:5173")
      .send({ sessionId: "s1", question: "Hi" });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ echo: { sessionId: "s1", question: "Hi" } });
    expect(response.headers["access-control-allow-origin"]).toBe("*");
  });

  it("rejects malformed JSON", async () => {
    const response = await request(createTestApp())
      .post("/api/ask")
      .set("Content-Type", "application/json")
      .send("{\"sessionId\":");

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: "Malformed JSON body", code: "VALIDATION" });
  });

  it("returns 404 for unknown routes", async () => {
    const response = await request(createTestApp()).get("/api/unknown");

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: "Route not found", code: "NOT_FOUND" });
  });
});
