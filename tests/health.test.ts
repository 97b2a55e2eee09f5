import request from "supertest";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createHealthServer, incrementErrors, incrementMessages, resetStats } from "../src/health";

describe("health server", () => {
  let app = createHealthServer();

  beforeEach(async () => {
    resetStats();
    app = createHealthServer();
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it("reports liveness with the message counters", async () => {
    incrementMessages();
    incrementMessages();
    incrementErrors();

    const response = await request(app.server).get("/health");

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({ status: "ok", messagesProcessed: 2, errorsCount: 1 });
    expect(typeof response.body.uptimeSeconds).toBe("number");
  });

  it("answers the root path too", async () => {
    const response = await request(app.server).get("/?check=1");

    expect(response.status).toBe(200);
    expect(response.body.status).toBe("ok");
  });

  it("returns 404 for anything else", async () => {
    const missing = await request(app.server).get("/metrics");
    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ status: "not_found" });

    const wrongMethod = await request(app.server).post("/health");
    expect(wrongMethod.status).toBe(404);
  });
});
