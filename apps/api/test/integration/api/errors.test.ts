import request from "supertest";
import { describe, expect, it } from "vitest";
import { buildTestApp } from "../../helpers";

describe("app plumbing", () => {
  const { app } = buildTestApp();

  it("reports health", async () => {
    const response = await request(app).get("/health");

    expect(response.status).toBe(200);
    expect(response.body.status).toBe("ok");
  });

  it("describes the API root", async () => {
    const response = await request(app).get("/api/v1");

    expect(response.status).toBe(200);
    expect(response.body.docs.loans).toBe("/api/v1/loans");
  });

  it("answers unknown routes with a structured 404", async () => {
    const response = await request(app).get("/api/v1/nowhere");

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      error: {
        kind: "not_found",
        message: "Route not found",
        details: { method: "GET", path: "/api/v1/nowhere" }
      }
    });
  });

  it("answers malformed JSON with 400", async () => {
    const response = await request(app)
      .post("/api/v1/authors")
      .set("Content-Type", "application/json")
      .send("{\"name\":");

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: { kind: "validation", message: "Malformed JSON body" } });
  });

  it("answers schema violations with field errors", async () => {
    const response = await request(app).post("/api/v1/authors").send({ country: "Norway" });

    expect(response.status).toBe(400);
    expect(response.body.error.kind).toBe("validation");
    expect(response.body.error.details.fieldErrors.name).toEqual(["Required"]);
  });
});
