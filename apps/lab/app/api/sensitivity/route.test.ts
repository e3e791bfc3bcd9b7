import { describe, expect, it } from "vitest";
import { bottleSpecification } from "../assess/fixtures";
import { POST } from "./route";

const post = (body: unknown) =>
  POST(
    new Request("http://localhost/api/sensitivity", {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
    }),
  );

describe("POST /api/sensitivity", () => {
  it("returns 200 for valid payload", async () => {
    const response = await post({
      specification: bottleSpecification,
      parameters: ["lifetimeYears"],
    });
    const body = (await response.json()) as {
      traceId: string;
      report: { ranking: string[] };
    };

    expect(response.status).toBe(200);
    expect(body.traceId.length).toBeGreaterThan(0);
    expect(body.report.ranking).toEqual(["lifetimeYears"]);
  });

  it("returns 400 for invalid payload", async () => {
    const response = await post({ parameters: ["materialMass"] });
    const body = (await response.json()) as { error: string };

    expect(response.status).toBe(400);
    expect(typeof body.error).toBe("string");
  });

  it("returns 400 for a body that is not JSON", async () => {
    const response = await POST(
      new Request("http://localhost/api/sensitivity", {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: "{not json",
      }),
    );
    const body = (await response.json()) as { error: string };

    expect(response.status).toBe(400);
    expect(body.error.length).toBeGreaterThan(0);
  });
});
