import { describe, expect, test } from "vitest";
import { ApiRequestError, PatientApiClient } from "./api";

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

describe("PatientApiClient retry behavior", () => {
  test("retries GET on 503 then succeeds", async () => {
    let calls = 0;

    const fetchImpl = async (): Promise<Response> => {
      calls += 1;
      if (calls < 3) {
        return new Response("temporary", { status: 503 });
      }
      return json({ status: "success", data: {} });
    };

    const sleepCalls: number[] = [];
    const client = new PatientApiClient({
      baseUrl: "https://example.test/api/",
      fetchImpl,
      sleepImpl: async (ms) => {
        sleepCalls.push(ms);
      },
      maxRetries: 5,
      minDelayMs: 1,
    });

    expect(await client.listPatients()).toEqual({});
    expect(calls).toBe(3);
    expect(sleepCalls.length).toBe(2);
  });

  test("retries GET on network errors", async () => {
    let calls = 0;
    const fetchImpl = async (): Promise<Response> => {
      calls += 1;
      if (calls === 1) throw new TypeError("fetch failed");
      return json({ name: "Patient Data API", version: "1.0.0", description: "d" });
    };

    const client = new PatientApiClient({
      baseUrl: "https://example.test",
      fetchImpl,
      sleepImpl: async () => {},
      maxRetries: 2,
      minDelayMs: 1,
    });

    expect((await client.info()).version).toBe("1.0.0");
    expect(calls).toBe(2);
  });

  test("does not retry writes", async () => {
    let calls = 0;
    const fetchImpl = async (): Promise<Response> => {
      calls += 1;
      return json({ detail: "Internal server error.", kind: "internal" }, 500);
    };

    const client = new PatientApiClient({
      baseUrl: "https://example.test",
      fetchImpl,
      sleepImpl: async () => {},
      maxRetries: 5,
    });

    await expect(client.addPatient({ id: "P1" })).rejects.toBeInstanceOf(
      ApiRequestError
    );
    expect(calls).toBe(1);
  });
});

describe("PatientApiClient requests", () => {
  test("builds paths and bodies", async () => {
    const seen: Array<{ url: string; method: string; body: unknown }> = [];
    const fetchImpl = async (
      input: RequestInfo | URL,
      init?: RequestInit
    ): Promise<Response> => {
      seen.push({
        url: String(input),
        method: init?.method ?? "GET",
        body: init?.body ?? null,
      });
      return json({ status: "success", message: "ok", data: [] });
    };

    const client = new PatientApiClient({ baseUrl: "http://api.test", fetchImpl });
    await client.sortPatients("bmi", "desc");
    await client.getPatient("P 1");
    await client.updatePatient("P1", { weight: 80 });
    await client.deletePatient("P1");

    expect(seen).toEqual([
      { url: "http://api.test/patients/sort?sort_by=bmi&order=desc", method: "GET", body: null },
      { url: "http://api.test/patients/P%201", method: "GET", body: null },
      { url: "http://api.test/patients/P1", method: "PUT", body: '{"weight":80}' },
      { url: "http://api.test/patients/P1", method: "DELETE", body: null },
    ]);
  });

  test("error bodies become ApiRequestError", async () => {
    const client = new PatientApiClient({
      baseUrl: "http://api.test",
      fetchImpl: async () =>
        json({ detail: "Patient not found.", kind: "not_found" }, 404),
    });

    const err = await client.getPatient("P404").catch((e: unknown) => e);
    if (!(err instanceof ApiRequestError)) throw new Error("expected ApiRequestError");
    expect(err.status).toBe(404);
    expect(err.detail).toBe("Patient not found.");
    expect(err.kind).toBe("not_found");
    expect(err.message).toBe("HTTP 404: Patient not found.");
  });

  test("non-JSON error bodies keep their text", async () => {
    const client = new PatientApiClient({
      baseUrl: "http://api.test",
      fetchImpl: async () => new Response("gateway down", { status: 502 }),
    });

    const err = await client.listPatients().catch((e: unknown) => e);
    if (!(err instanceof ApiRequestError)) throw new Error("expected ApiRequestError");
    expect(err.status).toBe(502);
    expect(err.detail).toBe("gateway down");
    expect(err.kind).toBeNull();
  });
});
