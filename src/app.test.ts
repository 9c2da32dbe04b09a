import type { Server } from "node:http";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { createApp, toErrorResponse } from "./app";
import { NotFoundError, StoreIoError, ValidationError } from "./errors";
import { PatientService } from "./service";
import { MemoryRecordStore, type RecordStore } from "./store";

const hazel = {
  id: "P001",
  name: "Hazel Grace",
  city: "NY",
  age: 30,
  gender: "female",
  height: 1.75,
  weight: 70.2,
};

let server: Server;
let baseUrl: string;
let store: MemoryRecordStore;

function listen(recordStore: RecordStore): Promise<void> {
  const app = createApp(new PatientService(recordStore));
  return new Promise((resolve) => {
    server = app.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (address && typeof address === "object") {
        baseUrl = `http://127.0.0.1:${address.port}`;
      }
      resolve();
    });
  });
}

function send(method: string, path: string, body?: unknown): Promise<Response> {
  return fetch(`${baseUrl}${path}`, {
    method,
    headers: body === undefined ? {} : { "content-type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

beforeEach(async () => {
  store = new MemoryRecordStore();
  await listen(store);
});

afterEach(async () => {
  await new Promise<void>((resolve, reject) =>
    server.close((err) => (err ? reject(err) : resolve()))
  );
});

describe("HTTP API", () => {
  test("GET /info", async () => {
    const res = await send("GET", "/info");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      name: "Patient Data API",
      version: "1.0.0",
      description: "API to handle patient data.",
    });
  });

  test("POST then GET returns the record with derived fields", async () => {
    const created = await send("POST", "/patients", hazel);
    expect(created.status).toBe(201);
    expect(await created.json()).toEqual({
      status: "success",
      message: "Patient added successfully.",
      id: "P001",
    });

    const res = await send("GET", "/patients/P001");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: "success",
      data: {
        name: "Hazel Grace",
        city: "NY",
        age: 30,
        gender: "female",
        height: 1.75,
        weight: 70.2,
        bmi: 22.92,
        verdict: "Normal weight",
      },
    });
  });

  test("duplicate POST is a 400 conflict", async () => {
    await send("POST", "/patients", hazel);
    const res = await send("POST", "/patients", hazel);
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      detail: "Patient with this ID already exists.",
      kind: "conflict",
    });
  });

  test("invalid POST body is a 400 with the field", async () => {
    const res = await send("POST", "/patients", { ...hazel, age: 0 });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      detail: "Invalid age: must be greater than 0",
      kind: "validation",
      field: "age",
    });
  });

  test("malformed JSON is a 400", async () => {
    const res = await fetch(`${baseUrl}/patients`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{not json",
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      detail: "Request body is not valid JSON.",
      kind: "validation",
      field: "body",
    });
  });

  test("an oversized body is a 413 with the error body", async () => {
    const res = await send("POST", "/patients", {
      ...hazel,
      name: "x".repeat(150_000),
    });
    expect(res.status).toBe(413);
    expect(res.headers.get("content-type")).toMatch(/^application\/json/);
    expect(await res.json()).toEqual({
      detail: "Request body is too large.",
      kind: "validation",
      field: "body",
    });
    expect(await store.load()).toEqual({});
  });

  test("an id named __proto__ round-trips over HTTP", async () => {
    const created = await send("POST", "/patients", { ...hazel, id: "__proto__" });
    expect(created.status).toBe(201);

    const res = await send("GET", "/patients/__proto__");
    expect(res.status).toBe(200);
    expect((await res.json()).data.bmi).toBe(22.92);

    const list = await (await send("GET", "/patients")).json();
    expect(Object.keys(list.data)).toEqual(["__proto__"]);
  });

  test("GET unknown id is 404", async () => {
    const res = await send("GET", "/patients/P404");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      detail: "Patient not found.",
      kind: "not_found",
    });
  });

  test("GET /patients lists the mapping", async () => {
    await send("POST", "/patients", hazel);
    const res = await send("GET", "/patients");
    const body = await res.json();
    expect(body.status).toBe("success");
    expect(Object.keys(body.data)).toEqual(["P001"]);
    expect(body.data.P001.verdict).toBe("Normal weight");
  });

  test("GET /patients/sort orders and validates", async () => {
    await send("POST", "/patients", { ...hazel, id: "A", height: 1, weight: 18 });
    await send("POST", "/patients", { ...hazel, id: "B", height: 1, weight: 30 });
    await send("POST", "/patients", { ...hazel, id: "C", height: 1, weight: 25 });

    const res = await send("GET", "/patients/sort?sort_by=bmi&order=desc");
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.data.map((p: { id: string }) => p.id)).toEqual(["B", "C", "A"]);

    const bad = await send("GET", "/patients/sort?sort_by=age&order=asc");
    expect(bad.status).toBe(400);
    expect(await bad.json()).toEqual({
      detail: "Invalid sort field. Select from height, weight, bmi.",
      kind: "invalid_argument",
    });

    const missing = await send("GET", "/patients/sort?sort_by=bmi");
    expect(missing.status).toBe(400);
  });

  test("PUT merges a partial update", async () => {
    await send("POST", "/patients", hazel);
    const res = await send("PUT", "/patients/P001", { weight: 80 });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: "success",
      message: "Patient updated successfully.",
    });
    expect((await store.load()).P001).toEqual({
      name: "Hazel Grace",
      city: "NY",
      age: 30,
      gender: "female",
      height: 1.75,
      weight: 80,
    });
  });

  test("PUT unknown id is 404", async () => {
    const res = await send("PUT", "/patients/P404", { weight: 80 });
    expect(res.status).toBe(404);
  });

  test("DELETE removes, then 404s", async () => {
    await send("POST", "/patients", hazel);
    const res = await send("DELETE", "/patients/P001");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: "success",
      message: "Patient deleted successfully.",
    });
    expect((await send("DELETE", "/patients/P001")).status).toBe(404);
  });

  test("legacy route names still work", async () => {
    expect((await send("POST", "/add_patient", hazel)).status).toBe(201);
    expect((await send("PUT", "/update_patient/P001", { city: "LA" })).status).toBe(200);
    const list = await (await send("GET", "/view_patients_data")).json();
    expect(list.data.P001.city).toBe("LA");
    expect(
      (await send("GET", "/sort_patients?sort_by=height&order=asc")).status
    ).toBe(200);
    expect((await send("DELETE", "/delete_patient/P001")).status).toBe(200);
  });
});

describe("HTTP API store failures", () => {
  test("store errors are a 500 with their kind", async () => {
    const broken: RecordStore = {
      load: async () => {
        throw new StoreIoError("patients.json", new Error("EIO"));
      },
      save: async () => {},
    };
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await listen(broken);
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    const res = await send("GET", "/patients");
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      detail: "Patient store I/O failed for patients.json: EIO",
      kind: "store_io",
    });
    expect(errorSpy).toHaveBeenCalledTimes(1);
    errorSpy.mockRestore();
  });
});

describe("toErrorResponse", () => {
  test("maps service errors", () => {
    expect(toErrorResponse(new NotFoundError("X"))).toEqual({
      status: 404,
      body: { detail: "Patient not found.", kind: "not_found" },
    });
    expect(toErrorResponse(new ValidationError("age", "is required"))).toEqual({
      status: 400,
      body: { detail: "Invalid age: is required", kind: "validation", field: "age" },
    });
  });

  test("unknown errors are internal", () => {
    expect(toErrorResponse(new Error("boom"))).toEqual({
      status: 500,
      body: { detail: "Internal server error.", kind: "internal" },
    });
  });
});
