import express from "express";
import { PatientApiError, ValidationError } from "./errors";
import type { PatientService } from "./service";
import type {
  CreatedResponse,
  DataResponse,
  ErrorResponse,
  MessageResponse,
} from "./types";

/**
 * Maps a thrown value to a status code and error body.
 *
 * Anything that is not a `PatientApiError` is an internal error.
 */
export function toErrorResponse(err: unknown): {
  status: number;
  body: ErrorResponse;
} {
  if (err instanceof PatientApiError) {
    const body: ErrorResponse = { detail: err.message, kind: err.kind };
    if (err instanceof ValidationError) body.field = err.field;
    return { status: err.status, body };
  }

  return {
    status: 500,
    body: { detail: "Internal server error.", kind: "internal" },
  };
}

function sendError(res: express.Response, err: unknown): void {
  const { status, body } = toErrorResponse(err);
  if (status >= 500) console.error("Request failed:", err);
  res.status(status).json(body);
}

/**
 * Client-error status of a body-parser failure, or null for anything else.
 */
function bodyParserStatus(err: unknown): number | null {
  if (typeof err !== "object" || err === null) return null;
  if (!("type" in err) || typeof err.type !== "string") return null;
  const status = "status" in err ? err.status : undefined;
  if (typeof status !== "number" || status < 400 || status >= 500) return null;
  return status;
}

function bodyErrorDetail(err: unknown): string {
  const type =
    typeof err === "object" && err !== null && "type" in err ? err.type : null;
  if (type === "entity.parse.failed") return "Request body is not valid JSON.";
  if (type === "entity.too.large") return "Request body is too large.";
  return err instanceof Error
    ? `Request body could not be read: ${err.message}`
    : "Request body could not be read.";
}

function queryString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/**
 * Builds the Express application serving the patient API.
 *
 * Routes follow the REST layout (`/patients`, `/patients/:id`); the route
 * names of the earlier API are kept as aliases so existing clients still work.
 */
export function createApp(service: PatientService): express.Express {
  const app = express();
  app.use(express.json());

  const info: express.RequestHandler = (_req, res) => {
    res.json(service.info());
  };

  const list: express.RequestHandler = async (_req, res) => {
    try {
      const data = await service.list();
      const body: DataResponse<typeof data> = { status: "success", data };
      res.json(body);
    } catch (err) {
      sendError(res, err);
    }
  };

  const sorted: express.RequestHandler = async (req, res) => {
    try {
      const data = await service.sorted(
        queryString(req.query.sort_by),
        queryString(req.query.order)
      );
      const body: DataResponse<typeof data> = { status: "success", data };
      res.json(body);
    } catch (err) {
      sendError(res, err);
    }
  };

  const byId: express.RequestHandler<{ id: string }> = async (req, res) => {
    try {
      const data = await service.byId(req.params.id);
      const body: DataResponse<typeof data> = { status: "success", data };
      res.json(body);
    } catch (err) {
      sendError(res, err);
    }
  };

  const add: express.RequestHandler = async (req, res) => {
    try {
      const id = await service.add(req.body);
      const body: CreatedResponse = {
        status: "success",
        message: "Patient added successfully.",
        id,
      };
      res.status(201).json(body);
    } catch (err) {
      sendError(res, err);
    }
  };

  const update: express.RequestHandler<{ id: string }> = async (req, res) => {
    try {
      await service.update(req.params.id, req.body);
      const body: MessageResponse = {
        status: "success",
        message: "Patient updated successfully.",
      };
      res.json(body);
    } catch (err) {
      sendError(res, err);
    }
  };

  const remove: express.RequestHandler<{ id: string }> = async (req, res) => {
    try {
      await service.delete(req.params.id);
      const body: MessageResponse = {
        status: "success",
        message: "Patient deleted successfully.",
      };
      res.json(body);
    } catch (err) {
      sendError(res, err);
    }
  };

  app.get("/info", info);
  app.get("/patients", list);
  // must be registered before /patients/:id
  app.get("/patients/sort", sorted);
  app.get("/patients/:id", byId);
  app.post("/patients", add);
  app.put("/patients/:id", update);
  app.delete("/patients/:id", remove);

  // legacy route names
  app.get("/view_patients_data", list);
  app.get("/sort_patients", sorted);
  app.post("/add_patient", add);
  app.put("/update_patient/:id", update);
  app.delete("/delete_patient/:id", remove);

  // errors raised by express.json() before a route runs
  const bodyErrors: express.ErrorRequestHandler = (err, _req, res, next) => {
    const status = bodyParserStatus(err);
    if (status === null) {
      next(err);
      return;
    }
    const body: ErrorResponse = {
      detail: bodyErrorDetail(err),
      kind: "validation",
      field: "body",
    };
    res.status(status).json(body);
  };
  app.use(bodyErrors);

  const fallback: express.ErrorRequestHandler = (err, _req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    sendError(res, err);
  };
  app.use(fallback);

  return app;
}
