import { ConflictError, InvalidArgumentError, NotFoundError } from "./errors";
import {
  describePatient,
  mergePatientUpdate,
  toStoredAttributes,
  validatePatient,
  validatePatientUpdate,
} from "./patient";
import { putEntry, type RecordStore } from "./store";
import {
  SORT_FIELDS,
  SORT_ORDERS,
  type ApiInfo,
  type PatientId,
  type PatientView,
  type SortField,
  type SortOrder,
  type StoredPatient,
  type SortedPatientView,
} from "./types";

export const API_INFO: ApiInfo = {
  name: "Patient Data API",
  version: "1.0.0",
  description: "API to handle patient data.",
};

function isSortField(value: unknown): value is SortField {
  return SORT_FIELDS.some((f) => f === value);
}

function isSortOrder(value: unknown): value is SortOrder {
  return SORT_ORDERS.some((o) => o === value);
}

/**
 * Sort key for a view. Records without a numeric value for the field sort as 0.
 */
function sortKey(view: PatientView, field: SortField): number {
  const v = view[field];
  return typeof v === "number" && Number.isFinite(v) ? v : 0;
}

/**
 * Stable sort of patient views. Equal keys keep their input order in both
 * directions (Array.prototype.sort is stable).
 */
export function sortPatients(
  views: SortedPatientView[],
  sortBy: SortField,
  order: SortOrder
): SortedPatientView[] {
  const direction = order === "desc" ? -1 : 1;
  return [...views].sort(
    (a, b) => direction * (sortKey(a, sortBy) - sortKey(b, sortBy))
  );
}

/**
 * CRUD + sort over a whole-document record store.
 *
 * Each operation is one load -> compute -> (optional) save transaction. All
 * transactions go through a single promise chain so two requests never
 * interleave their load and save.
 */
export class PatientService {
  private tail: Promise<unknown> = Promise.resolve();

  constructor(private readonly store: RecordStore) {}

  private exclusive<T>(op: () => Promise<T>): Promise<T> {
    const run = this.tail.then(op, op);
    // keep the chain alive after a failed operation
    this.tail = run.catch(() => undefined);
    return run;
  }

  info(): ApiInfo {
    return { ...API_INFO };
  }

  /**
   * Loads the store once. Used at startup so a broken data file stops the
   * server before it accepts requests.
   */
  async init(): Promise<number> {
    const doc = await this.exclusive(() => this.store.load());
    return Object.keys(doc).length;
  }

  /**
   * Resolves once every operation queued so far has settled.
   */
  async close(): Promise<void> {
    await this.tail;
  }

  list(): Promise<Record<PatientId, PatientView>> {
    return this.exclusive(async () => {
      const doc = await this.store.load();
      const out: Record<PatientId, PatientView> = {};
      for (const [id, stored] of Object.entries(doc)) {
        putEntry(out, id, describePatient(stored));
      }
      return out;
    });
  }

  byId(id: PatientId): Promise<PatientView> {
    return this.exclusive(async () => {
      const doc = await this.store.load();
      if (!Object.hasOwn(doc, id)) throw new NotFoundError(id);
      return describePatient(doc[id]);
    });
  }

  async sorted(sortBy: unknown, order: unknown): Promise<SortedPatientView[]> {
    if (!isSortField(sortBy)) {
      throw new InvalidArgumentError(
        `Invalid sort field. Select from ${SORT_FIELDS.join(", ")}.`
      );
    }
    if (!isSortOrder(order)) {
      throw new InvalidArgumentError("Invalid order. Use 'asc' or 'desc'.");
    }

    return this.exclusive(async () => {
      const doc = await this.store.load();
      const views = Object.entries(doc).map(([id, stored]) => ({
        ...describePatient(stored),
        id,
      }));
      return sortPatients(views, sortBy, order);
    });
  }

  /**
   * Validates and inserts a new patient. Returns the new id.
   */
  add(input: unknown): Promise<PatientId> {
    return this.exclusive(async () => {
      const record = validatePatient(input);
      const doc = await this.store.load();
      if (Object.hasOwn(doc, record.id)) throw new ConflictError(record.id);

      putEntry<StoredPatient>(doc, record.id, toStoredAttributes(record));
      await this.store.save(doc);
      return record.id;
    });
  }

  update(id: PatientId, input: unknown): Promise<PatientView> {
    return this.exclusive(async () => {
      const doc = await this.store.load();
      if (!Object.hasOwn(doc, id)) throw new NotFoundError(id);

      const update = validatePatientUpdate(input);
      const merged = mergePatientUpdate(id, doc[id], update);
      const stored = toStoredAttributes(merged);
      putEntry<StoredPatient>(doc, id, stored);
      await this.store.save(doc);
      return describePatient(stored);
    });
  }

  delete(id: PatientId): Promise<void> {
    return this.exclusive(async () => {
      const doc = await this.store.load();
      if (!Object.hasOwn(doc, id)) throw new NotFoundError(id);

      delete doc[id];
      await this.store.save(doc);
    });
  }
}
