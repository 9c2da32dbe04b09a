/**
 * Stable identifier for a patient. It is the key of the store document and is
 * never part of the stored attributes.
 */
export type PatientId = string;

export const GENDERS = ["male", "female", "others"] as const;
export type Gender = (typeof GENDERS)[number];

/**
 * Attributes persisted for a patient. Derived fields are never part of it.
 */
export type PatientAttributes = {
  name: string;
  city: string;
  age: number;
  gender: Gender;
  height: number;
  weight: number;
};

/**
 * A validated patient, as accepted by the add operation.
 */
export type PatientRecord = PatientAttributes & { id: PatientId };

/**
 * Sparse override set used by the update operation. Absent keys mean
 * "leave unchanged".
 */
export type PatientUpdate = Partial<PatientAttributes>;

export type Verdict = "Underweight" | "Normal weight" | "Overweight" | "Obese";

/**
 * Raw stored attributes as read back from the store.
 *
 * The data file can be edited by hand, so entries are only guaranteed to be
 * objects; the service validates before it writes, not after it reads.
 */
export type StoredPatient = Record<string, unknown>;

/**
 * The whole persisted collection: patient id -> stored attributes.
 */
export type PatientsDocument = Record<PatientId, StoredPatient>;

/**
 * Serialized patient: stored attributes plus the derived fields.
 *
 * `bmi`/`verdict` are left out when the stored height or weight is unusable.
 */
export type PatientView = StoredPatient & {
  bmi?: number;
  verdict?: Verdict;
};

export type SortedPatientView = PatientView & { id: PatientId };

export const SORT_FIELDS = ["height", "weight", "bmi"] as const;
export type SortField = (typeof SORT_FIELDS)[number];

export const SORT_ORDERS = ["asc", "desc"] as const;
export type SortOrder = (typeof SORT_ORDERS)[number];

export type ApiInfo = {
  name: string;
  version: string;
  description: string;
};

/**
 * Response envelopes returned by the HTTP layer.
 */
export type DataResponse<T> = {
  status: "success";
  data: T;
};

export type MessageResponse = {
  status: "success";
  message: string;
};

export type CreatedResponse = MessageResponse & { id: PatientId };

export type ErrorKind =
  | "validation"
  | "not_found"
  | "conflict"
  | "invalid_argument"
  | "store_io"
  | "store_format"
  | "internal";

export type ErrorResponse = {
  detail: string;
  kind: ErrorKind;
  field?: string;
};
