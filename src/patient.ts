import { z } from "zod";
import { deriveHealth } from "./bmi";
import { ValidationError } from "./errors";
import { putEntry } from "./store";
import {
  GENDERS,
  type PatientAttributes,
  type PatientId,
  type PatientRecord,
  type PatientUpdate,
  type PatientView,
  type StoredPatient,
} from "./types";

const TYPE_MESSAGES = {
  string: { required_error: "is required", invalid_type_error: "must be a string" },
  number: { required_error: "is required", invalid_type_error: "must be a number" },
};

const idField = z.string(TYPE_MESSAGES.string).min(1, "must not be empty");
const nameField = z.string(TYPE_MESSAGES.string).min(1, "must not be empty");
const cityField = z.string(TYPE_MESSAGES.string).min(1, "must not be empty");
const ageField = z
  .number(TYPE_MESSAGES.number)
  .int("must be an integer")
  .gt(0, "must be greater than 0")
  .lt(120, "must be less than 120");
const genderField = z.enum(GENDERS, {
  errorMap: () => ({ message: `must be one of ${GENDERS.join(", ")}` }),
});
const heightField = z
  .number(TYPE_MESSAGES.number)
  .finite("must be finite")
  .gt(0, "must be greater than 0");
const weightField = z
  .number(TYPE_MESSAGES.number)
  .finite("must be finite")
  .gt(0, "must be greater than 0");

const objectMessages = {
  required_error: "is required",
  invalid_type_error: "must be a JSON object",
};

/**
 * Full patient record. Key order is the order fields are checked in. Unknown
 * keys (including client-sent `bmi`/`verdict`) are stripped.
 */
export const PatientSchema = z.object(
  {
    id: idField,
    name: nameField,
    city: cityField,
    age: ageField,
    gender: genderField,
    height: heightField,
    weight: weightField,
  },
  objectMessages
);

/**
 * Sparse update. `null` is accepted and treated the same as an absent key.
 */
export const PatientUpdateSchema = z.object(
  {
    name: nameField.nullish(),
    city: cityField.nullish(),
    age: ageField.nullish(),
    gender: genderField.nullish(),
    height: heightField.nullish(),
    weight: weightField.nullish(),
  },
  objectMessages
);

function firstIssue(error: z.ZodError): ValidationError {
  const issue = error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join(".") : "body";
  return new ValidationError(field, issue ? issue.message : "is invalid");
}

/**
 * Validates a full patient record, failing on the first violated constraint.
 */
export function validatePatient(raw: unknown): PatientRecord {
  const parsed = PatientSchema.safeParse(raw);
  if (!parsed.success) throw firstIssue(parsed.error);
  return parsed.data;
}

/**
 * Validates a sparse update. Fields that are absent or `null` are omitted
 * from the result rather than defaulted.
 */
export function validatePatientUpdate(raw: unknown): PatientUpdate {
  const parsed = PatientUpdateSchema.safeParse(raw);
  if (!parsed.success) throw firstIssue(parsed.error);

  const update: PatientUpdate = {};
  const { name, city, age, gender, height, weight } = parsed.data;
  if (name != null) update.name = name;
  if (city != null) update.city = city;
  if (age != null) update.age = age;
  if (gender != null) update.gender = gender;
  if (height != null) update.height = height;
  if (weight != null) update.weight = weight;
  return update;
}

/**
 * Applies an update on top of the existing stored attributes and re-validates
 * the merged set as a full record.
 *
 * Untouched fields go through validation again, so a stored record that was
 * already invalid cannot be updated without fixing the offending field.
 */
export function mergePatientUpdate(
  id: PatientId,
  existing: StoredPatient,
  update: PatientUpdate
): PatientRecord {
  const merged: StoredPatient = { ...existing };
  for (const [key, value] of Object.entries(update)) {
    if (value !== undefined && value !== null) merged[key] = value;
  }
  merged.id = id;
  return validatePatient(merged);
}

/**
 * Persisted form of a record: everything but the id, in a fixed key order.
 */
export function toStoredAttributes(record: PatientRecord): PatientAttributes {
  return {
    name: record.name,
    city: record.city,
    age: record.age,
    gender: record.gender,
    height: record.height,
    weight: record.weight,
  };
}

/**
 * Attaches `bmi` and `verdict` to stored attributes for serialization.
 */
export function describePatient(stored: StoredPatient): PatientView {
  const view: PatientView = {};
  for (const [key, value] of Object.entries(stored)) {
    // derived keys in a hand-edited file are never trusted
    if (key !== "bmi" && key !== "verdict") putEntry(view, key, value);
  }

  const health = deriveHealth(stored.height, stored.weight);
  if (health) {
    view.bmi = health.bmi;
    view.verdict = health.verdict;
  }
  return view;
}
