#!/usr/bin/env node
import { writeFileSync } from "node:fs";
import { ApiRequestError, PatientApiClient } from "./api";
import { loadConfig } from "./config";
import { patientsToCsv } from "./csv";
import {
  SORT_FIELDS,
  SORT_ORDERS,
  type SortField,
  type SortOrder,
} from "./types";

const USAGE = `Usage: patients <command> [options]

Commands:
  info
  list
  get <id>
  sort --sortBy <height|weight|bmi> [--order <asc|desc>]
  add --id <id> --name <name> --city <city> --age <n> --gender <g> --height <m> --weight <kg>
  update <id> [--name ..] [--city ..] [--age ..] [--gender ..] [--height ..] [--weight ..]
  delete <id>
  export [--out patients.csv] [--sortBy <field> --order <asc|desc>]

Options:
  --baseUrl <url>   API base URL (or PATIENT_API_URL)`;

/**
 * Reads a flag value from argv.
 *
 * Supports both styles:
 * - `--age 30`
 * - `--age=30`
 *
 * Returns `null` if the flag is not present or has no value.
 */
export function getArgValue(argv: string[], flag: string): string | null {
  const idx = argv.findIndex((a) => a === flag || a.startsWith(`${flag}=`));
  if (idx === -1) return null;
  const a = argv[idx];
  if (a.includes("=")) return a.split("=").slice(1).join("=");
  const next = argv[idx + 1];
  return next && !next.startsWith("--") ? next : null;
}

/**
 * Positional arguments (anything not a flag or a flag's value).
 */
export function getPositionals(argv: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < argv.length; i += 1) {
    const a = argv[i];
    if (a.startsWith("--")) {
      if (!a.includes("=") && argv[i + 1] && !argv[i + 1].startsWith("--")) {
        i += 1;
      }
      continue;
    }
    out.push(a);
  }
  return out;
}

/**
 * Numbers are sent as numbers so the server validates them as such; text
 * that does not parse is sent as-is and rejected there.
 */
function numericArg(value: string): number | string {
  const n = Number(value);
  return value.trim() && Number.isFinite(n) ? n : value;
}

/**
 * Builds a patient payload from the field flags that are present.
 */
export function patientFieldsFromArgs(argv: string[]): Record<string, unknown> {
  const payload: Record<string, unknown> = {};
  for (const key of ["name", "city", "gender"]) {
    const v = getArgValue(argv, `--${key}`);
    if (v !== null) payload[key] = v;
  }
  for (const key of ["age", "height", "weight"]) {
    const v = getArgValue(argv, `--${key}`);
    if (v !== null) payload[key] = numericArg(v);
  }
  return payload;
}

function parseSortArgs(argv: string[]): {
  sortBy: SortField;
  order: SortOrder;
} | null {
  const sortBy = getArgValue(argv, "--sortBy");
  const order = getArgValue(argv, "--order") ?? "asc";
  const field = SORT_FIELDS.find((f) => f === sortBy);
  const dir = SORT_ORDERS.find((o) => o === order);
  if (!field || !dir) return null;
  return { sortBy: field, order: dir };
}

function print(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/**
 * CLI entrypoint. Returns the process exit code.
 */
export async function runCli(
  argv: string[],
  client?: PatientApiClient
): Promise<number> {
  const [command, ...rest] = getPositionals(argv);
  const baseUrl = getArgValue(argv, "--baseUrl") || loadConfig().apiBaseUrl;
  const api = client ?? new PatientApiClient({ baseUrl });

  switch (command) {
    case "info":
      print(await api.info());
      return 0;

    case "list":
      print(await api.listPatients());
      return 0;

    case "get": {
      if (!rest[0]) break;
      print(await api.getPatient(rest[0]));
      return 0;
    }

    case "sort": {
      const sort = parseSortArgs(argv);
      if (!sort) {
        console.error("sort needs --sortBy height|weight|bmi and --order asc|desc");
        return 1;
      }
      print(await api.sortPatients(sort.sortBy, sort.order));
      return 0;
    }

    case "add": {
      const id = getArgValue(argv, "--id");
      if (!id) {
        console.error("add needs --id");
        return 1;
      }
      const res = await api.addPatient({ id, ...patientFieldsFromArgs(argv) });
      console.log(`${res.message} (id: ${res.id})`);
      return 0;
    }

    case "update": {
      if (!rest[0]) break;
      const update = patientFieldsFromArgs(argv);
      if (Object.keys(update).length === 0) {
        console.warn("No fields to update. Pass at least one field flag.");
        return 1;
      }
      const res = await api.updatePatient(rest[0], update);
      console.log(res.message);
      return 0;
    }

    case "delete": {
      if (!rest[0]) break;
      const res = await api.deletePatient(rest[0]);
      console.log(res.message);
      return 0;
    }

    case "export": {
      const outPath = getArgValue(argv, "--out") || "patients.csv";
      const sort = parseSortArgs(argv);
      const rows = sort
        ? (await api.sortPatients(sort.sortBy, sort.order)).map((view) => ({
            id: view.id,
            view,
          }))
        : Object.entries(await api.listPatients()).map(([id, view]) => ({
            id,
            view,
          }));

      writeFileSync(outPath, patientsToCsv(rows), "utf8");
      console.log(`Wrote ${rows.length} patients to ${outPath}`);
      return 0;
    }
  }

  console.error(USAGE);
  return 1;
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => process.exit(code))
    .catch((err) => {
      if (err instanceof ApiRequestError) {
        console.error(`Error ${err.status}: ${err.detail}`);
      } else {
        console.error("Fatal error:", err);
      }
      process.exit(1);
    });
}
