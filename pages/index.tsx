import { useMemo, useState } from "react";
import { ApiRequestError, PatientApiClient } from "../src/api";
import { CSV_COLUMNS, patientsToCsv } from "../src/csv";
import type {
  ApiInfo,
  PatientId,
  PatientView,
  SortField,
  SortOrder,
} from "../src/types";

type Row = { id: PatientId; view: PatientView };

const emptyForm = {
  id: "",
  name: "",
  city: "",
  age: "",
  gender: "",
  height: "",
  weight: "",
};

type FormState = typeof emptyForm;

function errorMessage(e: unknown, fallback: string): string {
  if (e instanceof ApiRequestError) return `Error ${e.status}: ${e.detail}`;
  if (e instanceof Error && e.message) return e.message;
  return fallback;
}

/**
 * Builds a payload from form text. Empty inputs are left out, which is what
 * the update form relies on to keep current values.
 */
function formPayload(form: FormState): Record<string, unknown> {
  const payload: Record<string, unknown> = {};
  if (form.name.trim()) payload.name = form.name.trim();
  if (form.city.trim()) payload.city = form.city.trim();
  if (form.gender) payload.gender = form.gender;
  if (form.age.trim()) payload.age = Number(form.age);
  if (form.height.trim()) payload.height = Number(form.height);
  if (form.weight.trim()) payload.weight = Number(form.weight);
  return payload;
}

function PatientTable({ rows }: { rows: Row[] }) {
  if (rows.length === 0) return <p>No patients found in the database.</p>;

  return (
    <div style={{ overflowX: "auto" }}>
      <table cellPadding={6} style={{ borderCollapse: "collapse", minWidth: 720 }}>
        <thead>
          <tr>
            <th align="left">ID</th>
            {CSV_COLUMNS.map((c) => (
              <th key={c} align="left">
                {c}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {rows.map(({ id, view }) => (
            <tr key={id}>
              <td>
                <code>{id}</code>
              </td>
              {CSV_COLUMNS.map((c) => (
                <td key={c}>{view[c] === undefined ? "—" : String(view[c])}</td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}

function FormFields({
  form,
  setForm,
  withId,
}: {
  form: FormState;
  setForm: (f: FormState) => void;
  withId: boolean;
}) {
  const text = (key: keyof FormState, label: string, type = "text") => (
    <div style={{ marginTop: 8 }}>
      <label>
        {label}
        <br />
        <input
          type={type}
          step="any"
          value={form[key]}
          onChange={(e) => setForm({ ...form, [key]: e.target.value })}
        />
      </label>
    </div>
  );

  return (
    <>
      {withId ? text("id", "Patient ID") : null}
      {text("name", "Name")}
      {text("city", "City")}
      {text("age", "Age", "number")}
      <div style={{ marginTop: 8 }}>
        <label>
          Gender
          <br />
          <select
            value={form.gender}
            onChange={(e) => setForm({ ...form, gender: e.target.value })}
          >
            <option value="">—</option>
            <option value="male">male</option>
            <option value="female">female</option>
            <option value="others">others</option>
          </select>
        </label>
      </div>
      {text("height", "Height (m)", "number")}
      {text("weight", "Weight (kg)", "number")}
    </>
  );
}

export default function Home() {
  const client = useMemo(() => new PatientApiClient({ baseUrl: "" }), []);

  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [notice, setNotice] = useState<string | null>(null);

  const [info, setInfo] = useState<ApiInfo | null>(null);
  const [rows, setRows] = useState<Row[] | null>(null);
  const [lookupId, setLookupId] = useState("");
  const [found, setFound] = useState<Row | null>(null);
  const [sortBy, setSortBy] = useState<SortField>("height");
  const [order, setOrder] = useState<SortOrder>("asc");
  const [addForm, setAddForm] = useState<FormState>(emptyForm);
  const [updateId, setUpdateId] = useState("");
  const [updateForm, setUpdateForm] = useState<FormState>(emptyForm);
  const [deleteId, setDeleteId] = useState("");

  async function run(label: string, op: () => Promise<void>): Promise<void> {
    setLoading(true);
    setError(null);
    setNotice(null);
    try {
      await op();
    } catch (e) {
      setError(errorMessage(e, `Failed to ${label}`));
    } finally {
      setLoading(false);
    }
  }

  const loadInfo = () =>
    run("load API info", async () => setInfo(await client.info()));

  const loadAll = () =>
    run("load patients", async () => {
      const data = await client.listPatients();
      setRows(Object.entries(data).map(([id, view]) => ({ id, view })));
    });

  const loadSorted = () =>
    run("sort patients", async () => {
      const data = await client.sortPatients(sortBy, order);
      setRows(data.map((view) => ({ id: view.id, view })));
    });

  const lookup = () =>
    run("load patient", async () => {
      setFound(null);
      const view = await client.getPatient(lookupId.trim());
      setFound({ id: lookupId.trim(), view });
    });

  const add = () =>
    run("add patient", async () => {
      const res = await client.addPatient({
        id: addForm.id.trim(),
        ...formPayload(addForm),
      });
      setNotice(res.message);
      setAddForm(emptyForm);
    });

  const update = () =>
    run("update patient", async () => {
      const payload = formPayload(updateForm);
      if (Object.keys(payload).length === 0) {
        setNotice("No fields to update. Enter at least one field.");
        return;
      }
      const res = await client.updatePatient(updateId.trim(), payload);
      setNotice(res.message);
      setUpdateForm(emptyForm);
    });

  const remove = () =>
    run("delete patient", async () => {
      const res = await client.deletePatient(deleteId.trim());
      setNotice(res.message);
      setDeleteId("");
    });

  function downloadCsv(): void {
    if (!rows) return;
    const blob = new Blob([patientsToCsv(rows)], { type: "text/csv" });
    const url = URL.createObjectURL(blob);
    const a = document.createElement("a");
    a.href = url;
    a.download = "patients_data.csv";
    a.click();
    URL.revokeObjectURL(url);
  }

  return (
    <main>
      <h1>Patient Data Management</h1>

      {error ? (
        <p style={{ color: "crimson" }}>
          <code>{error}</code>
        </p>
      ) : null}
      {notice ? <p style={{ color: "seagreen" }}>{notice}</p> : null}

      <section>
        <h2>API information</h2>
        <button onClick={() => void loadInfo()} disabled={loading}>
          Get API info
        </button>
        {info ? <pre>{JSON.stringify(info, null, 2)}</pre> : null}
      </section>

      <section style={{ marginTop: 24 }}>
        <h2>Patients</h2>
        <button onClick={() => void loadAll()} disabled={loading}>
          {loading ? "Loading…" : "Load all patients"}
        </button>{" "}
        <select
          value={sortBy}
          onChange={(e) => {
            const v = e.target.value;
            setSortBy(v === "weight" || v === "bmi" ? v : "height");
          }}
        >
          <option value="height">height</option>
          <option value="weight">weight</option>
          <option value="bmi">bmi</option>
        </select>{" "}
        <select
          value={order}
          onChange={(e) => setOrder(e.target.value === "desc" ? "desc" : "asc")}
        >
          <option value="asc">asc</option>
          <option value="desc">desc</option>
        </select>{" "}
        <button onClick={() => void loadSorted()} disabled={loading}>
          Sort patients
        </button>{" "}
        <button onClick={downloadCsv} disabled={!rows || rows.length === 0}>
          Download as CSV
        </button>
        {rows ? <PatientTable rows={rows} /> : null}
      </section>

      <section style={{ marginTop: 24 }}>
        <h2>Get patient by ID</h2>
        <input
          value={lookupId}
          onChange={(e) => setLookupId(e.target.value)}
          placeholder="e.g. P001"
        />{" "}
        <button onClick={() => void lookup()} disabled={loading || !lookupId.trim()}>
          Get patient
        </button>
        {found ? <PatientTable rows={[found]} /> : null}
      </section>

      <section style={{ marginTop: 24 }}>
        <h2>Add patient</h2>
        <FormFields form={addForm} setForm={setAddForm} withId />
        <button
          style={{ marginTop: 12 }}
          onClick={() => void add()}
          disabled={loading || !addForm.id.trim()}
        >
          Add patient
        </button>
      </section>

      <section style={{ marginTop: 24 }}>
        <h2>Update patient</h2>
        <p>Leave a field empty to keep its current value.</p>
        <input
          value={updateId}
          onChange={(e) => setUpdateId(e.target.value)}
          placeholder="Patient ID to update"
        />
        <FormFields form={updateForm} setForm={setUpdateForm} withId={false} />
        <button
          style={{ marginTop: 12 }}
          onClick={() => void update()}
          disabled={loading || !updateId.trim()}
        >
          Update patient
        </button>
      </section>

      <section style={{ marginTop: 24 }}>
        <h2>Delete patient</h2>
        <input
          value={deleteId}
          onChange={(e) => setDeleteId(e.target.value)}
          placeholder="Patient ID to delete"
        />{" "}
        <button onClick={() => void remove()} disabled={loading || !deleteId.trim()}>
          Delete patient
        </button>
        {deleteId.trim() ? <p>This action cannot be undone.</p> : null}
      </section>
    </main>
  );
}
