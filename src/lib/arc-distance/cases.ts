import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { CaseTableError, ValidationError } from "./errors";
import { HALF_TURN_DEGREES, type CaseTableFile, type RegressionCase, type RegressionCaseInput } from "./types";
import { parseAngle } from "./validation";

export interface RegressionCaseStoreLike {
  list(): Promise<RegressionCase[]>;
  add(input: RegressionCaseInput): Promise<RegressionCase>;
}

type StoredCaseRow = Omit<RegressionCase, "label">;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function normalizeNote(note?: string): string | undefined {
  if (note === undefined) {
    return undefined;
  }

  const trimmed = note.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function formatCaseLabel(entry: Pick<RegressionCase, "a" | "b" | "note">): string {
  const base = `a=${entry.a}, b=${entry.b}`;
  return entry.note ? `${base} (${entry.note})` : base;
}

function parseCaseRow(value: unknown, index: number): RegressionCase {
  if (!isRecord(value)) {
    throw new CaseTableError("invalid_case_row", `Case at index ${index} must be an object.`);
  }

  const { id, a, b, expected, note, addedAtMs } = value;
  if (typeof id !== "string" || !id.trim()) {
    throw new CaseTableError("invalid_case_row", `Case at index ${index} is missing an id.`);
  }

  if (!isFiniteNumber(a) || !isFiniteNumber(b) || !isFiniteNumber(expected)) {
    throw new CaseTableError("invalid_case_row", `Case ${id} must have finite numeric a, b and expected values.`);
  }

  if (!isFiniteNumber(addedAtMs)) {
    throw new CaseTableError("invalid_case_row", `Case ${id} is missing addedAtMs.`);
  }

  let rawNote: string | undefined;
  if (typeof note === "string") {
    rawNote = note;
  } else if (note !== undefined) {
    throw new CaseTableError("invalid_case_row", `Case ${id} has a non-string note.`);
  }

  const normalizedNote = normalizeNote(rawNote);
  return {
    id,
    label: formatCaseLabel({ a, b, note: normalizedNote }),
    a,
    b,
    expected,
    note: normalizedNote,
    addedAtMs,
  };
}

export function parseCaseTable(raw: unknown): CaseTableFile {
  if (!isRecord(raw) || raw.version !== 1 || !Array.isArray(raw.cases)) {
    throw new CaseTableError("unsupported_case_table", "Case table must be an object with version 1 and a cases array.");
  }

  const cases = raw.cases.map((row, index) => parseCaseRow(row, index));
  const seen = new Set<string>();
  for (const entry of cases) {
    if (seen.has(entry.id)) {
      throw new CaseTableError("duplicate_case_id", `Case id ${entry.id} appears more than once.`);
    }
    seen.add(entry.id);
  }

  return { version: 1, cases };
}

function toStoredRow(entry: RegressionCase): StoredCaseRow {
  const row: StoredCaseRow = {
    id: entry.id,
    a: entry.a,
    b: entry.b,
    expected: entry.expected,
    addedAtMs: entry.addedAtMs,
  };

  if (entry.note) {
    row.note = entry.note;
  }

  return row;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export async function loadCaseTable(filePath: string): Promise<CaseTableFile> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      return { version: 1, cases: [] };
    }

    throw new CaseTableError("unreadable_case_table", `Could not read case table at ${filePath}.`, error);
  }

  if (!raw.trim()) {
    return { version: 1, cases: [] };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new CaseTableError("malformed_case_table", `Case table at ${filePath} is not valid JSON.`, error);
  }

  return parseCaseTable(parsed);
}

/**
 * File-backed table of regression cases. Rows are only ever appended: a case
 * that once exposed a bug stays in the table for good.
 */
export class RegressionCaseStore implements RegressionCaseStoreLike {
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    private readonly now: () => number = Date.now,
  ) {}

  async list(): Promise<RegressionCase[]> {
    const table = await loadCaseTable(this.filePath);
    return table.cases;
  }

  async add(input: RegressionCaseInput): Promise<RegressionCase> {
    const task = this.queue.then(() => this.append(input));
    this.queue = task.then(
      () => undefined,
      () => undefined,
    );
    return task;
  }

  private async append(input: RegressionCaseInput): Promise<RegressionCase> {
    const a = parseAngle(input.a, "a");
    const b = parseAngle(input.b, "b");
    const expected = parseAngle(input.expected, "expected");
    if (expected < 0 || expected > HALF_TURN_DEGREES) {
      throw new ValidationError("invalid_expected", `expected must lie in [0, ${HALF_TURN_DEGREES}], got ${expected}.`);
    }

    const table = await loadCaseTable(this.filePath);
    const existing = table.cases.find(entry => entry.a === a && entry.b === b);
    if (existing) {
      throw new ValidationError("duplicate_case", `A case for a=${a}, b=${b} already exists (${existing.id}).`);
    }

    const note = normalizeNote(input.note);
    const entry: RegressionCase = {
      id: `case-${table.cases.length + 1}`,
      label: formatCaseLabel({ a, b, note }),
      a,
      b,
      expected,
      note,
      addedAtMs: this.now(),
    };

    const next = { version: 1, cases: [...table.cases, entry].map(toStoredRow) };
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, `${JSON.stringify(next, null, 2)}\n`, "utf8");

    return entry;
  }
}
