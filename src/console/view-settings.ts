import { ValidationError } from "../domain/errors.js";
import { assertColumnName, type CellValue, columnNames, REQUIRED_VIEW_COLUMNS, type TableName } from "../domain/tables.js";

export type ViewRow = Readonly<Record<string, CellValue>>;
export type SortOrder = "asc" | "desc";

export interface ViewFilter {
  column: string;
  /** Case-insensitive substring the cell must contain. */
  contains: string;
}

export interface ViewRequest {
  /** Columns to show; every column when omitted. */
  columns?: readonly string[];
  sortBy?: string;
  order?: SortOrder;
  filter?: ViewFilter;
}

export interface TableView {
  table: TableName;
  columns: string[];
  rows: Record<string, CellValue>[];
  /** Set when the request tried to hide the required column. */
  warning?: string;
}

export interface ColumnSelection {
  columns: string[];
  warning?: string;
}

/**
 * Resolve which columns a view shows. The table's required column is always
 * present and always first when the selection is the default.
 */
export function selectColumns(table: TableName, requested?: readonly string[]): ColumnSelection {
  const required: string = REQUIRED_VIEW_COLUMNS[table];
  const all = columnNames(table);

  if (requested === undefined) {
    return { columns: [required, ...all.filter((column) => column !== required)] };
  }

  const columns: string[] = [];
  for (const column of requested) {
    assertColumnName(table, column);
    if (!columns.includes(column)) columns.push(column);
  }

  if (!columns.includes(required)) {
    return {
      columns: [required, ...columns],
      warning: `The '${required}' column cannot be removed.`,
    };
  }
  return { columns };
}

/** Nulls last in either direction; numbers numerically; everything else by string value. */
export function compareCells(a: CellValue, b: CellValue, order: SortOrder): number {
  if (a === null && b === null) return 0;
  if (a === null) return 1;
  if (b === null) return -1;

  let result: number;
  if (typeof a === "number" && typeof b === "number") {
    result = a - b;
  } else {
    const left = String(a);
    const right = String(b);
    result = left < right ? -1 : left > right ? 1 : 0;
  }
  return order === "asc" ? result : -result;
}

function cell(row: ViewRow, column: string): CellValue {
  return row[column] ?? null;
}

export function applyView(table: TableName, rows: readonly ViewRow[], request: ViewRequest = {}): TableView {
  const { columns, warning } = selectColumns(table, request.columns);

  let selected = [...rows];

  if (request.filter) {
    const column = assertColumnName(table, request.filter.column);
    const needle = request.filter.contains.toLowerCase();
    selected = selected.filter((row) => {
      const value = cell(row, column);
      return value !== null && String(value).toLowerCase().includes(needle);
    });
  }

  if (request.sortBy !== undefined) {
    const column = assertColumnName(table, request.sortBy);
    const order = request.order ?? "asc";
    if (order !== "asc" && order !== "desc") {
      throw new ValidationError(`Sort order must be "asc" or "desc"`, ["order"]);
    }
    selected.sort((a, b) => compareCells(cell(a, column), cell(b, column), order));
  }

  const view: TableView = {
    table,
    columns,
    rows: selected.map((row) => Object.fromEntries(columns.map((column) => [column, cell(row, column)]))),
  };
  if (warning) view.warning = warning;
  return view;
}
