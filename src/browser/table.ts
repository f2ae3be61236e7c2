// CHANGE: Keep the rendered row list and selection in step with the filtered collection.
// WHY: A defined selection index must always point into the current rows.

import { BROWSER } from "../config.js";
import type { Repository } from "../types.js";
import { formatDate, truncate } from "../utils/format.js";

export const TABLE_COLUMNS = ["Name", "Description", "Language", "Stars", "Forks", "Updated"] as const;

export const EMPTY_TABLE_MESSAGE = "No repositories match the current filters.";

/**
 * One rendered row; `key` is the record's full name.
 */
export interface TableRow {
  readonly key: string;
  readonly cells: readonly string[];
}

export type TableView =
  | { readonly kind: "empty"; readonly message: string }
  | {
      readonly kind: "rows";
      readonly columns: readonly string[];
      readonly rows: readonly TableRow[];
      readonly selectedIndex: number | undefined;
    };

export function toRow(repository: Repository): TableRow {
  return {
    key: repository.full_name,
    cells: [
      repository.name,
      truncate(repository.description ?? "", BROWSER.DESCRIPTION_WIDTH),
      repository.language ?? "",
      String(repository.stargazers_count),
      String(repository.forks_count),
      formatDate(repository.updated_at) ?? "N/A"
    ]
  };
}

export class TableController {
  private records: Repository[] = [];
  private rowList: TableRow[] = [];
  private selection: number | undefined;

  /**
   * Rebuild rows from `filtered`.
   *
   * The selection follows the previously selected full name; when that record
   * is gone the selection is cleared.
   */
  sync(filtered: readonly Repository[]): void {
    const previousKey = this.selected?.full_name;
    this.records = [...filtered];
    this.rowList = this.records.map(toRow);
    const index = previousKey === undefined ? -1 : this.records.findIndex(record => record.full_name === previousKey);
    this.selection = index >= 0 ? index : undefined;
  }

  /**
   * Select the row whose key equals `rowKey`.
   *
   * @returns The selected record, or undefined (selection unchanged) when no row has that key.
   */
  select(rowKey: string): Repository | undefined {
    const index = this.records.findIndex(record => record.full_name === rowKey);
    if (index < 0) {
      return undefined;
    }
    this.selection = index;
    return this.records[index];
  }

  /**
   * Select by position, clamped into range. No-op on an empty table.
   */
  selectIndex(index: number): Repository | undefined {
    if (this.records.length === 0) {
      this.selection = undefined;
      return undefined;
    }
    this.selection = Math.min(Math.max(Math.trunc(index), 0), this.records.length - 1);
    return this.records[this.selection];
  }

  /**
   * Move the selection by `delta` rows; selects the first row when nothing is selected.
   */
  move(delta: number): Repository | undefined {
    return this.selectIndex(this.selection === undefined ? 0 : this.selection + delta);
  }

  get selectedIndex(): number | undefined {
    return this.selection;
  }

  get selected(): Repository | undefined {
    return this.selection === undefined ? undefined : this.records[this.selection];
  }

  get items(): readonly Repository[] {
    return this.records;
  }

  get rows(): readonly TableRow[] {
    return this.rowList;
  }

  view(): TableView {
    if (this.rowList.length === 0) {
      return { kind: "empty", message: EMPTY_TABLE_MESSAGE };
    }
    return { kind: "rows", columns: TABLE_COLUMNS, rows: this.rowList, selectedIndex: this.selection };
  }
}
