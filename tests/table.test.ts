import { describe, expect, it } from "vitest";
import { EMPTY_TABLE_MESSAGE, TABLE_COLUMNS, TableController, toRow } from "../src/browser/table.js";
import { makeRepository } from "./helpers.js";

const alpha = makeRepository({ name: "alpha" });
const beta = makeRepository({ name: "beta" });
const gamma = makeRepository({ name: "gamma" });

describe("toRow", () => {
  it("renders name, truncated description, language, counts and update date", () => {
    const row = toRow(
      makeRepository({
        name: "tool",
        description: "x".repeat(45),
        language: "Rust",
        stargazers_count: 12,
        forks_count: 3,
        updated_at: "2024-03-05T10:00:00Z"
      })
    );
    expect(row.key).toBe("octo/tool");
    expect(row.cells).toEqual(["tool", `${"x".repeat(37)}...`, "Rust", "12", "3", "2024-03-05"]);
  });

  it("uses N/A for a missing update date", () => {
    expect(toRow(alpha).cells[5]).toBe("N/A");
  });
});

describe("TableController", () => {
  it("maps a row key back to its record", () => {
    const table = new TableController();
    table.sync([alpha, beta]);
    expect(table.select("octo/beta")).toBe(beta);
    expect(table.selectedIndex).toBe(1);
    expect(table.selected).toBe(beta);
  });

  it("keeps the selection when an unknown key is selected", () => {
    const table = new TableController();
    table.sync([alpha, beta]);
    table.select("octo/alpha");
    expect(table.select("octo/missing")).toBeUndefined();
    expect(table.selectedIndex).toBe(0);
  });

  it("follows the selected record to its new position after sync", () => {
    const table = new TableController();
    table.sync([alpha, beta, gamma]);
    table.select("octo/gamma");
    table.sync([gamma, alpha]);
    expect(table.selectedIndex).toBe(0);
    expect(table.selected).toBe(gamma);
  });

  it("clears the selection when the selected record is filtered out", () => {
    const table = new TableController();
    table.sync([alpha, beta]);
    table.select("octo/beta");
    table.sync([alpha]);
    expect(table.selectedIndex).toBeUndefined();
    expect(table.selected).toBeUndefined();
  });

  it("keeps the selection index inside the rows after every sync", () => {
    const table = new TableController();
    const all = [alpha, beta, gamma];
    const subsets = [[alpha, beta, gamma], [gamma], [], [beta, gamma], [alpha]];
    table.sync(all);
    table.selectIndex(2);
    for (const subset of subsets) {
      table.sync(subset);
      const index = table.selectedIndex;
      if (index !== undefined) {
        expect(index).toBeGreaterThanOrEqual(0);
        expect(index).toBeLessThan(subset.length);
      }
      table.selectIndex(subset.length - 1);
    }
  });

  it("clamps movement to the row range and starts at the first row", () => {
    const table = new TableController();
    table.sync([alpha, beta]);
    expect(table.move(1)).toBe(alpha);
    expect(table.move(5)).toBe(beta);
    expect(table.move(-9)).toBe(alpha);
  });

  it("renders an explicit empty state instead of headers", () => {
    const table = new TableController();
    table.sync([]);
    expect(table.view()).toEqual({ kind: "empty", message: EMPTY_TABLE_MESSAGE });
    expect(table.move(1)).toBeUndefined();
    expect(table.selectedIndex).toBeUndefined();
  });

  it("renders columns, rows and selection when populated", () => {
    const table = new TableController();
    table.sync([alpha]);
    table.selectIndex(0);
    const view = table.view();
    expect(view.kind).toBe("rows");
    if (view.kind === "rows") {
      expect(view.columns).toEqual(TABLE_COLUMNS);
      expect(view.rows.map(row => row.key)).toEqual(["octo/alpha"]);
      expect(view.selectedIndex).toBe(0);
    }
  });
});
