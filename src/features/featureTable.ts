import { InvalidArgumentError } from "../common/errors.js";
import type { FeatureRow } from "../types.js";

export class FeatureTable {
  private readonly rowList: FeatureRow[] = [];
  private readonly columnOrder: string[] = [];
  private readonly knownColumns = new Set<string>();

  static concat(tables: readonly FeatureTable[]): FeatureTable {
    const merged = new FeatureTable();
    for (const table of tables) {
      for (const row of table.rows) {
        merged.append(row);
      }
    }
    return merged;
  }

  static fromRows(rows: readonly FeatureRow[]): FeatureTable {
    const table = new FeatureTable();
    for (const row of rows) {
      table.append(row);
    }
    return table;
  }

  get size(): number {
    return this.rowList.length;
  }

  get rows(): readonly FeatureRow[] {
    return this.rowList;
  }

  /** Union of row labels in first-seen order. */
  get columns(): readonly string[] {
    return this.columnOrder;
  }

  append(row: FeatureRow): void {
    if (typeof row !== "object" || row === null || Array.isArray(row)) {
      throw new InvalidArgumentError("feature row must be a label to number mapping");
    }
    for (const [label, value] of Object.entries(row)) {
      if (typeof value !== "number") {
        throw new InvalidArgumentError(`feature ${label} must be numeric`);
      }
      if (!this.knownColumns.has(label)) {
        this.knownColumns.add(label);
        this.columnOrder.push(label);
      }
    }
    this.rowList.push({ ...row });
  }

  hasColumn(label: string): boolean {
    return this.knownColumns.has(label);
  }

  /** Column values in row order, NaN where a row lacks the label. */
  column(label: string): number[] {
    if (!this.knownColumns.has(label)) {
      throw new InvalidArgumentError(`unknown column: ${label}`);
    }
    return this.rowList.map((row) => row[label] ?? Number.NaN);
  }
}
