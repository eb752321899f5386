/**
 * Row access over one table's record data
 */

import type { Result } from "@metalayout/frontend";
import {
  type LayoutArtifacts,
  type LayoutContext,
  evaluateWidth,
} from "@metalayout/layout";
import { type CursorFault, RecordCursor } from "./cursor.js";
import { type DecodedRecord, decodeRecord } from "./decoder.js";

export class TableReader {
  readonly width: number;
  readonly rowCount: number;

  private constructor(
    readonly name: string,
    readonly id: number,
    private readonly artifacts: LayoutArtifacts,
    private readonly layout: LayoutContext,
    private readonly data: Uint8Array
  ) {
    const formula = artifacts.widths.get(name);
    this.width = formula ? evaluateWidth(formula, layout) : 0;
    this.rowCount = this.width > 0 ? Math.floor(data.byteLength / this.width) : 0;
  }

  /**
   * Reader for `table`, whose rows start at the beginning of `data`.
   */
  static open(
    artifacts: LayoutArtifacts,
    layout: LayoutContext,
    table: string,
    data: Uint8Array
  ): TableReader | undefined {
    const entry = artifacts.catalog.byName.get(table);
    if (!entry || !artifacts.plans.has(table)) {
      return undefined;
    }
    return new TableReader(table, entry.id, artifacts, layout, data);
  }

  /**
   * Decode the 0-based row `index`. The cursor only sees that row's bytes,
   * so a plan can never read into the next record.
   */
  row(index: number): Result<DecodedRecord, CursorFault> {
    const plan = this.artifacts.plans.get(this.name);
    const start = index * this.width;
    if (
      !plan ||
      !Number.isInteger(index) ||
      index < 0 ||
      start + this.width > this.data.byteLength
    ) {
      return {
        ok: false,
        error: {
          kind: "eof",
          offset: start,
          message: `Row ${index} is outside table '${this.name}' (${this.rowCount} rows)`,
        },
      };
    }

    const cursor = new RecordCursor(
      this.data.subarray(start, start + this.width),
      this.layout
    );
    return decodeRecord(plan, cursor, this.artifacts.dispatch);
  }
}
