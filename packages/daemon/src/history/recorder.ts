import type { TimeSeriesRecord } from "@hearth/shared";

/** In-memory, append-only series. One row per completed tick. */
export class TimeSeriesRecorder {
  private rows: Readonly<TimeSeriesRecord>[] = [];

  append(row: TimeSeriesRecord): void {
    this.rows.push(Object.freeze({ ...row }));
  }

  export(): readonly Readonly<TimeSeriesRecord>[] {
    return Object.freeze([...this.rows]);
  }

  get size(): number {
    return this.rows.length;
  }
}
