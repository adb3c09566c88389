import { ProgressEvent } from "../models/download.model";

/**
 * Turns raw byte-progress callbacks for one transfer into coalesced
 * progress events: an event is produced only once the percentage has moved
 * at least `step` points past the last one produced.
 */
export class ProgressReporter {
  private lastPercent: number | undefined;

  constructor(
    private readonly filename: string,
    private readonly step: number = 5,
  ) {}

  report(current: number, total: number): ProgressEvent | undefined {
    const percent = total > 0 ? Math.floor((current * 100) / total) : 0;

    if (this.lastPercent !== undefined && percent - this.lastPercent < this.step) {
      return undefined;
    }
    this.lastPercent = percent;

    return {
      filename: this.filename,
      currentBytes: current,
      totalBytes: total,
      percent,
      done: false,
    };
  }

  complete(size: number): ProgressEvent {
    this.lastPercent = 100;
    return {
      filename: this.filename,
      currentBytes: size,
      totalBytes: size,
      percent: 100,
      done: true,
    };
  }

  /** Zero-progress terminal event; tells the dashboard to drop the indicator. */
  aborted(): ProgressEvent {
    return {
      filename: this.filename,
      currentBytes: 0,
      totalBytes: 0,
      percent: 0,
      done: true,
    };
  }
}
