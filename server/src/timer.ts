// ============================================
// Repeating Timer
// Countdown driven by tick deltas, fires once per period
// ============================================

export interface TimerSnapshot {
  elapsed: number;
  finishedThisTick: number;
}

export class RepeatingTimer {
  private elapsed = 0;
  private finishedThisTick = 0;

  /**
   * @param period - Seconds between firings (> 0)
   */
  constructor(readonly period: number) {
    if (!Number.isFinite(period) || period <= 0) {
      throw new RangeError(`Timer period must be a finite number > 0, got ${period}`);
    }
  }

  /**
   * Consume dt seconds. Whole periods crossed are subtracted, the
   * remainder carries over to the next tick.
   */
  tick(dt: number): void {
    if (!Number.isFinite(dt) || dt < 0) {
      throw new RangeError(`Timer delta must be a finite number >= 0, got ${dt}`);
    }

    this.elapsed += dt;
    this.finishedThisTick = 0;
    while (this.elapsed >= this.period) {
      this.elapsed -= this.period;
      this.finishedThisTick++;
    }
  }

  /**
   * True only on the tick the timer crossed its period.
   */
  justFinished(): boolean {
    return this.finishedThisTick > 0;
  }

  /**
   * How many periods the last tick crossed (a long tick can cross several).
   */
  timesFinishedThisTick(): number {
    return this.finishedThisTick;
  }

  get remaining(): number {
    return this.period - this.elapsed;
  }

  snapshot(): TimerSnapshot {
    return { elapsed: this.elapsed, finishedThisTick: this.finishedThisTick };
  }

  restore(snapshot: TimerSnapshot): void {
    this.elapsed = snapshot.elapsed;
    this.finishedThisTick = snapshot.finishedThisTick;
  }

  reset(): void {
    this.elapsed = 0;
    this.finishedThisTick = 0;
  }
}
