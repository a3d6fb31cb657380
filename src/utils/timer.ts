export class StepTimer {
  private start: bigint = process.hrtime.bigint();

  begin(): void {
    this.start = process.hrtime.bigint();
  }

  elapsed(): number {
    const end = process.hrtime.bigint();
    return Number((end - this.start) / 1_000_000n);
  }

  async measure<T>(fn: () => Promise<T>): Promise<{ value: T; durationMs: number }> {
    this.begin();
    const value = await fn();
    return { value, durationMs: this.elapsed() };
  }
}
