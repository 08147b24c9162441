export class StepTimer {
  private start: bigint = 0n;
  private startedAt: Date = new Date(0);

  begin(): Date {
    this.start = process.hrtime.bigint();
    this.startedAt = new Date();
    return this.startedAt;
  }

  elapsed(): number {
    const end = process.hrtime.bigint();
    return Number((end - this.start) / 1_000_000n);
  }
}
