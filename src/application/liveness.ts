const DAY_MS = 24 * 60 * 60 * 1000;

export interface LivenessSnapshot {
  last_receive_at: string | null;
  last_dispatch_at: string | null;
  last_error_at: string | null;
  working: boolean;
}

/**
 * Tracks receipt, dispatch and error times for the agent.
 *
 * Working means: something was received within the expected period, and
 * no error has been recorded since the last successful dispatch.
 */
export class AgentLiveness {
  private lastReceiveAt: Date | null = null;
  private lastDispatchAt: Date | null = null;
  private lastErrorAt: Date | null = null;

  constructor(
    private readonly expectedReceivePeriodDays: number,
    private readonly now: () => Date = () => new Date(),
  ) {}

  recordReceive(): void {
    this.lastReceiveAt = this.now();
  }

  recordDispatch(): void {
    this.lastDispatchAt = this.now();
  }

  recordError(): void {
    this.lastErrorAt = this.now();
  }

  hasRecentError(): boolean {
    if (this.lastErrorAt === null) return false;
    if (this.lastDispatchAt === null) return true;
    return this.lastErrorAt.getTime() >= this.lastDispatchAt.getTime();
  }

  isWorking(): boolean {
    if (this.lastReceiveAt === null) return false;
    const age = this.now().getTime() - this.lastReceiveAt.getTime();
    return age < this.expectedReceivePeriodDays * DAY_MS && !this.hasRecentError();
  }

  snapshot(): LivenessSnapshot {
    return {
      last_receive_at: this.lastReceiveAt?.toISOString() ?? null,
      last_dispatch_at: this.lastDispatchAt?.toISOString() ?? null,
      last_error_at: this.lastErrorAt?.toISOString() ?? null,
      working: this.isWorking(),
    };
  }
}
