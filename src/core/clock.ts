/**
 * Time source for accrual and timelocks. All protocol timestamps are integer
 * seconds.
 */
export interface Clock {
    now(): number;
}

export class SystemClock implements Clock {
    now(): number {
        return Math.floor(Date.now() / 1000);
    }
}

export class ManualClock implements Clock {
    constructor(private current: number = 1_700_000_000) {}

    now(): number {
        return this.current;
    }

    set(timestamp: number): void {
        this.current = Math.floor(timestamp);
    }

    advance(seconds: number): number {
        this.current += Math.floor(seconds);
        return this.current;
    }
}
