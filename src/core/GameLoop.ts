import { Logger } from './Logger';

/** Requests the next frame callback; hosts plug in requestAnimationFrame or a timer. */
export interface FrameScheduler {
    request(cb: (nowMs: number) => void): number;
    cancel(handle: number): void;
}

/** Node host: ~60 Hz timer frames stamped with performance.now(). */
export const timerScheduler: FrameScheduler = {
    request(cb) {
        const handle = setTimeout(() => cb(performance.now()), 16);
        return Number(handle);
    },
    cancel(handle) {
        clearTimeout(handle);
    },
};

export interface GameLoopOptions {
    fixedHz?: number;
    maxCatchUpFrames?: number;
    scheduler?: FrameScheduler;
}

/**
 * Two-rate main loop. `sample` runs once per rendered frame with the raw delta (variable rate);
 * `update` runs zero or more times per frame with a fixed delta, so simulation results do not
 * depend on the host frame rate.
 */
export class GameLoop {
    private lastTime = 0;
    private accumulatedTime = 0;
    /** Fixed update interval in ms (logic tick). */
    private readonly fixedUpdateInterval: number;
    private readonly sample: (rawDeltaMs: number) => void;
    private readonly update: (fixedDeltaMs: number) => void;
    private readonly scheduler: FrameScheduler;
    private frameHandle: number | null = null;
    private maxCatchUpFrames = 5; // spiral-of-death guard
    private minDeltaClamp = 0.5; // clamp tiny deltas from timer jitter
    private maxDeltaClamp = 1000; // clamp huge pause/tab-switch spikes
    private ticks = 0;

    constructor(sampleCallback: (rawDeltaMs: number) => void, updateCallback: (fixedDeltaMs: number) => void, opts?: GameLoopOptions) {
        this.sample = sampleCallback;
        this.update = updateCallback;
        const hz = opts?.fixedHz && opts.fixedHz > 0 ? opts.fixedHz : 60;
        this.fixedUpdateInterval = 1000 / hz;
        if (opts?.maxCatchUpFrames && opts.maxCatchUpFrames > 0) this.maxCatchUpFrames = opts.maxCatchUpFrames;
        this.scheduler = opts?.scheduler ?? timerScheduler;
    }

    public get intervalMs(): number {
        return this.fixedUpdateInterval;
    }

    /** Number of fixed updates run since construction. */
    public get tickCount(): number {
        return this.ticks;
    }

    public isRunning(): boolean {
        return this.frameHandle !== null;
    }

    public start(): void {
        if (this.frameHandle !== null) {
            Logger.debug('[GameLoop] start() ignored; already running');
            return;
        }
        this.resetTiming();
        this.frameHandle = this.scheduler.request(now => this.onFrame(now));
    }

    public stop(): void {
        if (this.frameHandle !== null) {
            this.scheduler.cancel(this.frameHandle);
            this.frameHandle = null;
        }
    }

    /**
     * Reset internal timers so that after a manual pause we don't process a huge delta.
     */
    public resetTiming(): void {
        this.lastTime = 0;
        this.accumulatedTime = 0;
    }

    /**
     * Advance by one rendered frame of `deltaMs`. Returns how many fixed updates ran.
     */
    public advance(deltaMs: number): number {
        if (deltaMs < this.minDeltaClamp) deltaMs = this.minDeltaClamp;
        if (deltaMs > this.maxDeltaClamp) deltaMs = this.fixedUpdateInterval; // huge spike -> single tick

        this.sample(deltaMs);

        this.accumulatedTime += deltaMs;
        const cap = this.fixedUpdateInterval * this.maxCatchUpFrames;
        if (this.accumulatedTime > cap) this.accumulatedTime = cap; // drop excess backlog
        let ran = 0;
        while (this.accumulatedTime >= this.fixedUpdateInterval) {
            this.update(this.fixedUpdateInterval);
            this.accumulatedTime -= this.fixedUpdateInterval;
            ran++;
        }
        this.ticks += ran;
        return ran;
    }

    private onFrame(currentTime: number): void {
        if (this.lastTime === 0) this.lastTime = currentTime;
        const deltaMs = currentTime - this.lastTime;
        this.lastTime = currentTime;
        this.advance(deltaMs);
        if (this.frameHandle !== null) {
            this.frameHandle = this.scheduler.request(now => this.onFrame(now));
        }
    }
}
