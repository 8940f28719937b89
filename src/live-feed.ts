import * as CONST from './constants';
import { Scheduler, systemScheduler } from './scheduler';
import SharedState from './shared-state';
import { Logger, Snapshot, StatusPayload, ValueMap } from './types';

/**
 * A push channel to one dashboard viewer (one WebSocket in production).
 */
export interface FeedViewer {
    readonly id: string;
    send(frame: string): Promise<void>;
    /** Called once when the subscription ends because a push failed */
    close?(): void;
}

interface Subscription {
    viewer: FeedViewer;
    abort: AbortController;
    done: Promise<void>;
}

export interface LiveFeedOptions {
    intervalMs?: number;
    scheduler?: Scheduler;
    logger?: Logger;
}

function plainValues(map: ValueMap): Record<string, number | boolean> {
    const out: Record<string, number | boolean> = {};
    for (const [name, value] of Object.entries(map)) out[name] = value.value;
    return out;
}

/**
 * Serialize a snapshot into the status/live feed wire shape
 */
export function toStatusPayload(snapshot: Snapshot, now: Date): StatusPayload {
    return {
        timestamp: now.toISOString(),
        connected: snapshot.status === 'connected',
        values: plainValues(snapshot.values),
        setpoints: plainValues(snapshot.setpoints)
    };
}

/**
 * Pushes the current snapshot to every subscribed viewer on a fixed cadence.
 * Each viewer has its own task; a failed push ends only that viewer's subscription.
 */
export class LiveFeedPublisher {
    private subscriptions: Map<string, Subscription>;
    private intervalMs: number;
    private scheduler: Scheduler;
    private logger: Logger;

    constructor(private state: SharedState, options: LiveFeedOptions = {}) {
        this.subscriptions = new Map();
        this.intervalMs = options.intervalMs ?? CONST.DEFAULT_PUBLISH_INTERVAL;
        this.scheduler = options.scheduler ?? systemScheduler;
        this.logger = options.logger ?? console;
    }

    get viewerCount(): number {
        return this.subscriptions.size;
    }

    /**
     * Start pushing to `viewer`. The returned promise resolves when the subscription ends.
     */
    subscribe(viewer: FeedViewer): Promise<void> {
        this.unsubscribe(viewer.id);
        const abort = new AbortController();
        const subscription: Subscription = { viewer, abort, done: Promise.resolve() };
        subscription.done = this.pump(viewer, abort.signal).finally(() => {
            if (this.subscriptions.get(viewer.id) === subscription) {
                this.subscriptions.delete(viewer.id);
            }
        });
        this.subscriptions.set(viewer.id, subscription);
        this.logger.log(`[Bridge] Viewer ${viewer.id} subscribed (${this.subscriptions.size} active)`);
        return subscription.done;
    }

    /**
     * End a viewer's subscription, e.g. when its socket closed
     */
    unsubscribe(id: string): void {
        const subscription = this.subscriptions.get(id);
        if (!subscription) return;
        subscription.abort.abort();
        this.subscriptions.delete(id);
    }

    /**
     * End every subscription and wait for the per-viewer tasks to exit
     */
    async close(): Promise<void> {
        const pending = [...this.subscriptions.values()];
        for (const subscription of pending) subscription.abort.abort();
        this.subscriptions.clear();
        await Promise.all(pending.map(s => s.done));
    }

    private async pump(viewer: FeedViewer, signal: AbortSignal): Promise<void> {
        while (!signal.aborted) {
            const frame = JSON.stringify(toStatusPayload(this.state.read(), this.scheduler.now()));
            try {
                await viewer.send(frame);
            } catch (e) {
                this.logger.warn(`[Bridge] Viewer ${viewer.id} dropped: ${e instanceof Error ? e.message : String(e)}`);
                viewer.close?.();
                return;
            }
            await this.scheduler.sleep(this.intervalMs, signal);
        }
        this.logger.log(`[Bridge] Viewer ${viewer.id} unsubscribed`);
    }
}

export default LiveFeedPublisher;
