#!/usr/bin/env node
import Bridge from './bridge';
import { loadConfig } from './config';

async function main(): Promise<void> {
    const bridge = new Bridge(loadConfig());

    let stopping: Promise<void> | null = null;
    const shutdown = (signal: string) => {
        if (stopping) return stopping;
        console.log(`[Bridge] ${signal} received`);
        stopping = bridge.stop().catch(err => {
            console.error('[Bridge] Shutdown error:', err);
            process.exitCode = 1;
        });
        return stopping;
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));

    await bridge.start();

    try {
        await bridge.done;
    } catch (err) {
        // Already logged by the bridge
        process.exitCode = 1;
        await shutdown('fatal error');
    }
}

main().catch(err => {
    console.error('[Bridge] Failed to start:', err instanceof Error ? err.message : err);
    process.exit(1);
});
