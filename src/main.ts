import { loadConfig, loadPolicy } from './config/Config.js';
import { SQLiteLedgerStore } from './infrastructure/persistence/SQLiteLedgerStore.js';
import { ConstraintKernel } from './kernel-core/Kernel.js';
import { KernelServer } from './server/Server.js';

async function main(): Promise<void> {
    const config = loadConfig();
    const policy = await loadPolicy(config.policyPath);
    const store = new SQLiteLedgerStore(config.ledgerPath);

    const kernel = await ConstraintKernel.open({ store, policy });
    const server = new KernelServer(kernel, { corsOrigins: config.corsOrigins });
    await server.start(config.port);

    const shutdown = (signal: string) => {
        console.log(`[KernelServer] ${signal} received, shutting down.`);
        server.close()
            .then(() => store.close())
            .then(() => process.exit(0))
            .catch((e: unknown) => {
                console.error('[KernelServer] Shutdown failed:', e);
                process.exit(1);
            });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((e: unknown) => {
    console.error('[Kernel] Startup failed:', e);
    process.exit(1);
});
