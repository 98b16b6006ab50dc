import http from 'http';
import { createApp, createDependencies } from './presentation/app';
import { StreamingGateway } from './presentation/streaming/StreamingGateway';
import { loadConfig, validateConfig } from './config';

async function main(): Promise<void> {
    console.log('🎬 Avatar Stream Server - Bootstrap...');

    try {
        // 1. Load and validate configuration
        console.log('📋 Loading configuration...');
        const config = loadConfig();

        console.log('🔍 Validating configuration...');
        const configErrors = validateConfig(config);

        if (configErrors.length > 0) {
            console.error('❌ Configuration validation failed:');
            configErrors.forEach((error) => console.error(`  - ${error}`));
            process.exit(1);
        }

        // 2. Create the service context and both transports
        console.log('🚀 Initializing application components...');
        const deps = await createDependencies(config);
        const app = createApp(deps);
        const server = http.createServer(app);
        const gateway = new StreamingGateway(server, deps.context);

        server.listen(config.port, () => {
            console.log(`✅ Server running on http://localhost:${config.port}`);
            console.log(`   Streaming: ws://localhost:${config.port}${config.streaming.path}`);
            console.log(`   Environment: ${config.environment}`);
            console.log(`   Work dir: ${config.workDir}`);
        });

        // 3. Graceful shutdown
        let shuttingDown = false;
        const shutdown = async (signal: string): Promise<void> => {
            if (shuttingDown) return;
            shuttingDown = true;
            console.log(`🛑 ${signal} received, shutting down...`);
            await gateway.close();
            await deps.context.shutdown();
            await new Promise<void>((resolve) => server.close(() => resolve()));
            console.log('👋 Bye');
        };

        for (const signal of ['SIGINT', 'SIGTERM'] as const) {
            process.on(signal, () => {
                shutdown(signal)
                    .then(() => process.exit(0))
                    .catch((error) => {
                        console.error('💥 Error during shutdown:', error);
                        process.exit(1);
                    });
            });
        }
    } catch (error) {
        console.error('💥 Fatal error during bootstrap:', error);
        process.exit(1);
    }
}

main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
});
