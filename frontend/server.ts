import path from 'node:path';
import { DEFAULT_HOST, DEFAULT_PORT } from './lib/config.js';
import { StaticCorsServer } from './lib/static-server.js';

const ROOT_DIR = path.resolve(__dirname);

const server = new StaticCorsServer({
    rootDir: ROOT_DIR,
    port: DEFAULT_PORT,
    host: DEFAULT_HOST,
    logRequests: true,
});

function shutdown(): void {
    server
        .stop()
        .then(() => {
            console.log('\nServer stopped.');
            process.exit(0);
        })
        .catch((error) => {
            console.error('Error stopping server:', error);
            process.exit(1);
        });
}

server
    .start()
    .then((addr) => {
        console.log(`Starting frontend server on http://localhost:${addr.port}`);
        console.log(`Serving files from: ${server.rootDir}`);
        console.log('Press Ctrl+C to stop the server');
        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);
    })
    .catch((error) => {
        console.error('Failed to start server:', error instanceof Error ? error.message : error);
        process.exit(1);
    });
