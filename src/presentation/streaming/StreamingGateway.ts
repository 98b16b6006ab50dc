import type { Server } from 'http';
import { RawData, WebSocket, WebSocketServer } from 'ws';
import { v4 as uuidv4 } from 'uuid';
import { ServiceContext } from '../../application/ServiceContext';
import { StreamingConnection } from './StreamingConnection';
import { createWsTransport } from './wsTransport';

const CLOSE_GOING_AWAY = 1001;

function rawDataToString(data: RawData): string {
    if (Buffer.isBuffer(data)) {
        return data.toString('utf8');
    }
    if (Array.isArray(data)) {
        return Buffer.concat(data).toString('utf8');
    }
    return Buffer.from(data).toString('utf8');
}

/**
 * WebSocket endpoint for streaming generation, attached to the HTTP server.
 * Frames above the configured payload limit are closed by ws with 1009.
 */
export class StreamingGateway {
    private readonly wss: WebSocketServer;
    private readonly sockets: Set<WebSocket> = new Set();

    constructor(server: Server, private readonly context: ServiceContext) {
        const { path, maxPayloadBytes } = context.config.streaming;
        this.wss = new WebSocketServer({ server, path, maxPayload: maxPayloadBytes });
        this.wss.on('connection', (socket) => this.handleConnection(socket));
        console.log(`[Stream] WebSocket endpoint listening at ${path}`);
    }

    get connectionCount(): number {
        return this.sockets.size;
    }

    private handleConnection(socket: WebSocket): void {
        const clientId = `client_${Date.now()}_${uuidv4().substring(0, 8)}`;
        const session = this.context.openSession(clientId);
        const connection = new StreamingConnection(createWsTransport(socket), session, this.context);
        this.sockets.add(socket);
        console.log(`[Stream] Client ${clientId} connected`);

        socket.on('message', (data, isBinary) => {
            if (isBinary) {
                connection.rejectBinary();
                return;
            }
            connection.receive(rawDataToString(data));
        });

        socket.on('close', (code) => {
            this.sockets.delete(socket);
            connection.close();
            console.log(`[Stream] Client ${clientId} disconnected (${code})`);
        });

        socket.on('error', (err) => {
            console.warn(`[Stream] Socket error for ${clientId}: ${err.message}`);
        });

        connection.start();
    }

    /**
     * Closes every client connection and stops accepting new ones.
     */
    async close(): Promise<void> {
        for (const socket of this.sockets) {
            socket.close(CLOSE_GOING_AWAY, 'Server shutting down');
        }
        await new Promise<void>((resolve, reject) => {
            this.wss.close((err) => (err ? reject(err) : resolve()));
        });
    }
}
