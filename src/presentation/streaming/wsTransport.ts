import { WebSocket } from 'ws';
import { ServerMessage } from './protocol';

export interface WsTransport {
    /** Resolves once the frame is handed to the socket, or immediately when closed */
    sendJson(message: ServerMessage): Promise<void>;
    close(code: number, reason: string): void;
}

export function createWsTransport(socket: WebSocket): WsTransport {
    return {
        sendJson(message) {
            if (socket.readyState !== WebSocket.OPEN) {
                return Promise.resolve();
            }
            return new Promise((resolve) => {
                socket.send(JSON.stringify(message), (err) => {
                    if (err) {
                        console.warn(`[Stream] Failed to send ${message.type}: ${err.message}`);
                    }
                    resolve();
                });
            });
        },
        close(code, reason) {
            if (socket.readyState !== WebSocket.OPEN && socket.readyState !== WebSocket.CONNECTING) {
                return;
            }
            socket.close(code, reason);
        },
    };
}
