/**
 * Integration Tests: WebSocket streaming against an in-process engine stand-in.
 */

import http from 'http';
import path from 'path';
import { createApp, createDependencies, AppDependencies } from '../../src/presentation/app';
import { StreamingGateway } from '../../src/presentation/streaming/StreamingGateway';
import { PrometheusMetricsAdapter } from '../../src/infrastructure/metrics/PrometheusMetricsAdapter';
import { Config } from '../../src/config';
import { FakeInferenceInvoker } from '../helpers/FakeInferenceInvoker';
import { StreamClient } from '../helpers/StreamClient';
import { createPcm, createTempDir, createTestConfig, removeTempDir, waitFor } from '../helpers/testConfig';

const VIDEO_BASE64 = Buffer.from('fake video bytes').toString('base64');

describe('Streaming API', () => {
    let workDir: string;
    let invoker: FakeInferenceInvoker;
    let deps: AppDependencies;
    let server: http.Server;
    let gateway: StreamingGateway;
    let url: string;
    let clients: StreamClient[];

    async function startServer(streaming: Partial<Config['streaming']> = {}): Promise<void> {
        deps = await createDependencies(createTestConfig(workDir, { streaming }), {
            invoker,
            metrics: new PrometheusMetricsAdapter({ collectDefaults: false }),
        });
        server = http.createServer(createApp(deps));
        gateway = new StreamingGateway(server, deps.context);
        await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
        const address = server.address();
        if (address === null || typeof address === 'string') {
            throw new Error('Server is not listening on a TCP port');
        }
        url = `ws://127.0.0.1:${address.port}/stream`;
    }

    async function connect(): Promise<{ client: StreamClient; clientId: string }> {
        const client = await StreamClient.connect(url);
        clients.push(client);
        const established = await client.expect('connection_established');
        return { client, clientId: String(established.client_id) };
    }

    async function initializeWithVideo(client: StreamClient, avatarId: string = 'demo'): Promise<void> {
        client.send({ type: 'initialize_avatar', avatar_video_data: VIDEO_BASE64, avatar_id: avatarId });
        await client.expect('avatar_initialization_started');
        await client.expect('avatar_ready');
    }

    function sendAudio(client: StreamClient, seconds: number = 1): void {
        client.send({ type: 'audio_chunk', audio_data: createPcm(seconds).toString('base64') });
    }

    beforeEach(() => {
        workDir = createTempDir();
        invoker = new FakeInferenceInvoker(path.join(workDir, 'runs'));
        clients = [];
        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'warn').mockImplementation(() => { });
    });

    afterEach(async () => {
        for (const client of clients) {
            client.close();
        }
        await gateway.close();
        await deps.context.shutdown();
        server.closeAllConnections();
        await new Promise<void>((resolve) => server.close(() => resolve()));
        jest.restoreAllMocks();
        removeTempDir(workDir);
    });

    describe('with default limits', () => {
        beforeEach(async () => {
            await startServer();
        });

        it('should turn an audio chunk into a video chunk', async () => {
            const { client, clientId } = await connect();
            expect(clientId).toMatch(/^client_\d+_[0-9a-f]{8}$/);

            client.send({ type: 'initialize_avatar', avatar_video_data: VIDEO_BASE64, avatar_id: 'demo' });
            expect(await client.next()).toEqual({ type: 'avatar_initialization_started', avatar_id: 'demo' });
            expect(await client.next()).toEqual({ type: 'avatar_ready', avatar_id: 'demo', version: 'v15' });

            sendAudio(client, 1);
            const received = await client.expect('audio_received');
            expect(received.sequence).toBe(1);

            const video = await client.expect('video_chunk');
            expect(video).toMatchObject({
                job_id: received.job_id,
                sequence: 1,
                output_name: `${clientId}_1`,
            });
            expect(Buffer.from(String(video.video_data), 'base64').toString()).toBe(
                `video:${clientId}_1:${44 + 32000}`
            );
            expect(typeof video.timestamp).toBe('number');
            await waitFor(() => invoker.released.length === 1);
        });

        it('should deliver videos in the order the audio arrived', async () => {
            const { client, clientId } = await connect();
            await initializeWithVideo(client);

            sendAudio(client, 0.5);
            sendAudio(client, 0.25);
            const messages = [await client.next(), await client.next(), await client.next(), await client.next()];

            const videos = messages.filter((message) => message.type === 'video_chunk');
            expect(videos.map((message) => message.sequence)).toEqual([1, 2]);
            expect(videos.map((message) => message.output_name)).toEqual([`${clientId}_1`, `${clientId}_2`]);
            expect(invoker.maxConcurrentPerAvatar.get('demo')).toBe(1);
        });

        it('should reuse a registered avatar by id', async () => {
            const first = await connect();
            await initializeWithVideo(first.client);

            const second = await connect();
            second.client.send({ type: 'initialize_avatar', avatar_id: 'demo' });
            await second.client.expect('avatar_initialization_started');
            expect(await second.client.next()).toEqual({ type: 'avatar_ready', avatar_id: 'demo', version: 'v15' });
            expect(invoker.prepareCalls).toEqual(['demo']);
        });

        it('should answer status while the avatar is being prepared', async () => {
            const { client, clientId } = await connect();
            invoker.holdPrepare('demo');

            client.send({ type: 'initialize_avatar', avatar_video_data: VIDEO_BASE64, avatar_id: 'demo' });
            await client.expect('avatar_initialization_started');
            client.send({ type: 'get_status' });

            expect(await client.next()).toEqual({
                type: 'status',
                client_id: clientId,
                avatar_initialized: false,
                avatar_id: null,
                queue_size: 0,
                processing: false,
            });
            invoker.releasePrepare('demo');
            expect(await client.next()).toEqual({ type: 'avatar_ready', avatar_id: 'demo', version: 'v15' });
        });

        it('should refuse audio before the avatar is initialized', async () => {
            const { client } = await connect();

            sendAudio(client);

            expect(await client.next()).toEqual({
                type: 'error',
                code: 'AVATAR_NOT_READY',
                message: 'Avatar not initialized. Send initialize_avatar first.',
            });
        });

        it('should keep the connection after a second initialize', async () => {
            const { client, clientId } = await connect();
            await initializeWithVideo(client);

            client.send({ type: 'initialize_avatar', avatar_id: 'demo' });
            expect(await client.next()).toEqual({
                type: 'error',
                code: 'INVALID_INPUT',
                message: 'Session already bound to avatar demo',
            });

            client.send({ type: 'get_status' });
            expect(await client.next()).toEqual({
                type: 'status',
                client_id: clientId,
                avatar_initialized: true,
                avatar_id: 'demo',
                queue_size: 0,
                processing: false,
            });
        });

        it('should answer unknown types, invalid JSON and binary frames with errors', async () => {
            const { client } = await connect();

            client.send({ type: 'dance' });
            expect(await client.next()).toMatchObject({ type: 'error', message: 'Unknown message type: dance' });

            client.sendRaw('{nope');
            expect(await client.next()).toMatchObject({ type: 'error', message: 'Invalid JSON message' });

            client.sendRaw(Buffer.from([1, 2, 3]));
            expect(await client.next()).toMatchObject({
                type: 'error',
                message: 'Binary frames are not supported; send JSON messages',
            });
        });

        it('should report invalid audio without closing', async () => {
            const { client } = await connect();
            await initializeWithVideo(client);

            client.send({ type: 'audio_chunk', audio_data: '%%%%' });
            expect(await client.next()).toEqual({
                type: 'error',
                code: 'INVALID_INPUT',
                message: 'audio_data must be non-empty base64',
            });

            client.send({ type: 'audio_chunk', audio_data: 'AAAA', channels: 5 });
            expect(await client.next()).toEqual({
                type: 'error',
                code: 'INVALID_INPUT',
                message: 'Invalid audio_chunk: /channels must be <= 2',
            });
        });

        it('should close the connection on a malformed initialize', async () => {
            const { client } = await connect();

            client.send({ type: 'initialize_avatar', avatar_video_data: 42 });

            expect(await client.next()).toEqual({
                type: 'error',
                code: 'INVALID_INPUT',
                message: 'Malformed initialize_avatar: /avatar_video_data must be string',
            });
            expect(await client.closed).toEqual({ code: 1008, reason: 'Malformed initialize_avatar' });
        });

        it('should close the connection when initialize names neither video nor known avatar', async () => {
            const { client } = await connect();

            client.send({ type: 'initialize_avatar', avatar_id: 'ghost' });

            expect(await client.next()).toMatchObject({
                type: 'error',
                message: 'Malformed initialize_avatar: avatar_video_data or the avatar_id of a registered avatar is required',
            });
            expect((await client.closed).code).toBe(1008);
        });

        it('should cancel queued chunks when the client disconnects', async () => {
            const { client, clientId } = await connect();
            await initializeWithVideo(client);
            invoker.holdRun(`${clientId}_1`);

            sendAudio(client, 0.1);
            sendAudio(client, 0.1);
            sendAudio(client, 0.1);
            await client.expect('audio_received');
            await client.expect('audio_received');
            await client.expect('audio_received');
            await invoker.whenStarted(`${clientId}_1`);

            client.close();
            await waitFor(() => deps.context.getStatus().open_sessions === 0);
            invoker.releaseRun(`${clientId}_1`);
            await waitFor(() => invoker.released.length === 1);

            expect(invoker.runCalls.map((call) => call.outputName)).toEqual([`${clientId}_1`]);
            const statuses = deps.context.coordinator.listJobs().map((job) => job.status).sort();
            expect(statuses).toEqual(['cancelled', 'cancelled', 'completed']);
        });
    });

    describe('with tight limits', () => {
        it('should refuse audio beyond the pending chunk limit', async () => {
            await startServer({ maxPendingChunks: 1 });
            const { client, clientId } = await connect();
            await initializeWithVideo(client);
            invoker.holdRun(`${clientId}_1`);

            sendAudio(client, 0.1);
            await client.expect('audio_received');
            sendAudio(client, 0.1);

            expect(await client.next()).toMatchObject({ type: 'error', code: 'RESOURCE_EXHAUSTED' });

            invoker.releaseRun(`${clientId}_1`);
            expect(await client.next()).toMatchObject({ type: 'video_chunk', sequence: 1 });
        });

        it('should close connections that send oversized frames', async () => {
            await startServer({ maxPayloadBytes: 1024 });
            const { client } = await connect();

            client.sendRaw(JSON.stringify({ type: 'audio_chunk', audio_data: 'A'.repeat(4000) }));

            expect((await client.closed).code).toBe(1009);
            await waitFor(() => gateway.connectionCount === 0);
        });
    });
});
