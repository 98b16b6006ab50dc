import { Router, Request, Response } from 'express';
import archiver from 'archiver';
import multer from 'multer';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { ServiceContext } from '../../application/ServiceContext';
import { DEFAULT_AVATAR_VERSION, isAvatarVersion, toAvatarSummary } from '../../domain/entities/Avatar';
import { AudioUnit, createAudioUnitFromFile } from '../../domain/entities/AudioUnit';
import { GenerationArtifact, GenerationJobHandle } from '../../domain/entities/GenerationJob';
import { SessionCoordinator } from '../../application/SessionCoordinator';
import { asyncHandler, BadRequestError } from '../middleware/errorHandler';

/**
 * Reads a string field from a parsed form or JSON body.
 */
export function readField(body: unknown, key: string): string | undefined {
    if (typeof body !== 'object' || body === null) {
        return undefined;
    }
    const value: unknown = Reflect.get(body, key);
    if (typeof value !== 'string') {
        return undefined;
    }
    const trimmed = value.trim();
    return trimmed === '' ? undefined : trimmed;
}

function safeExtension(filename: string): string {
    const ext = path.extname(filename).toLowerCase();
    return /^\.[a-z0-9]{1,8}$/.test(ext) ? ext : '.mp4';
}

/**
 * Waits for every job in order. On the first failure the rest are cancelled,
 * every artifact already produced is released and the failure is rethrown.
 */
async function collectArtifacts(
    coordinator: SessionCoordinator,
    handles: GenerationJobHandle[]
): Promise<GenerationArtifact[]> {
    const artifacts: GenerationArtifact[] = [];
    for (const handle of handles) {
        try {
            artifacts.push(await coordinator.awaitJob(handle));
        } catch (error) {
            handles.forEach((h) => coordinator.cancel(h));
            const outcomes = await Promise.allSettled(handles.map((h) => coordinator.awaitJob(h)));
            await Promise.all(
                outcomes.map((outcome) => (outcome.status === 'fulfilled' ? outcome.value.release() : undefined))
            );
            throw error;
        }
    }
    return artifacts;
}

/**
 * Streams the artifacts to the client as one stored (uncompressed) ZIP.
 * Resolves once the response is closed.
 */
function sendZip(res: Response, filename: string, artifacts: GenerationArtifact[]): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        const archive = archiver('zip', { store: true });
        archive.on('warning', (err) => console.warn(`[HTTP] ZIP warning: ${err.message}`));
        archive.on('error', reject);
        res.on('close', () => resolve());

        res.attachment(filename);
        archive.pipe(res);
        for (const artifact of artifacts) {
            archive.file(artifact.path, { name: `${artifact.outputName}.mp4` });
        }
        archive.finalize().catch(reject);
    });
}

/**
 * Creates avatar management and generation routes.
 */
export function createAvatarRoutes(context: ServiceContext): Router {
    const router = Router();
    const { uploadMaxBytes } = context.config;

    // Avatar videos go to disk; the registry takes ownership once registered
    const videoUpload = multer({
        storage: multer.diskStorage({
            destination: context.paths.uploadsDir,
            filename: (_req, file, cb) => {
                cb(null, `${Date.now()}_${uuidv4().substring(0, 8)}${safeExtension(file.originalname)}`);
            },
        }),
        limits: { fileSize: uploadMaxBytes, files: 1 },
    });

    // Audio is short-lived and handed to the engine from memory
    const audioUpload = multer({
        storage: multer.memoryStorage(),
        limits: { fileSize: uploadMaxBytes, files: 1 },
    });
    const batchUpload = multer({
        storage: multer.memoryStorage(),
        limits: { fileSize: uploadMaxBytes, files: context.config.batchMaxFiles },
    });

    /**
     * POST /initialize_avatar
     *
     * Multipart: avatar_video (file), avatar_id?, version? (v1 | v15), replace?
     * Responds once the avatar is prepared.
     */
    router.post(
        '/initialize_avatar',
        videoUpload.single('avatar_video'),
        asyncHandler(async (req: Request, res: Response) => {
            const file = req.file;
            if (!file) {
                throw new BadRequestError('No avatar video file provided');
            }

            const avatarId = readField(req.body, 'avatar_id') ?? `avatar_${Date.now()}`;
            const version = readField(req.body, 'version') ?? DEFAULT_AVATAR_VERSION;
            const replace = readField(req.body, 'replace')?.toLowerCase() === 'true';

            if (!isAvatarVersion(version)) {
                await context.discardUpload(file.path);
                throw new BadRequestError('Invalid version. Must be v1 or v15');
            }

            console.log(`[HTTP] Initializing avatar ${avatarId} (${version})`);
            const avatar = await context.initializeAvatar({
                avatarId,
                sourceVideoPath: file.path,
                version,
                replace,
                ownsSource: true,
            });

            res.json({
                status: 'success',
                message: 'Avatar initialized successfully',
                avatar_id: avatar.avatarId,
                version: avatar.version,
                avatar: toAvatarSummary(avatar),
            });
        })
    );

    /**
     * POST /generate_video
     *
     * Multipart: avatar_id, audio_file (file), output_name?
     * Responds with the generated MP4 as an attachment.
     */
    router.post(
        '/generate_video',
        audioUpload.single('audio_file'),
        asyncHandler(async (req: Request, res: Response) => {
            const avatarId = readField(req.body, 'avatar_id');
            if (!avatarId) {
                throw new BadRequestError('avatar_id is required');
            }
            const file = req.file;
            if (!file) {
                throw new BadRequestError('No audio file provided');
            }
            const outputName = readField(req.body, 'output_name') ?? `output_${Date.now()}`;

            const audio = createAudioUnitFromFile(file.buffer, file.originalname);
            const handle = context.coordinator.submit(avatarId, audio, { outputName });

            // Client went away before the video was sent
            res.on('close', () => {
                if (!res.writableFinished) {
                    context.coordinator.cancel(handle);
                }
            });

            const artifact = await context.coordinator.awaitJob(handle);
            try {
                await new Promise<void>((resolve) => {
                    res.download(artifact.path, `${outputName}.mp4`, (err) => {
                        if (err) {
                            console.error(`[HTTP] Failed to send ${artifact.path}: ${err.message}`);
                        }
                        resolve();
                    });
                });
            } finally {
                await artifact.release();
            }
        })
    );

    /**
     * POST /generate_video_batch
     *
     * Multipart: avatar_id, audio_files (files), output_name?
     * Runs one job per file on the avatar's lane and responds with a ZIP of the videos.
     */
    router.post(
        '/generate_video_batch',
        batchUpload.array('audio_files'),
        asyncHandler(async (req: Request, res: Response) => {
            const avatarId = readField(req.body, 'avatar_id');
            if (!avatarId) {
                throw new BadRequestError('avatar_id is required');
            }
            // 404 before anything is queued
            context.registry.get(avatarId);

            const files = Array.isArray(req.files) ? req.files : [];
            if (files.length === 0) {
                throw new BadRequestError('No audio files provided');
            }
            const prefix = readField(req.body, 'output_name') ?? `batch_output_${Date.now()}`;
            const units: AudioUnit[] = files.map((file) => createAudioUnitFromFile(file.buffer, file.originalname));

            const handles: GenerationJobHandle[] = [];
            try {
                units.forEach((audio, i) => {
                    handles.push(context.coordinator.submit(avatarId, audio, { outputName: `${prefix}_${i}` }));
                });
            } catch (error) {
                handles.forEach((handle) => context.coordinator.cancel(handle));
                throw error;
            }
            console.log(`[HTTP] Batch of ${handles.length} job(s) queued for avatar ${avatarId}`);

            res.on('close', () => {
                if (!res.writableFinished) {
                    handles.forEach((handle) => context.coordinator.cancel(handle));
                }
            });

            const artifacts = await collectArtifacts(context.coordinator, handles);
            try {
                await sendZip(res, `batch_videos_${avatarId}.zip`, artifacts);
            } finally {
                await Promise.all(artifacts.map((artifact) => artifact.release()));
            }
        })
    );

    /**
     * GET /list_avatars
     */
    router.get('/list_avatars', (_req: Request, res: Response) => {
        const avatars = context.listAvatars();
        res.json({
            status: 'success',
            avatars,
            count: avatars.length,
        });
    });

    /**
     * DELETE /delete_avatar
     *
     * Body (JSON or form): avatar_id
     */
    router.delete(
        '/delete_avatar',
        asyncHandler(async (req: Request, res: Response) => {
            const avatarId = readField(req.body, 'avatar_id') ?? readField(req.query, 'avatar_id');
            if (!avatarId) {
                throw new BadRequestError('avatar_id is required');
            }
            const removed = await context.deleteAvatar(avatarId);
            res.json({
                status: 'success',
                message: `Avatar ${avatarId} deleted successfully`,
                avatar: removed,
            });
        })
    );

    return router;
}
