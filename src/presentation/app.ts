import express, { Application } from 'express';
import cors from 'cors';
import path from 'path';
import { Config } from '../config';
import { ServiceContext } from '../application/ServiceContext';
import { IInferenceInvoker } from '../domain/ports/IInferenceInvoker';

// Infrastructure imports
import { SubprocessInferenceInvoker } from '../infrastructure/inference/SubprocessInferenceInvoker';
import { PrometheusMetricsAdapter } from '../infrastructure/metrics/PrometheusMetricsAdapter';

// Route imports
import { createAvatarRoutes } from './routes/avatarRoutes';
import { createJobRoutes } from './routes/jobRoutes';
import { createStatusRoutes } from './routes/statusRoutes';
import { errorHandler } from './middleware/errorHandler';

export interface AppDependencies {
    context: ServiceContext;
    metrics: PrometheusMetricsAdapter;
}

export interface DependencyOverrides {
    invoker?: IInferenceInvoker;
    metrics?: PrometheusMetricsAdapter;
}

/**
 * Builds and starts the service context and its collaborators from configuration.
 */
export async function createDependencies(
    config: Config,
    overrides: DependencyOverrides = {}
): Promise<AppDependencies> {
    const paths = {
        uploadsDir: path.join(config.workDir, 'uploads'),
        avatarsDir: path.join(config.workDir, 'avatars'),
        jobsDir: path.join(config.workDir, 'jobs'),
    };

    const metrics = overrides.metrics ?? new PrometheusMetricsAdapter();

    let invoker = overrides.invoker;
    if (!invoker) {
        invoker = new SubprocessInferenceInvoker({ ...config.inference, jobsDir: paths.jobsDir });
        console.log(
            `🧠 Inference engine: ${config.inference.command} ${config.inference.generateArgs.join(' ')} (cwd ${config.inference.projectPath})`
        );
    }

    const context = new ServiceContext({ config, invoker, metrics, paths });
    await context.start();
    console.log(
        `⚙️  Scheduling: ${config.scheduling.maxConcurrentJobs} concurrent job(s), ` +
        `queue limit ${config.scheduling.maxQueuedJobs}, preparing policy '${config.scheduling.preparingPolicy}'`
    );

    return { context, metrics };
}

/**
 * Creates and configures the Express application.
 */
export function createApp(deps: AppDependencies): Application {
    const app = express();
    const { context, metrics } = deps;
    const origins = context.config.corsOrigins;

    // Middleware
    app.use(cors({ origin: origins.includes('*') ? '*' : origins }));
    app.use(express.json());
    app.use(express.urlencoded({ extended: true }));

    // Routes
    app.use(createStatusRoutes(context, metrics));
    app.use(createAvatarRoutes(context));
    app.use(createJobRoutes(context.coordinator));

    // Error handler (must be last)
    app.use(errorHandler);

    return app;
}
