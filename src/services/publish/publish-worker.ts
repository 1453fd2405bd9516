// Worker thread entry for watch mode: loads the module once and publishes it

import { parentPort, workerData } from 'worker_threads';
import { Logger, parseLogLevel } from '../../core/logger.js';
import { ModuleLoader, createLoaderConfig } from '../loader/module-loader.js';
import { PublishJobSchema } from './publish-cycle.js';
import { PublishService } from './publish-service.js';

const job = PublishJobSchema.parse(workerData);

Logger.configure({ level: parseLogLevel(job.logLevel) });

const loader = new ModuleLoader(createLoaderConfig(job.modulePath, { dependencies: job.dependencies }));
const result = await new PublishService().run(await loader.load(), job.options);

parentPort?.postMessage(result);
