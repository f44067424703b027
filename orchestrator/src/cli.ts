#!/usr/bin/env node
import { resolve } from 'node:path';
import { cac } from 'cac';
import { z } from 'zod';
import { runtimeConfig } from './config.js';
import { createVideoService } from './bootstrap.js';
import { logger } from './logger.js';
import type { JobResult } from './types.js';

const cli = cac('video-orchestrator');

// cac hands numeric-looking values over as numbers
const textArg = z
  .union([z.string(), z.number()])
  .transform(String)
  .pipe(z.string().trim().min(1));

const generateOptionsSchema = z.object({
  user: textArg.default('cli'),
  prompt: textArg,
  photo: z
    .union([z.array(textArg).min(1), textArg])
    .transform((value) => (Array.isArray(value) ? value : [value]))
});

async function generate(rawOptions: unknown): Promise<JobResult> {
  const options = generateOptionsSchema.parse(rawOptions);
  const { service, store } = await createVideoService(runtimeConfig);

  try {
    for (const photo of options.photo) {
      const added = await service.startCollectingPhoto(options.user, resolve(photo));
      if (!added) {
        logger.warn({ photo }, 'Photo not added (session holds the maximum number of photos)');
      }
    }
    await service.setPrompt(options.user, options.prompt);
    return await service.submit(options.user);
  } finally {
    await store.disconnect();
  }
}

cli
  .command('generate', 'Generate a video from reference photos and a prompt')
  .option('--user <id>', 'User identifier the job is recorded under', { default: 'cli' })
  .option('--prompt <text>', 'Prompt text or template name (dance, walk, nature, ...)')
  .option('--photo <path>', 'Reference photo path, repeat for up to 4 photos')
  .action(async (options: unknown) => {
    const result = await generate(options);
    console.log(JSON.stringify(result, null, 2));
    return result;
  });

cli.help();
cli.parse(process.argv, { run: false });

if (!cli.matchedCommand) {
  if (!cli.options.help) {
    cli.outputHelp();
  }
  process.exit(cli.options.help ? 0 : 1);
}

Promise.resolve(cli.runMatchedCommand())
  .then((result: JobResult) => {
    logger.info({ jobId: result.jobId, status: result.status }, 'Generation command finished');
    process.exit(result.status === 'completed' ? 0 : 1);
  })
  .catch((error) => {
    logger.error({ error }, 'Generation command failed');
    process.exit(1);
  });
