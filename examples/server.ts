import 'dotenv/config';
import express from 'express';
import {
  HttpResponse,
  WILDCARD,
  createHttpRouterBuilder,
  enableConsoleLogging,
  enableFileLogging,
  loadConfig,
  toRequestHandler,
} from '../src/index.js';
import logger from '../src/logger.js';

async function main(): Promise<void> {
  enableConsoleLogging();
  enableFileLogging();
  const config = loadConfig();

  const router = createHttpRouterBuilder()
    .register('GET', [], () => HttpResponse.text('home'))
    .register('POST', ['foo', WILDCARD, 'bar', WILDCARD, 'baz'], async (params, req) =>
      HttpResponse.json({ params, contentType: req.get('content-type') ?? null })
    )
    .register('GET', [WILDCARD], (params) => HttpResponse.json({ name: params[0] }))
    .build();

  const app = express();
  app.use(toRequestHandler(router));

  await new Promise<void>((resolve) => {
    app.listen(config.port, config.host, () => resolve());
  });
  logger.info(`Listening on http://${config.host}:${config.port}`);
}

main().catch((error: unknown) => {
  logger.error(`Startup error: ${error}`);
  process.exit(1);
});
