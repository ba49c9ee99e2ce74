import { buildApp } from './app';
import { loadConfig } from './config';

const config = loadConfig();

const app = buildApp({
  dbPath: config.dbPath,
  lookup: config.lookup,
  internalApiToken: config.internalApiToken,
  logger: { level: config.logLevel },
});

app.listen({ port: config.port, host: config.host }, (err) => {
  if (err) {
    app.log.error(err);
    process.exit(1);
  }
});
