import { loadConfig } from "./config.js";
import { buildApp } from "./app.js";
import { createBullTranscriptionQueue } from "./async/queue.js";

const cfg = loadConfig();

const queue = createBullTranscriptionQueue({
  host: cfg.redisHost,
  port: cfg.redisPort,
});

const start = async () => {
  const app = await buildApp({
    queue,
    uploadDir: cfg.tempDir,
    apiKey: cfg.apiKey,
    logger: { level: cfg.logLevel },
  });

  const shutdown = async () => {
    await app.close();
    await queue.close();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      app.log.error(err);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  try {
    await app.listen({ port: cfg.port, host: "0.0.0.0" });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

start().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
