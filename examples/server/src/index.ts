/**
 * chatrelay server process: HTTP/WS chat surface plus the log → store relay.
 * Configured from environment variables (see loadConfig).
 */

import {
  ChatService,
  closeServer,
  createInMemoryMessageStore,
  createLogger,
  createMySQLMessageStore,
  createPostgresMessageStore,
  createRedisLogClient,
  createServer,
  createSQLiteMessageStore,
  loadConfig,
  RelayWorker,
  restoreAllTopics,
  type AppConfig,
  type MessageStore,
} from "@chatrelay/server";

async function openStore(config: AppConfig["store"]): Promise<MessageStore> {
  switch (config.driver) {
    case "postgres":
      return createPostgresMessageStore({ connectionString: config.databaseUrl });
    case "mysql":
      return createMySQLMessageStore(config.databaseUrl);
    case "sqlite":
      return createSQLiteMessageStore(config.sqliteFilename);
    case "memory":
      return createInMemoryMessageStore();
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });

  const log = createRedisLogClient(config.redis.url, {
    commandTimeoutMs: config.redis.commandTimeoutMs,
    logger,
  });
  const store = await openStore(config.store);

  try {
    await log.ping();
    await store.init();
    await store.listTopicIds();
  } catch (err) {
    logger.fatal({ err }, "cannot reach the log or the store");
    await Promise.allSettled([log.close(), store.close()]);
    process.exitCode = 1;
    return;
  }

  await restoreAllTopics({
    log,
    store,
    logger,
    groupName: config.relay.groupName,
    limit: config.restoreLimit,
  });

  const worker = new RelayWorker({ log, store, logger, ...config.relay });
  worker.start();

  const chat = new ChatService({
    log,
    store,
    logger,
    groupName: config.relay.groupName,
    restoreLimit: config.restoreLimit,
  });
  const server = createServer({ port: config.port, path: config.wsPath, chat, logger });
  server.on("listening", () => {
    logger.info({ port: config.port, wsPath: config.wsPath, storeDriver: config.store.driver }, "listening");
  });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "shutting down");
    (async () => {
      await worker.stop();
      await closeServer(server);
      await store.close();
      await log.close();
    })()
      .then(() => logger.info("shutdown complete"))
      .catch((err: unknown) => {
        logger.error({ err }, "shutdown failed");
        process.exitCode = 1;
      });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
