import { createApp } from "./app";
import { loadEnv } from "./config/env";

function bootstrap(): void {
  const env = loadEnv();
  const { app, logger, storageKind } = createApp(env);

  app.listen(env.port, () => {
    logger.info("Server started", { port: env.port, env: env.nodeEnv });
    logger.info(`LLM chat model: ${env.openaiChatModel}`);
    logger.info("Storage", { tables: storageKind, uploadDir: env.uploadDir });
    logger.info("Public upload links", { baseUrl: env.publicAppUrl });
  });
}

bootstrap();
