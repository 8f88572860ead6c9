import { env } from "./config/env.js";
import { buildApp } from "./app.js";
import { log } from "./logger.js";

async function main() {
  const app = await buildApp();

  try {
    const address = await app.listen({ port: env.port, host: env.host });
    app.log.info(
      { address, outputDir: env.outputDir, defaultProvider: env.ttsProvider },
      "Podcast voice server listening"
    );
  } catch (error) {
    app.log.error({ err: error }, "Failed to start server");
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  log.fatal({ err: error }, "Server bootstrap failed");
  process.exitCode = 1;
});
