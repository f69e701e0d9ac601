import { appConfig, ensureRuntimeEnv } from "./config.ts";
import { RelayBot } from "./bot.ts";
import { createHealthServer } from "./healthServer.ts";
import { RuntimeActionLogger } from "./runtimeActionLogger.ts";
import { describeError } from "./utils.ts";

async function main() {
  ensureRuntimeEnv();

  const actionLog = new RuntimeActionLogger({
    enabled: appConfig.runtimeStructuredLogsEnabled,
    writeToStdout: appConfig.runtimeStructuredLogsStdout,
    logFilePath: appConfig.runtimeStructuredLogsFilePath
  });

  const bot = new RelayBot({ appConfig, actionLog });
  // uptime monitors poll this while the gateway session connects
  const health = createHealthServer({ appConfig, actionLog });
  await health.listening;

  await bot.start();

  let closing = false;
  const shutdown = async (signal: string) => {
    if (closing) return;
    closing = true;

    console.log(`Shutting down (${signal})...`);

    try {
      await bot.stop();
    } catch (error) {
      console.error("Bot shutdown failed:", describeError(error));
    }

    await new Promise((resolve) => health.server.close(resolve));
    await actionLog.close();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  console.error("Fatal startup error:", error);
  process.exit(1);
});
