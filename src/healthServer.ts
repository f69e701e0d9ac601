import express from "express";
import type { Request, Response } from "express";
import type { AppConfig } from "./config.ts";
import type { ActionLogSink } from "./runtimeActionLogger.ts";

const HEALTH_BODY = "ok";

type HealthServerOptions = {
  appConfig: Pick<AppConfig, "healthHost" | "healthPort">;
  actionLog: ActionLogSink;
};

export function createHealthApp() {
  const app = express();
  app.disable("x-powered-by");

  const sendHealth = (_req: Request, res: Response) => {
    res.type("text/plain").send(HEALTH_BODY);
  };
  app.get("/", sendHealth);
  app.get("/health", sendHealth);

  app.use((_req: Request, res: Response) => {
    res.status(404).type("text/plain").send("not found");
  });

  return app;
}

export function createHealthServer({ appConfig, actionLog }: HealthServerOptions) {
  const app = createHealthApp();
  const server = app.listen(appConfig.healthPort, appConfig.healthHost, () => {
    actionLog.logAction({
      kind: "health_listening",
      content: `health_listening: http://${appConfig.healthHost}:${appConfig.healthPort}`
    });
  });
  server.on("error", (error) => {
    actionLog.logAction({
      kind: "health_error",
      content: `health_server_error: ${error.message}`
    });
  });

  // rejects when the port cannot be bound; later errors only reach the log
  const listening = new Promise<void>((resolve, reject) => {
    const onListening = () => {
      server.off("error", onError);
      resolve();
    };
    const onError = (error: Error) => {
      server.off("listening", onListening);
      reject(error);
    };
    server.once("listening", onListening);
    server.once("error", onError);
  });

  return { app, server, listening };
}
