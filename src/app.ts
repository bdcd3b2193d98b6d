/** @format */

import http from "http";
import mongoose from "mongoose";
import initApp from "./server";
import { attachRealtime } from "./services/socket.service";

initApp()
  .then(({ app, services }) => {
    const { config } = services;
    const server = http.createServer(app);
    const realtime = attachRealtime(server, services.registry, {
      heartbeatInterval: config.wsHeartbeatInterval,
    });

    server.listen(config.port, () => {
      console.log(`Server running on port ${config.port}`);
      console.log(`Swagger docs available at http://localhost:${config.port}/api-docs`);
    });

    let shuttingDown = false;
    const shutdown = (signal: string) => {
      if (shuttingDown) return;
      shuttingDown = true;
      console.log(`${signal} received, shutting down`);
      realtime
        .close()
        .then(() => new Promise<void>((resolve) => server.close(() => resolve())))
        .then(() => mongoose.disconnect())
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error("Error during shutdown:", error);
          process.exit(1);
        });
    };
    process.on("SIGINT", () => shutdown("SIGINT"));
    process.on("SIGTERM", () => shutdown("SIGTERM"));
  })
  .catch((error: unknown) => {
    console.error("Failed to start server:", error);
    process.exit(1);
  });
