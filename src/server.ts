/** @format */

import path from "path";
import express, { ErrorRequestHandler, Express } from "express";
import bodyParser from "body-parser";
import cors from "cors";
import mongoose from "mongoose";
import multer from "multer";
import swaggerJsDoc from "swagger-jsdoc";
import swaggerUI from "swagger-ui-express";
import { createAudioRouter } from "./routes/audio_routes";
import { createAuthRouter } from "./routes/auth_routes";
import { createMatchRouter } from "./routes/match_routes";
import { createNotificationRouter } from "./routes/notification_routes";
import { createReportRouter } from "./routes/report_routes";
import { createUserRouter } from "./routes/user_routes";
import { AppServices, createServices } from "./services/container";
import { MongoMatchStore } from "./services/match-store";
import { MongoNotificationStore } from "./services/notification-store";
import { SupabaseObjectStore } from "./services/object-store";
import { MongoReportStore } from "./services/report-store";
import { GeminiTranscriber } from "./services/transcription-service";
import { MongoUserStore } from "./services/user-store";
import { AppConfig, ConfigError, loadConfig } from "./utils/config";
import { sendError } from "./utils/errors";

/** The 4xx status a middleware attached to its error, if any. */
const clientErrorStatus = (error: unknown): number | null => {
  if (typeof error !== "object" || error === null) return null;
  const status = "status" in error ? error.status : "statusCode" in error ? error.statusCode : undefined;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
};

const errorHandler: ErrorRequestHandler = (error, req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }
  if (error instanceof multer.MulterError) {
    res.status(400).json({ success: false, error: error.message });
    return;
  }
  if (error instanceof SyntaxError) {
    res.status(400).json({ success: false, error: "Malformed request body" });
    return;
  }
  const status = clientErrorStatus(error);
  if (status !== null && error instanceof Error) {
    res.status(status).json({ success: false, error: error.message });
    return;
  }
  sendError(res, error, `Unhandled error on ${req.method} ${req.path}`);
};

export const createApp = (services: AppServices): Express => {
  const app = express();
  const { config } = services;

  app.use(
    cors({
      origin: config.corsOrigins,
      methods: ["GET", "POST", "PUT", "DELETE", "PATCH", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization", "Accept", "Referer"],
      credentials: true,
      maxAge: 86400,
    })
  );
  app.use(bodyParser.json());
  app.use(bodyParser.urlencoded({ extended: true }));

  app.use("/auth", createAuthRouter(services));
  app.use("/users", createUserRouter(services));
  app.use("/reports", createReportRouter(services));
  app.use("/matches", createMatchRouter(services));
  app.use("/notifications", createNotificationRouter(services));
  app.use("/", createAudioRouter(services));

  const specs = swaggerJsDoc({
    definition: {
      openapi: "3.0.0",
      info: {
        title: "Lost & Found API",
        version: "1.0.0",
        description: "REST server for lost and found reports with real-time match notifications",
      },
      servers: [{ url: config.domainBase ?? `http://localhost:${config.port}` }],
    },
    apis: [path.join(__dirname, "routes", "*.{ts,js}")],
  });
  app.use("/api-docs", swaggerUI.serve, swaggerUI.setup(specs));

  app.use((req, res) => {
    res.status(404).json({ success: false, error: `Cannot ${req.method} ${req.path}` });
  });
  app.use(errorHandler);

  return app;
};

const required = (value: string | undefined, name: string): string => {
  if (!value) {
    throw new ConfigError(`Please add a valid ${name} to your .env file`);
  }
  return value;
};

/** Connects to MongoDB and wires the production stores into a ready app. */
const initApp = async (config: AppConfig = loadConfig()) => {
  const dbConnection = required(config.dbConnection, "DB_CONNECTION");
  const supabaseUrl = required(config.supabaseUrl, "SUPABASE_URL");
  const supabaseKey = required(config.supabaseKey, "SUPABASE_KEY");

  const db = mongoose.connection;
  db.on("error", (error) => console.error(error));
  db.once("open", () => console.log("Connected to Database"));
  await mongoose.connect(dbConnection);

  let transcriber: GeminiTranscriber | null = null;
  if (config.geminiApiKey) {
    transcriber = new GeminiTranscriber(config.geminiApiKey, config.geminiModel);
  } else {
    console.warn("GEMINI_API_KEY is not set, audio transcription is disabled");
  }

  const services = createServices(
    config,
    {
      users: new MongoUserStore(),
      reports: new MongoReportStore(),
      matches: new MongoMatchStore(),
      notifications: new MongoNotificationStore(),
      objects: new SupabaseObjectStore(supabaseUrl, supabaseKey, config.imageBucket),
    },
    transcriber
  );
  console.log("initApp Finished");
  return { app: createApp(services), services };
};

export default initApp;
