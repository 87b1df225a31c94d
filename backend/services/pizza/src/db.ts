// backend/services/pizza/src/db.ts
import mongoose from "mongoose";
import { logger } from "@shared/utils/logger";
import { config } from "./config";

function redactMongoUri(uri: string): string {
  try {
    const u = new URL(uri);
    if (u.password) u.password = "***";
    if (u.username) u.username = "***";
    return u.toString();
  } catch {
    return uri.replace(/\/\/([^@]+)@/, "//***:***@");
  }
}

let connected = false;

export async function connectDb(): Promise<void> {
  if (connected) return;

  // Be explicit; disable buffering so errors surface immediately
  mongoose.set("bufferCommands", false);
  mongoose.set("strictQuery", true);

  logger.info(
    { uri: redactMongoUri(config.mongoUri) },
    "[pizza] connecting to Mongo"
  );

  await mongoose.connect(config.mongoUri).catch((err: unknown) => {
    logger.error({ err }, "[pizza] mongoose.connect failed");
    throw err;
  });

  // Unique indexes back the username/email/pair invariants.
  await mongoose.connection.syncIndexes();

  connected = true;
  logger.info("[pizza] Mongo connected");
}

export async function disconnectDb(): Promise<void> {
  try {
    if (mongoose.connection.readyState !== 0) {
      await mongoose.disconnect();
    }
  } finally {
    connected = false;
  }
}
