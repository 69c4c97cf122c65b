// backend/src/db/mongo.ts

import mongoose from "mongoose";
import { getMongoUri } from "../config/quizConfig";
import { logEvent } from "../utils/logger";

export async function connectMongo(): Promise<void> {
  await mongoose.connect(getMongoUri());
  logEvent("mongo_connected");
}
