import mongoose from "mongoose";
import env from "./env";

// Prevent query buffering (critical)
mongoose.set("bufferCommands", false);
mongoose.set("strictQuery", true);

let connecting: Promise<typeof mongoose> | null = null;

export async function connectDB() {
  if (mongoose.connection.readyState === 1) return mongoose;

  if (!connecting) {
    connecting = mongoose
      .connect(env.MONGO_URI, {
        dbName: env.DB_NAME,
        serverSelectionTimeoutMS: 5000,
      })
      .catch((err: unknown) => {
        connecting = null;
        throw err;
      });
  }

  const conn = await connecting;
  // unique/TTL indexes back the duplicate-email and code-expiry rules
  await conn.syncIndexes();
  return conn;
}

export async function disconnectDB() {
  connecting = null;
  await mongoose.disconnect();
}
