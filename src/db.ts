import mongoose from "mongoose";

export async function connectDb(mongoUri: string) {
  mongoose.set("strictQuery", true);
  await mongoose.connect(mongoUri);
  console.log(`[DB] connected to MongoDB: ${mongoose.connection.name}`);
  return mongoose.connection;
}

export async function disconnectDb() {
  await mongoose.disconnect();
  console.log("[DB] disconnected");
}
