import mongoose from "mongoose";

let connecting: Promise<typeof mongoose> | null = null;

export async function connectMongo(uri: string, dbName: string): Promise<typeof mongoose> {
  if (!connecting) {
    connecting = mongoose.connect(uri, { dbName });
  }
  try {
    return await connecting;
  } catch (error) {
    connecting = null;
    throw error;
  }
}

export async function disconnectMongo(): Promise<void> {
  if (!connecting) return;
  connecting = null;
  await mongoose.disconnect();
}
