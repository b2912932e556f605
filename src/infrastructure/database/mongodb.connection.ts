import { MongoClient, Db } from "mongodb";
import { config } from "../config/app.config";

let client: MongoClient | null = null;
let db: Db | null = null;

export async function connectToMongoDB(): Promise<Db> {
  if (db) {
    return db;
  }

  const mongoUri = config.mongodb.uri;
  const dbName = config.mongodb.dbName;

  try {
    // Optional job fields left undefined are omitted instead of stored as null
    client = new MongoClient(mongoUri, { ignoreUndefined: true });
    await client.connect();
    db = client.db(dbName);
    console.log(`Connected to MongoDB: ${dbName}`);
    return db;
  } catch (error) {
    console.error("Failed to connect to MongoDB:", error);
    throw error;
  }
}

export async function closeMongoDBConnection(): Promise<void> {
  if (client) {
    await client.close();
    client = null;
    db = null;
    console.log("MongoDB connection closed");
  }
}
