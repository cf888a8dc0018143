/**
 * MongoDB connection management
 */

import { MongoClient, Db } from "mongodb";
import { StoreConnectionError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { MongoRecordStore } from "./mongo-store.js";
import type { MongoConnection, MongoStoreOptions } from "./types.js";

export class MongoConnector {
  private client: MongoClient | null = null;
  private db: Db | null = null;

  /**
   * Connect to MongoDB with a small read pool
   */
  async connect(config: MongoConnection): Promise<void> {
    const sanitized = sanitizeUri(config.uri);
    logger.info("Connecting to MongoDB: " + sanitized);

    const client = new MongoClient(config.uri, {
      maxPoolSize: 10,
      minPoolSize: 0,
      serverSelectionTimeoutMS: 5000,
      socketTimeoutMS: 45000,
    });

    try {
      await client.connect();
    } catch (error) {
      logger.error("MongoDB connection failed", { uri: sanitized });
      throw new StoreConnectionError(
        "Failed to connect to MongoDB: " + (error instanceof Error ? error.message : String(error)),
        { uri: sanitized },
        { cause: error },
      );
    }

    this.client = client;
    this.db = client.db(config.database);
    logger.info("Connected to database: " + config.database);
  }

  getDatabase(): Db {
    if (!this.db) {
      throw new StoreConnectionError("Not connected to MongoDB. Call connect() first.");
    }
    return this.db;
  }

  /**
   * Record store over the connected database
   */
  createStore(options: MongoStoreOptions = {}): MongoRecordStore {
    return new MongoRecordStore(this.getDatabase(), options);
  }

  async close(): Promise<void> {
    if (this.client) {
      await this.client.close();
      this.client = null;
      this.db = null;
      logger.info("MongoDB connection closed");
    }
  }
}

/**
 * Sanitize URI for logging (remove credentials)
 */
export function sanitizeUri(uri: string): string {
  try {
    const url = new URL(uri);
    if (url.username || url.password) {
      return uri.replace(/:\/\/[^@]+@/, "://***:***@");
    }
    return uri;
  } catch {
    return "mongodb://***";
  }
}
