import { MongoClient } from "mongodb";

export const DEFAULT_MAX_POOL_SIZE = 10;

/**
 * The driver keeps a connection pool; every store operation checks a connection out for its duration.
 */
export const createMongoClient = async (mongoUri: string, maxPoolSize = DEFAULT_MAX_POOL_SIZE): Promise<MongoClient> => {
  const client = new MongoClient(mongoUri, { maxPoolSize });
  await client.connect();
  return client;
};
