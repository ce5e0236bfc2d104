/**
 * MongoDB source
 * Wraps one MongoClient scoped to a single database
 */

import { MongoClient } from 'mongodb';
import { config } from '../config/index.js';
import { MONGODB_SOURCE_KIND, parseSourceConfig } from '../schemas/index.js';
import { ConfigurationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { MongoDBSource, Source } from './types.js';

export interface ConnectedMongoDBSource extends MongoDBSource {
  readonly client: MongoClient;
}

export function createMongoDBSource(
  name: string,
  client: MongoClient,
  databaseName: string
): ConnectedMongoDBSource {
  const db = client.db(databaseName);
  return {
    name,
    kind: MONGODB_SOURCE_KIND,
    databaseName,
    client,
    collection(collectionName) {
      const collection = db.collection(collectionName);
      return {
        find: (filter) => collection.find(filter),
        aggregate: (pipeline) => collection.aggregate(pipeline),
      };
    },
  };
}

export function isMongoDBSource(source: Source): source is MongoDBSource {
  return (
    source.kind === MONGODB_SOURCE_KIND &&
    'collection' in source &&
    typeof source.collection === 'function'
  );
}

/**
 * Connect a source from a raw configuration entry
 */
export async function connectMongoDBSource(raw: unknown): Promise<ConnectedMongoDBSource> {
  const sourceConfig = parseSourceConfig(raw);
  const client = new MongoClient(sourceConfig.uri, {
    appName: config.mongodb.appName,
    connectTimeoutMS: config.mongodb.connectTimeoutMs,
  });

  try {
    await client.connect();
  } catch (error) {
    logger.error({ error, source: sourceConfig.name }, 'MongoDB connection failed');
    throw new ConfigurationError(`unable to connect source "${sourceConfig.name}"`);
  }

  logger.info(
    { source: sourceConfig.name, database: sourceConfig.database },
    'MongoDB source connected'
  );
  return createMongoDBSource(sourceConfig.name, client, sourceConfig.database);
}

export async function closeSource(source: ConnectedMongoDBSource): Promise<void> {
  await source.client.close();
  logger.info({ source: source.name }, 'MongoDB source closed');
}
