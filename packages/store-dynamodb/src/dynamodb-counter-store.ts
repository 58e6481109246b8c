import {
  ConditionalCheckFailedException,
  DynamoDBClient,
  type DynamoDBClientConfig,
} from '@aws-sdk/client-dynamodb';
import {
  DeleteCommand,
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import { CounterStoreError, type CounterStore } from '@throttlekit/core';
import { counterItemKey, expiryFor, isExpired } from './dynamodb-utils.js';
import { DEFAULT_TABLE_NAME, ensureTable, TTL_ATTRIBUTE } from './table.js';
import { throwIfDynamoTableMissing } from './table-missing-error.js';

function ttlAttribute(expiresAt: number | undefined): Record<string, number> {
  return expiresAt === undefined ? {} : { [TTL_ATTRIBUTE]: expiresAt };
}

export interface DynamoDBCounterStoreOptions {
  client?: DynamoDBDocumentClient | DynamoDBClient;
  region?: string;
  tableName?: string;
  /** Create the table (and enable TTL) on first use if it is missing. */
  ensureTableExists?: boolean;
}

/**
 * Counter store on a single DynamoDB table. One item per counter:
 * `{ pk: "COUNTER#<key>", sk: "COUNTER", value, ttl }`.
 *
 * DynamoDB deletes expired items lazily, so reads also check `ttl`.
 */
export class DynamoDBCounterStore implements CounterStore {
  private readonly docClient: DynamoDBDocumentClient;
  private readonly rawClient: DynamoDBClient | undefined;
  private readonly isClientManaged: boolean;
  private readonly tableName: string;
  /** Client for table management; only set with `ensureTableExists`. */
  private readonly tableClient: DynamoDBClient | undefined;
  /** A table client this store created beside a caller's document client. */
  private readonly ownedTableClient: DynamoDBClient | undefined;
  private tableReady?: Promise<void>;
  private isDestroyed = false;

  constructor({
    client,
    region,
    tableName = DEFAULT_TABLE_NAME,
    ensureTableExists = false,
  }: DynamoDBCounterStoreOptions = {}) {
    this.tableName = tableName;

    if (client instanceof DynamoDBDocumentClient) {
      this.docClient = client;
      this.isClientManaged = false;
    } else if (client instanceof DynamoDBClient) {
      this.docClient = DynamoDBDocumentClient.from(client);
      this.isClientManaged = false;
    } else {
      const config: DynamoDBClientConfig = {};
      if (region) config.region = region;
      this.rawClient = new DynamoDBClient(config);
      this.docClient = DynamoDBDocumentClient.from(this.rawClient);
      this.isClientManaged = true;
    }

    if (ensureTableExists) {
      if (this.rawClient) {
        this.tableClient = this.rawClient;
      } else if (client instanceof DynamoDBClient) {
        this.tableClient = client;
      } else {
        this.ownedTableClient = new DynamoDBClient(region ? { region } : {});
        this.tableClient = this.ownedTableClient;
      }
    }
  }

  async get(key: string): Promise<string | undefined> {
    await this.ready();

    try {
      const result = await this.docClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: counterItemKey(key),
        }),
      );

      const item = result.Item;
      if (!item || isExpired(item[TTL_ATTRIBUTE], Date.now())) {
        return undefined;
      }

      const value: unknown = item['value'];
      if (typeof value === 'string') return value;
      if (typeof value === 'number') return String(value);
      return undefined;
    } catch (error: unknown) {
      throwIfDynamoTableMissing(error, this.tableName);
      throw error;
    }
  }

  async put(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.ready();

    try {
      await this.docClient.send(
        new PutCommand({
          TableName: this.tableName,
          Item: {
            ...counterItemKey(key),
            value,
            ...ttlAttribute(expiryFor(ttlSeconds, Date.now())),
          },
        }),
      );
    } catch (error: unknown) {
      throwIfDynamoTableMissing(error, this.tableName);
      throw error;
    }
  }

  async delete(key: string): Promise<void> {
    await this.ready();

    try {
      await this.docClient.send(
        new DeleteCommand({
          TableName: this.tableName,
          Key: counterItemKey(key),
        }),
      );
    } catch (error: unknown) {
      throwIfDynamoTableMissing(error, this.tableName);
      throw error;
    }
  }

  /**
   * `ADD`s one to the counter in a single conditional update. An item that
   * outlived its TTL but has not been swept yet fails the condition and is
   * overwritten with a fresh count of one.
   */
  async increment(key: string, ttlSeconds: number): Promise<number> {
    await this.ready();

    const now = Date.now();
    const itemKey = counterItemKey(key);
    const expiresAt = expiryFor(ttlSeconds, now);

    try {
      const result = await this.docClient.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: itemKey,
          UpdateExpression:
            expiresAt === undefined
              ? 'ADD #value :one'
              : 'ADD #value :one SET #ttl = if_not_exists(#ttl, :ttl)',
          ConditionExpression:
            'attribute_not_exists(pk) OR attribute_not_exists(#ttl) OR #ttl > :now',
          ExpressionAttributeNames: { '#value': 'value', '#ttl': TTL_ATTRIBUTE },
          ExpressionAttributeValues: {
            ':one': 1,
            ':now': Math.floor(now / 1000),
            ...(expiresAt === undefined ? {} : { ':ttl': expiresAt }),
          },
          ReturnValues: 'UPDATED_NEW',
        }),
      );

      const count: unknown = result.Attributes?.['value'];
      if (typeof count !== 'number') {
        throw new CounterStoreError(
          `Counter "${key}" did not return a numeric value`,
        );
      }
      return count;
    } catch (error: unknown) {
      if (error instanceof ConditionalCheckFailedException) {
        return this.restartCounter(itemKey, expiresAt);
      }
      throwIfDynamoTableMissing(error, this.tableName);
      throw error;
    }
  }

  async close(): Promise<void> {
    this.destroy();
  }

  destroy(): void {
    if (this.isDestroyed) return;
    this.isDestroyed = true;

    if (this.isClientManaged && this.rawClient) {
      this.rawClient.destroy();
    }
    this.ownedTableClient?.destroy();
  }

  private async restartCounter(
    itemKey: { pk: string; sk: string },
    expiresAt: number | undefined,
  ): Promise<number> {
    try {
      await this.docClient.send(
        new PutCommand({
          TableName: this.tableName,
          Item: { ...itemKey, value: 1, ...ttlAttribute(expiresAt) },
        }),
      );
      return 1;
    } catch (error: unknown) {
      throwIfDynamoTableMissing(error, this.tableName);
      throw error;
    }
  }

  private async ready(): Promise<void> {
    if (this.isDestroyed) {
      throw new CounterStoreError('DynamoDB counter store has been destroyed');
    }
    if (!this.tableClient) return;

    this.tableReady ??= ensureTable(this.tableClient, this.tableName).catch(
      (error: unknown) => {
        // Let the next operation try again.
        this.tableReady = undefined;
        throw error;
      },
    );
    await this.tableReady;
  }
}
