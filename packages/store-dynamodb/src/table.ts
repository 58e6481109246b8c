import {
  CreateTableCommand,
  DescribeTableCommand,
  ResourceNotFoundException,
  UpdateTimeToLiveCommand,
  type AttributeDefinition,
  type DynamoDBClient,
  type KeySchemaElement,
} from '@aws-sdk/client-dynamodb';

export const DEFAULT_TABLE_NAME = 'throttlekit-counters';

/** Attribute DynamoDB's TTL sweeper reads (epoch seconds). */
export const TTL_ATTRIBUTE = 'ttl';

export const TABLE_SCHEMA: {
  KeySchema: Array<KeySchemaElement>;
  AttributeDefinitions: Array<AttributeDefinition>;
} = {
  KeySchema: [
    { AttributeName: 'pk', KeyType: 'HASH' },
    { AttributeName: 'sk', KeyType: 'RANGE' },
  ],
  AttributeDefinitions: [
    { AttributeName: 'pk', AttributeType: 'S' },
    { AttributeName: 'sk', AttributeType: 'S' },
  ],
};

export interface WaitOptions {
  maxAttempts?: number;
  delayMs?: number;
}

/** Creates the counter table, waits for it, then turns on TTL expiry. */
export async function createTable(
  client: DynamoDBClient,
  tableName: string = DEFAULT_TABLE_NAME,
  options?: WaitOptions,
): Promise<void> {
  await client.send(
    new CreateTableCommand({
      TableName: tableName,
      KeySchema: TABLE_SCHEMA.KeySchema,
      AttributeDefinitions: TABLE_SCHEMA.AttributeDefinitions,
      BillingMode: 'PAY_PER_REQUEST',
    }),
  );

  await waitForTable(client, tableName, options);

  await client.send(
    new UpdateTimeToLiveCommand({
      TableName: tableName,
      TimeToLiveSpecification: { AttributeName: TTL_ATTRIBUTE, Enabled: true },
    }),
  );
}

export async function ensureTable(
  client: DynamoDBClient,
  tableName: string = DEFAULT_TABLE_NAME,
  options?: WaitOptions,
): Promise<void> {
  try {
    const response = await client.send(
      new DescribeTableCommand({ TableName: tableName }),
    );
    if (response.Table?.TableStatus === 'ACTIVE') {
      return;
    }
    await waitForTable(client, tableName, options);
  } catch (error: unknown) {
    if (error instanceof ResourceNotFoundException) {
      await createTable(client, tableName, options);
      return;
    }
    throw error;
  }
}

async function waitForTable(
  client: DynamoDBClient,
  tableName: string,
  { maxAttempts = 30, delayMs = 1000 }: WaitOptions = {},
): Promise<void> {
  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const response = await client.send(
      new DescribeTableCommand({ TableName: tableName }),
    );
    if (response.Table?.TableStatus === 'ACTIVE') {
      return;
    }
    await new Promise((resolve) => setTimeout(resolve, delayMs));
  }
  throw new Error(
    `Table ${tableName} did not become active within ${maxAttempts * delayMs}ms`,
  );
}
