import { ResourceNotFoundException } from '@aws-sdk/client-dynamodb';
import { CounterStoreError } from '@throttlekit/core';

function isResourceNotFound(error: unknown): boolean {
  return (
    error instanceof ResourceNotFoundException ||
    (error instanceof Error && error.name === 'ResourceNotFoundException')
  );
}

/**
 * Rewrites DynamoDB's generic "resource not found" into an error that names
 * the table and how to create it. Other errors pass through untouched.
 */
export function throwIfDynamoTableMissing(
  error: unknown,
  tableName: string,
): void {
  if (isResourceNotFound(error)) {
    throw new CounterStoreError(
      `DynamoDB table "${tableName}" was not found. Create the table using your infrastructure (CloudFormation, CDK, Terraform) or construct the store with ensureTableExists: true.`,
      { cause: error },
    );
  }
}
