import {
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  QueryCommand,
  QueryCommandOutput,
} from '@aws-sdk/lib-dynamodb';
import { PhotoMetadata, isPhotoMetadata } from '../interfaces';

/**
 * Metadata store collaborator, keyed by (familyId, photoId)
 */
export interface PhotoMetadataStore {
  /** Write the item, replacing any item with the same key */
  put(item: PhotoMetadata): Promise<void>;

  /** Every item of the family partition, in store order */
  listByFamily(familyId: string): Promise<PhotoMetadata[]>;

  get(familyId: string, photoId: string): Promise<PhotoMetadata | undefined>;
}

/**
 * {@link PhotoMetadataStore} backed by a DynamoDB table
 * with partition key `familyId` and sort key `photoId`.
 */
export class DynamoPhotoMetadataStore implements PhotoMetadataStore {
  constructor(
    private readonly dynamoDbClient: DynamoDBDocumentClient,
    private readonly tableName: string
  ) {}

  async put(item: PhotoMetadata): Promise<void> {
    /**
     * No ConditionExpression: recording the same photo twice replaces the
     * item (last write wins) instead of failing.
     */
    await this.dynamoDbClient.send(
      new PutCommand({
        TableName: this.tableName,
        Item: { ...item },
      })
    );
  }

  async listByFamily(familyId: string): Promise<PhotoMetadata[]> {
    const items: PhotoMetadata[] = [];
    let exclusiveStartKey: QueryCommandOutput['LastEvaluatedKey'];

    // Query returns at most 1MB per page
    do {
      const response = await this.dynamoDbClient.send(
        new QueryCommand({
          TableName: this.tableName,
          KeyConditionExpression: 'familyId = :familyId',
          ExpressionAttributeValues: { ':familyId': familyId },
          ExclusiveStartKey: exclusiveStartKey,
        })
      );
      for (const item of response.Items ?? []) {
        if (isPhotoMetadata(item)) {
          items.push(item);
        } else {
          console.warn('Skipping malformed photo item', JSON.stringify(item));
        }
      }
      exclusiveStartKey = response.LastEvaluatedKey;
    } while (exclusiveStartKey);

    return items;
  }

  async get(familyId: string, photoId: string): Promise<PhotoMetadata | undefined> {
    const response = await this.dynamoDbClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { familyId, photoId },
      })
    );
    return isPhotoMetadata(response.Item) ? response.Item : undefined;
  }
}
