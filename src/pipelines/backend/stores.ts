import {
  BucketLocationConstraint,
  CreateBucketCommand,
  GetBucketVersioningCommand,
  HeadBucketCommand,
  PutBucketVersioningCommand,
  S3Client,
  S3ServiceException
} from '@aws-sdk/client-s3'
import {
  CreateTableCommand,
  DescribeTableCommand,
  DynamoDBClient,
  ResourceNotFoundException
} from '@aws-sdk/client-dynamodb'
import {CloudError} from '../../errors.js'

/** Object storage holding Terraform state. */
export type StateBucketStore = {
  exists(bucket: string): Promise<boolean>;
  create(bucket: string, region: string): Promise<void>;
  versioningEnabled(bucket: string): Promise<boolean>;
  enableVersioning(bucket: string): Promise<void>;
}

/** Key-value table used by Terraform to serialize state writes. */
export type LockTableStore = {
  /** Table status (CREATING, ACTIVE, ...), undefined when the table does not exist. */
  status(table: string): Promise<string | undefined>;
  create(table: string): Promise<void>;
}

export type BackendStores = {
  bucket: StateBucketStore;
  lockTable: LockTableStore;
}

/** Hash key attribute Terraform's S3 backend expects on the lock table. */
export const LOCK_KEY_ATTRIBUTE = 'LockID'

function isLocationConstraint(region: string): region is BucketLocationConstraint {
  return Object.values<string>(BucketLocationConstraint).includes(region)
}

export class S3StateBucketStore implements StateBucketStore {
  constructor(private readonly client: S3Client) {}

  async exists(bucket: string): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({Bucket: bucket}))
      return true
    } catch (error) {
      if (error instanceof S3ServiceException && error.$metadata.httpStatusCode === 404) {
        return false
      }

      throw new CloudError(`HeadBucket ${bucket}`, {cause: error})
    }
  }

  /** us-east-1 is the default location and must not be sent as a constraint. */
  async create(bucket: string, region: string): Promise<void> {
    let command: CreateBucketCommand
    if (region === 'us-east-1') {
      command = new CreateBucketCommand({Bucket: bucket})
    } else if (isLocationConstraint(region)) {
      command = new CreateBucketCommand({Bucket: bucket, CreateBucketConfiguration: {LocationConstraint: region}})
    } else {
      throw new CloudError(`CreateBucket ${bucket}`, {cause: new Error(`Unsupported bucket region "${region}"`)})
    }

    try {
      await this.client.send(command)
    } catch (error) {
      throw new CloudError(`CreateBucket ${bucket}`, {cause: error})
    }
  }

  async versioningEnabled(bucket: string): Promise<boolean> {
    try {
      const output = await this.client.send(new GetBucketVersioningCommand({Bucket: bucket}))
      return output.Status === 'Enabled'
    } catch (error) {
      throw new CloudError(`GetBucketVersioning ${bucket}`, {cause: error})
    }
  }

  async enableVersioning(bucket: string): Promise<void> {
    try {
      await this.client.send(new PutBucketVersioningCommand({
        Bucket: bucket,
        VersioningConfiguration: {Status: 'Enabled'}
      }))
    } catch (error) {
      throw new CloudError(`PutBucketVersioning ${bucket}`, {cause: error})
    }
  }
}

export class DynamoLockTableStore implements LockTableStore {
  constructor(private readonly client: DynamoDBClient) {}

  async status(table: string): Promise<string | undefined> {
    try {
      const output = await this.client.send(new DescribeTableCommand({TableName: table}))
      return output.Table?.TableStatus
    } catch (error) {
      if (error instanceof ResourceNotFoundException) {
        return undefined
      }

      throw new CloudError(`DescribeTable ${table}`, {cause: error})
    }
  }

  async create(table: string): Promise<void> {
    try {
      await this.client.send(new CreateTableCommand({
        TableName: table,
        AttributeDefinitions: [{AttributeName: LOCK_KEY_ATTRIBUTE, AttributeType: 'S'}],
        KeySchema: [{AttributeName: LOCK_KEY_ATTRIBUTE, KeyType: 'HASH'}],
        BillingMode: 'PAY_PER_REQUEST'
      }))
    } catch (error) {
      throw new CloudError(`CreateTable ${table}`, {cause: error})
    }
  }
}

/** Stores backed by the AWS SDK, using the default credential chain. */
export function createAwsStores(region: string): BackendStores {
  return {
    bucket: new S3StateBucketStore(new S3Client({region})),
    lockTable: new DynamoLockTableStore(new DynamoDBClient({region}))
  }
}
