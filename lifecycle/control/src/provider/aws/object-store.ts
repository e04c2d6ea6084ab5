// provider/aws/object-store.ts - S3 bucket for pageserver layer files

import {
  S3Client,
  BucketLocationConstraint,
  HeadBucketCommand,
  CreateBucketCommand,
  PutBucketVersioningCommand,
  PutBucketLifecycleConfigurationCommand,
  ListObjectVersionsCommand,
  DeleteObjectsCommand,
  DeleteBucketCommand,
  type ObjectIdentifier,
} from "@aws-sdk/client-s3";
import { ConcreteProviderError, isNotFound, mapAwsError, withProviderErrorMapping } from "../errors";
import type { ObjectStoreProvider } from "../types";

/** DeleteObjects accepts at most this many keys per request */
export const DELETE_BATCH_SIZE = 1000;

function toLocationConstraint(region: string): BucketLocationConstraint | undefined {
  return Object.values(BucketLocationConstraint).find((value) => value === region);
}

export class S3ObjectStoreProvider implements ObjectStoreProvider {
  private readonly client: S3Client;

  constructor(private readonly region: string) {
    this.client = new S3Client({ region });
  }

  async bucketExists(bucket: string): Promise<boolean> {
    try {
      await withProviderErrorMapping("aws",
        () => this.client.send(new HeadBucketCommand({ Bucket: bucket })),
        mapAwsError
      );
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  async createBucket(bucket: string): Promise<void> {
    // us-east-1 is the default location and rejects an explicit constraint
    const constraint = this.region === "us-east-1" ? undefined : toLocationConstraint(this.region);
    await withProviderErrorMapping("aws",
      () => this.client.send(new CreateBucketCommand({
        Bucket: bucket,
        ...(constraint ? { CreateBucketConfiguration: { LocationConstraint: constraint } } : {}),
      })),
      mapAwsError
    );
  }

  async configureBucket(bucket: string): Promise<void> {
    await withProviderErrorMapping("aws",
      () => this.client.send(new PutBucketVersioningCommand({
        Bucket: bucket,
        VersioningConfiguration: { Status: "Enabled" },
      })),
      mapAwsError
    );

    await withProviderErrorMapping("aws",
      () => this.client.send(new PutBucketLifecycleConfigurationCommand({
        Bucket: bucket,
        LifecycleConfiguration: {
          Rules: [
            {
              ID: "pageserver-tiering",
              Status: "Enabled",
              Filter: { Prefix: "" },
              Transitions: [{ Days: 30, StorageClass: "INTELLIGENT_TIERING" }],
              NoncurrentVersionExpiration: { NoncurrentDays: 7 },
            },
          ],
        },
      })),
      mapAwsError
    );
  }

  async emptyBucket(bucket: string): Promise<number> {
    let deleted = 0;
    let keyMarker: string | undefined;
    let versionIdMarker: string | undefined;

    for (;;) {
      const page = await withProviderErrorMapping("aws",
        () => this.client.send(new ListObjectVersionsCommand({
          Bucket: bucket,
          KeyMarker: keyMarker,
          VersionIdMarker: versionIdMarker,
          MaxKeys: DELETE_BATCH_SIZE,
        })),
        mapAwsError
      );

      const objects: ObjectIdentifier[] = [];
      for (const entry of [...(page.Versions ?? []), ...(page.DeleteMarkers ?? [])]) {
        if (entry.Key) objects.push({ Key: entry.Key, VersionId: entry.VersionId });
      }

      for (let i = 0; i < objects.length; i += DELETE_BATCH_SIZE) {
        const batch = objects.slice(i, i + DELETE_BATCH_SIZE);
        const result = await withProviderErrorMapping("aws",
          () => this.client.send(new DeleteObjectsCommand({
            Bucket: bucket,
            Delete: { Objects: batch, Quiet: true },
          })),
          mapAwsError
        );
        const errors = result.Errors ?? [];
        if (errors.length > 0) {
          const first = errors[0];
          throw new ConcreteProviderError("aws", "PROVIDER_INTERNAL",
            `Failed to delete ${errors.length} object versions from ${bucket}: ${first?.Key ?? "?"} ${first?.Code ?? ""}`.trim(),
            { details: { bucket, failed: errors.length } }
          );
        }
        deleted += batch.length;
      }

      if (!page.IsTruncated) return deleted;
      keyMarker = page.NextKeyMarker;
      versionIdMarker = page.NextVersionIdMarker;
    }
  }

  async deleteBucket(bucket: string): Promise<void> {
    await withProviderErrorMapping("aws",
      () => this.client.send(new DeleteBucketCommand({ Bucket: bucket })),
      mapAwsError
    );
  }
}
