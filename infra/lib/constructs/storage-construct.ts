import * as cdk from 'aws-cdk-lib/core';
import { Construct } from 'constructs';
import * as s3 from 'aws-cdk-lib/aws-s3';

/**
 * StorageConstruct
 *
 * The two private buckets of the resize job: source images land in the upload
 * bucket, resized artifacts are written to the resized bucket and handed out
 * through presigned GET URLs.
 *
 * Both buckets use S3-managed encryption, block all public access and are
 * destroyed with the stack.
 */
export class StorageConstruct extends Construct {
  /**
   * Bucket the resize job reads `key` references from.
   */
  public readonly uploadBucket: s3.Bucket;

  /**
   * Bucket the resize job writes its output to.
   */
  public readonly resizedBucket: s3.Bucket;

  constructor(scope: Construct, id: string) {
    super(scope, id);

    this.uploadBucket = new s3.Bucket(this, 'UploadBucket', {
      encryption: s3.BucketEncryption.S3_MANAGED,
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      enforceSSL: true,
      removalPolicy: cdk.RemovalPolicy.DESTROY,
      autoDeleteObjects: true,
      versioned: false,
    });

    this.resizedBucket = new s3.Bucket(this, 'ResizedBucket', {
      encryption: s3.BucketEncryption.S3_MANAGED,
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      enforceSSL: true,
      removalPolicy: cdk.RemovalPolicy.DESTROY,
      autoDeleteObjects: true,
      versioned: false,
    });
  }
}
