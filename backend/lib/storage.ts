import { GetObjectCommand, NoSuchKey, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { InvalidInputError, StorageError, errorMessage } from './errors';

/**
 * Download an object fully into memory
 *
 * A key that does not exist is the caller pointing at nothing, so it is
 * reported as invalid input rather than a storage failure.
 *
 * @throws InvalidInputError if the key does not exist
 * @throws StorageError for any other S3 failure
 */
export async function readObject(client: S3Client, bucket: string, key: string): Promise<Buffer> {
  console.log(`Reading source object: s3://${bucket}/${key}`);
  try {
    const response = await client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
    if (!response.Body) {
      throw new StorageError(`Object s3://${bucket}/${key} has no body`);
    }
    const bytes = await response.Body.transformToByteArray();
    return Buffer.from(bytes);
  } catch (error) {
    if (error instanceof StorageError) {
      throw error;
    }
    if (error instanceof NoSuchKey) {
      throw new InvalidInputError(`Source object not found: ${key}`, error);
    }
    throw new StorageError(`Failed to read s3://${bucket}/${key}: ${errorMessage(error)}`, error);
  }
}

/**
 * Put the resized bytes. Overwrites an existing key; the bucket is not versioned.
 * @throws StorageError if S3 rejects the write
 */
export async function writeObject(
  client: S3Client,
  bucket: string,
  key: string,
  body: Buffer,
  contentType: string
): Promise<void> {
  console.log(`Writing resized object: s3://${bucket}/${key}`);
  try {
    await client.send(
      new PutObjectCommand({
        Bucket: bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
      })
    );
  } catch (error) {
    throw new StorageError(`Failed to write s3://${bucket}/${key}: ${errorMessage(error)}`, error);
  }
}

/**
 * Presign a GET for a private object
 * @param expiresIn Seconds the URL stays valid
 */
export async function createDownloadUrl(
  client: S3Client,
  bucket: string,
  key: string,
  expiresIn: number
): Promise<string> {
  try {
    return await getSignedUrl(client, new GetObjectCommand({ Bucket: bucket, Key: key }), { expiresIn });
  } catch (error) {
    throw new StorageError(`Failed to presign s3://${bucket}/${key}: ${errorMessage(error)}`, error);
  }
}
