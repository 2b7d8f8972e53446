import { S3Client } from '@aws-sdk/client-s3';
import { S3PhotoStorage, buildObjectKey, contentTypeToExtension } from '../lib/storage';

/**
 * Unit Tests for S3PhotoStorage and object key helpers
 *
 * getSignedUrl signs locally, so the presigned URLs are checked for real
 * against placeholder credentials; nothing is sent to S3.
 */
describe('S3PhotoStorage', () => {
  const s3Client = new S3Client({
    region: 'us-east-1',
    credentials: {
      accessKeyId: 'test-access-key-id',
      secretAccessKey: 'test-secret-access-key',
    },
  });
  const storage = new S3PhotoStorage(s3Client, 'test-bucket');

  test('should presign a PUT for the object key', async () => {
    // WHEN
    const uploadUrl = await storage.createUploadUrl('alice/p1.jpg', 'image/jpeg', 300);

    // THEN
    const url = new URL(uploadUrl);
    expect(url.hostname).toMatch(/^test-bucket\.s3\./);
    expect(url.pathname).toBe('/alice/p1.jpg');
    expect(url.searchParams.get('X-Amz-Algorithm')).toBe('AWS4-HMAC-SHA256');
    expect(url.searchParams.get('X-Amz-Expires')).toBe('300');
    expect(url.searchParams.get('X-Amz-Credential')).toMatch(/^test-access-key-id\//);
    expect(url.searchParams.has('X-Amz-Signature')).toBe(true);
  });

  test('should presign a GET for downloads', async () => {
    // WHEN
    const downloadUrl = await storage.createDownloadUrl('alice/p1.jpg', 900);

    // THEN
    const url = new URL(downloadUrl);
    expect(url.pathname).toBe('/alice/p1.jpg');
    expect(url.searchParams.get('X-Amz-Expires')).toBe('900');
  });
});

describe('object keys', () => {
  test.each([
    ['image/jpeg', '.jpg'],
    ['image/PNG', '.png'],
    ['image/gif', '.gif'],
    ['image/heic', '.heic'],
    ['image/heif', '.heif'],
    ['application/pdf', ''],
  ])('should map %s to "%s"', (contentType, extension) => {
    expect(contentTypeToExtension(contentType)).toBe(extension);
  });

  test('should map a missing content type to no extension', () => {
    expect(contentTypeToExtension(undefined)).toBe('');
  });

  test('should prefix the key with the family id', () => {
    expect(buildObjectKey('alice', 'p1', 'image/png')).toBe('alice/p1.png');
    expect(buildObjectKey('alice', 'p1')).toBe('alice/p1');
  });
});
